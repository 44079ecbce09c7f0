import type { MedicineCatalog } from './catalog/MedicineCatalog';
import { EmptyInputError } from './errors';
import {
  containsTriggerPhrase,
  extractRequestedField,
  TRIGGER_ACKNOWLEDGEMENT,
} from './fieldExtractor';
import { findMedicineByTranscript } from './queryMatcher';

export const MEDICINE_NOT_FOUND = 'Medicine not found.';

/**
 * Turns one utterance into one reply. Stateless; the catalog is read-only.
 */
export class QueryHandler {
  constructor(private readonly catalog: MedicineCatalog) {}

  handleQuery(rawText: string): string {
    const text = rawText.trim();
    if (!text) {
      throw new EmptyInputError();
    }

    // The wake word is acknowledged even when no medicine matches.
    if (containsTriggerPhrase(text)) {
      return TRIGGER_ACKNOWLEDGEMENT;
    }

    const medicine = findMedicineByTranscript(text, this.catalog);
    if (!medicine) {
      return MEDICINE_NOT_FOUND;
    }
    return extractRequestedField(text, medicine);
  }
}
