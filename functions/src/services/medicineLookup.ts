import type { BrandEntry, InteractionRecord } from '../types/medicine';
import { normalizeLookupKey, type MedicineDataSet } from './catalog/MedicineCatalog';
import { findMedicine } from './queryMatcher';

/**
 * Cross-medicine lookups over the loaded read model.
 */
export class MedicineLookupService {
  constructor(private readonly data: MedicineDataSet) {}

  checkInteraction(med1: string, med2: string): InteractionRecord | null {
    const first = normalizeLookupKey(med1);
    const second = normalizeLookupKey(med2);

    return (
      this.data.interactions.get(first, second) ??
      this.data.interactions.get(second, first)
    );
  }

  getBrands(medicineNameOrQuery: string): BrandEntry[] {
    const medicine = findMedicine(medicineNameOrQuery, this.data.catalog);
    if (!medicine) {
      return [];
    }
    return this.data.brands.get(medicine.genericName);
  }
}
