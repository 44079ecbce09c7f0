/**
 * Query Matcher
 *
 * Maps free text (typed or transcribed) to a catalog record. Ties always go
 * to the first candidate in load order; nothing is scored or ranked.
 */

import type { MedicineRecord } from '../types/medicine';
import { normalizeLookupKey, type MedicineCatalog } from './catalog/MedicineCatalog';

/**
 * Tiered lookup, first hit wins:
 * 1. exact key
 * 2. key contains query, or query contains key
 * 3. generic name contains query
 * 4. any brand name contains query
 */
export function findMedicine(query: string, catalog: MedicineCatalog): MedicineRecord | null {
  const normalized = normalizeLookupKey(query);
  if (!normalized) {
    return null;
  }

  const exact = catalog.get(normalized);
  if (exact) {
    return exact;
  }

  for (const [key, record] of catalog.entriesInLoadOrder()) {
    if (key.includes(normalized) || normalized.includes(key)) {
      return record;
    }
  }

  const records = catalog.records();

  const byGeneric = records.find((record) =>
    record.genericName.toLowerCase().includes(normalized),
  );
  if (byGeneric) {
    return byGeneric;
  }

  const byBrand = records.find((record) =>
    record.brandNames.some((brand) => brand.toLowerCase().includes(normalized)),
  );
  return byBrand ?? null;
}

/**
 * Voice-path lookup. Only checks the transcript inside the name, then falls
 * back to the first record whose name contains any whitespace-separated token.
 */
export function findMedicineByTranscript(
  transcript: string,
  catalog: MedicineCatalog,
): MedicineRecord | null {
  const text = transcript.toLowerCase();
  const records = catalog.records();

  const whole = records.find((record) => record.name.toLowerCase().includes(text));
  if (whole) {
    return whole;
  }

  const tokens = text.split(/\s+/).filter(Boolean);
  const byToken = records.find((record) => {
    const name = record.name.toLowerCase();
    return tokens.some((token) => name.includes(token));
  });
  return byToken ?? null;
}

/**
 * Every record whose key, generic name or a brand name contains the query.
 */
export function searchAllMedicines(query: string, catalog: MedicineCatalog): MedicineRecord[] {
  const normalized = normalizeLookupKey(query);

  return catalog
    .entriesInLoadOrder()
    .filter(
      ([key, record]) =>
        key.includes(normalized) ||
        record.genericName.toLowerCase().includes(normalized) ||
        record.brandNames.some((brand) => brand.toLowerCase().includes(normalized)),
    )
    .map(([, record]) => record);
}

export function listMedicinesByClass(
  className: string,
  catalog: MedicineCatalog,
): MedicineRecord[] {
  const normalized = className.toLowerCase();
  return catalog.records().filter((record) => record.class.toLowerCase().includes(normalized));
}
