import type { BrandEntry, InteractionRecord, MedicineRecord } from '../../types/medicine';

export const normalizeLookupKey = (value: string): string => value.toLowerCase().trim();

// List fields are copied too, so neither the loader nor a caller holding a
// returned record can change catalog state.
const freezeRecord = (record: MedicineRecord): Readonly<MedicineRecord> =>
  Object.freeze({
    ...record,
    uses: Object.freeze([...record.uses]),
    sideEffects: Object.freeze([...record.sideEffects]),
    contraindications: Object.freeze([...record.contraindications]),
    interactions: Object.freeze([...record.interactions]),
    brandNames: Object.freeze([...record.brandNames]),
  });

const interactionKey = (med1: string, med2: string): string => `${med1}\u0000${med2}`;

/**
 * Read-only medicine table keyed by lowercased, trimmed name.
 * Iteration follows load order; a duplicate name overwrites in place.
 */
export class MedicineCatalog {
  private readonly entries: ReadonlyMap<string, Readonly<MedicineRecord>>;

  constructor(records: Iterable<MedicineRecord>) {
    const entries = new Map<string, Readonly<MedicineRecord>>();
    for (const record of records) {
      entries.set(normalizeLookupKey(record.name), freezeRecord(record));
    }
    this.entries = entries;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): Readonly<MedicineRecord> | null {
    return this.entries.get(key) ?? null;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  records(): Readonly<MedicineRecord>[] {
    return Array.from(this.entries.values());
  }

  entriesInLoadOrder(): Array<[string, Readonly<MedicineRecord>]> {
    return Array.from(this.entries.entries());
  }
}

/**
 * Pairwise interaction table. Each pair is stored under both orderings.
 */
export class InteractionTable {
  private readonly entries = new Map<string, Readonly<InteractionRecord>>();
  private pairCount = 0;

  constructor(
    rows: Iterable<{ medicine1: string; medicine2: string; interaction: InteractionRecord }>,
  ) {
    for (const row of rows) {
      const med1 = normalizeLookupKey(row.medicine1);
      const med2 = normalizeLookupKey(row.medicine2);
      const interaction = Object.freeze({ ...row.interaction });
      this.entries.set(interactionKey(med1, med2), interaction);
      this.entries.set(interactionKey(med2, med1), interaction);
      this.pairCount += 1;
    }
  }

  get size(): number {
    return this.pairCount;
  }

  get(med1: string, med2: string): Readonly<InteractionRecord> | null {
    return this.entries.get(interactionKey(med1, med2)) ?? null;
  }
}

/**
 * Brand listings grouped by lowercased generic name, in load order.
 */
export class BrandTable {
  private readonly entries = new Map<string, Readonly<BrandEntry>[]>();
  private entryCount = 0;

  constructor(rows: Iterable<{ genericName: string; brand: BrandEntry }>) {
    for (const row of rows) {
      const key = normalizeLookupKey(row.genericName);
      const list = this.entries.get(key) ?? [];
      list.push(Object.freeze({ ...row.brand }));
      this.entries.set(key, list);
      this.entryCount += 1;
    }
  }

  get size(): number {
    return this.entryCount;
  }

  get(genericName: string): Readonly<BrandEntry>[] {
    return [...(this.entries.get(normalizeLookupKey(genericName)) ?? [])];
  }
}

export type MedicineDataSet = {
  catalog: MedicineCatalog;
  interactions: InteractionTable;
  brands: BrandTable;
};
