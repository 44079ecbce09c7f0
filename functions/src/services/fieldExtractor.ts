/**
 * Field Extractor
 *
 * Decides which attribute of a matched medicine a query asks about and
 * formats the spoken reply. Rules are literal keyword lists checked in order,
 * case-insensitive substring containment, first match wins.
 */

import type { FieldCategory, MedicineRecord } from '../types/medicine';

export const TRIGGER_PHRASES = ['hey murfmedu', 'hey medu', 'hey murf medu'] as const;

export const TRIGGER_ACKNOWLEDGEMENT = 'yes tell me';

export const FIELD_NOT_AVAILABLE = 'Info not available for requested field';

export type FieldRule = {
  category: FieldCategory;
  keywords: readonly string[];
};

export const FIELD_RULES: readonly FieldRule[] = [
  { category: 'uses', keywords: ['use', 'uses', 'ka use', 'kya karta', 'what is it for', 'used for'] },
  { category: 'prescription', keywords: ['prescription', 'prescribe', 'doctor'] },
  { category: 'dosage', keywords: ['dosage', 'dose', 'kitni', 'kitna'] },
];

export function containsTriggerPhrase(query: string): boolean {
  const q = query.toLowerCase();
  return TRIGGER_PHRASES.some((phrase) => q.includes(phrase));
}

export function classifyFieldCategory(query: string): FieldCategory | null {
  const q = query.toLowerCase();
  const rule = FIELD_RULES.find(({ keywords }) => keywords.some((keyword) => q.includes(keyword)));
  return rule?.category ?? null;
}

const fieldValue = (record: MedicineRecord, category: FieldCategory): string => {
  switch (category) {
    case 'uses':
      return record.uses.join(', ');
    case 'prescription':
      return record.prescription;
    case 'dosage':
      return record.dosageAdults;
  }
};

export function extractRequestedField(query: string, record: MedicineRecord): string {
  if (containsTriggerPhrase(query)) {
    return TRIGGER_ACKNOWLEDGEMENT;
  }

  const category = classifyFieldCategory(query);
  const value = category ? fieldValue(record, category).trim() : '';
  if (value) {
    return `${record.name} - ${value}`;
  }
  return `${record.name} - ${FIELD_NOT_AVAILABLE}`;
}
