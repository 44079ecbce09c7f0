import { BrandTable, InteractionTable, MedicineCatalog } from '../MedicineCatalog';
import { makeMedicine } from '../../../__tests__/medicineFixtures';

describe('MedicineCatalog', () => {
  it('keys records by lowercased, trimmed name in load order', () => {
    const catalog = new MedicineCatalog([
      makeMedicine({ name: ' Paracetamol ' }),
      makeMedicine({ name: 'Ibuprofen' }),
    ]);

    expect(catalog.keys()).toEqual(['paracetamol', 'ibuprofen']);
    expect(catalog.has('ibuprofen')).toBe(true);
    expect(catalog.get('Ibuprofen')).toBeNull();
  });

  it('is not affected by later changes to the input lists', () => {
    const uses = ['Fever'];
    const brandNames = ['Crocin'];
    const catalog = new MedicineCatalog([makeMedicine({ name: 'Paracetamol', uses, brandNames })]);

    uses.push('Injected');
    brandNames.length = 0;

    expect(catalog.get('paracetamol')?.uses).toEqual(['Fever']);
    expect(catalog.get('paracetamol')?.brandNames).toEqual(['Crocin']);
  });

  it('hands out records whose list fields cannot be changed', () => {
    const catalog = new MedicineCatalog([makeMedicine({ name: 'Paracetamol', uses: ['Fever'] })]);
    const record = catalog.get('paracetamol');

    expect(Object.isFrozen(record)).toBe(true);
    for (const list of [
      record?.uses,
      record?.sideEffects,
      record?.contraindications,
      record?.interactions,
      record?.brandNames,
    ]) {
      expect(Object.isFrozen(list)).toBe(true);
    }
    expect(() => {
      const uses: unknown = record?.uses;
      if (Array.isArray(uses)) uses.push('Injected');
    }).toThrow(TypeError);
    expect(catalog.get('paracetamol')?.uses).toEqual(['Fever']);
  });
});

describe('InteractionTable', () => {
  it('counts pairs once and answers both orderings', () => {
    const table = new InteractionTable([
      {
        medicine1: 'Warfarin',
        medicine2: 'Aspirin',
        interaction: {
          severity: 'High',
          effect: 'Increased bleeding risk',
          recommendation: 'Consult doctor',
          mechanism: 'Not specified',
        },
      },
    ]);

    expect(table.size).toBe(1);
    expect(table.get('aspirin', 'warfarin')).toBe(table.get('warfarin', 'aspirin'));
  });
});

describe('BrandTable', () => {
  it('returns a copy of the brand list', () => {
    const table = new BrandTable([
      {
        genericName: 'Ibuprofen',
        brand: { brandName: 'Brufen', company: 'Abbott', form: 'Tablet', strength: '400mg', priceRange: 'Low' },
      },
    ]);

    table.get('ibuprofen').pop();

    expect(table.get('IBUPROFEN')).toHaveLength(1);
  });
});
