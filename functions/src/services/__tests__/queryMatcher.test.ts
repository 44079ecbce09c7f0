import { MedicineCatalog } from '../catalog/MedicineCatalog';
import {
  findMedicine,
  findMedicineByTranscript,
  listMedicinesByClass,
  searchAllMedicines,
} from '../queryMatcher';
import { amoxicillin, ibuprofen, makeMedicine, paracetamol } from '../../__tests__/medicineFixtures';

describe('queryMatcher', () => {
  const catalog = new MedicineCatalog([paracetamol, ibuprofen, amoxicillin]);

  describe('findMedicine', () => {
    it('matches the exact key after normalizing case and whitespace', () => {
      expect(findMedicine('  PARACETAMOL ', catalog)?.name).toBe('Paracetamol');
    });

    it('matches when the key contains the query', () => {
      expect(findMedicine('ibupro', catalog)?.name).toBe('Ibuprofen');
    });

    it('matches when the query contains the key', () => {
      expect(findMedicine('amoxicillin 500mg capsule', catalog)?.name).toBe('Amoxicillin');
    });

    it('falls back to the generic name', () => {
      expect(findMedicine('minophen', catalog)?.name).toBe('Paracetamol');
    });

    it('falls back to brand names', () => {
      expect(findMedicine('Novamox', catalog)?.name).toBe('Amoxicillin');
      expect(findMedicine('tylenol', catalog)?.name).toBe('Paracetamol');
    });

    it('takes the first record in load order for either substring direction', () => {
      const aspirin = makeMedicine({ name: 'Aspirin' });
      const aspirinPlus = makeMedicine({ name: 'Aspirin Plus' });

      // "aspirin p" contains "aspirin" and is contained in "aspirin plus"
      expect(findMedicine('aspirin p', new MedicineCatalog([aspirin, aspirinPlus]))?.name).toBe('Aspirin');
      expect(findMedicine('aspirin p', new MedicineCatalog([aspirinPlus, aspirin]))?.name).toBe(
        'Aspirin Plus',
      );
    });

    it('prefers a later name match over an earlier generic-name match', () => {
      const byGeneric = new MedicineCatalog([
        makeMedicine({ name: 'Alpha', genericName: 'sharedthing' }),
        makeMedicine({ name: 'sharedthingplus' }),
      ]);

      expect(findMedicine('sharedthing', byGeneric)?.name).toBe('sharedthingplus');
    });

    it('prefers a later generic-name match over an earlier brand match', () => {
      const byBrand = new MedicineCatalog([
        makeMedicine({ name: 'Alpha', brandNames: ['Zentro'] }),
        makeMedicine({ name: 'Beta', genericName: 'Zentrocillin' }),
      ]);

      expect(findMedicine('zentro', byBrand)?.name).toBe('Beta');
    });

    it('returns null for blank or unknown queries', () => {
      expect(findMedicine('   ', catalog)).toBeNull();
      expect(findMedicine('xyznotreal', catalog)).toBeNull();
    });
  });

  describe('findMedicineByTranscript', () => {
    it('matches a transcript contained in a medicine name', () => {
      expect(findMedicineByTranscript('Amoxi', catalog)?.name).toBe('Amoxicillin');
    });

    it('falls back to any token contained in a name', () => {
      expect(findMedicineByTranscript('What is the dosage of paracetamol', catalog)?.name).toBe(
        'Paracetamol',
      );
      expect(findMedicineByTranscript('ibuprofen dose', catalog)?.name).toBe('Ibuprofen');
    });

    it('returns the first record in load order that contains any token', () => {
      const reordered = new MedicineCatalog([ibuprofen, paracetamol]);

      // "of" is inside "ibuprofen"
      expect(findMedicineByTranscript('dose of paracetamol', reordered)?.name).toBe('Ibuprofen');
    });

    it('does not look at generic or brand names', () => {
      expect(findMedicineByTranscript('tylenol', catalog)).toBeNull();
      expect(findMedicineByTranscript('xyznotreal', catalog)).toBeNull();
    });
  });

  describe('searchAllMedicines', () => {
    it('returns every record whose key, generic or brand contains the query', () => {
      const results = searchAllMedicines('ol', catalog);

      expect(results.map((record) => record.name)).toEqual(['Paracetamol']);
    });

    it('matches brand names', () => {
      expect(searchAllMedicines('advil', catalog).map((record) => record.name)).toEqual(['Ibuprofen']);
    });

    it('keeps load order across several hits', () => {
      const results = searchAllMedicines('c', catalog);

      expect(results.map((record) => record.name)).toEqual(['Paracetamol', 'Amoxicillin']);
    });
  });

  describe('listMedicinesByClass', () => {
    it('filters by a case-insensitive class fragment', () => {
      expect(listMedicinesByClass('nsaid', catalog).map((record) => record.name)).toEqual(['Ibuprofen']);
      expect(listMedicinesByClass('antiviral', catalog)).toEqual([]);
    });
  });
});
