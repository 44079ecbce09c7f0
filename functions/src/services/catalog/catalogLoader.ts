/**
 * Catalog Loader
 *
 * Builds the read model (medicines, interactions, brands) from the CSV
 * sources in the data directory. Runs once at startup. A missing or broken
 * medicine table degrades to the built-in sample data instead of failing.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as functions from 'firebase-functions';
import * as XLSX from 'xlsx';
import { z } from 'zod';
import { SAMPLE_INTERACTIONS, SAMPLE_MEDICINES } from '../../data/sampleMedicines';
import type { BrandEntry, InteractionRecord, MedicineRecord } from '../../types/medicine';
import { MalformedRecordError } from '../errors';
import {
  BrandTable,
  InteractionTable,
  MedicineCatalog,
  type MedicineDataSet,
} from './MedicineCatalog';

export const MEDICINES_FILE = 'medicines.csv';
export const INTERACTIONS_FILE = 'interactions.csv';
export const BRANDS_FILE = 'brands.csv';

const LIST_DELIMITER = ';';

// Header line is row 1, so the first data row is row 2.
const FIRST_DATA_ROW = 2;

type CsvRow = Record<string, unknown>;

const toCell = (value: unknown): string =>
  value === undefined || value === null ? '' : String(value).trim();

const cell = z.preprocess(toCell, z.string());
const requiredCell = (field: string) =>
  z.preprocess(toCell, z.string().min(1, `${field} is required`));

const medicineRowSchema = z.object({
  name: requiredCell('name'),
  generic_name: cell,
  class: cell,
  uses: cell,
  dosage_adults: cell,
  dosage_children: cell,
  side_effects: cell,
  contraindications: cell,
  interactions: cell,
  pregnancy: cell,
  storage: cell,
  brand_names: cell,
  mechanism: cell,
  onset: cell,
  duration: cell,
  prescription: cell,
});

const interactionRowSchema = z.object({
  medicine1: requiredCell('medicine1'),
  medicine2: requiredCell('medicine2'),
  severity: cell,
  effect: cell,
  recommendation: cell,
  mechanism: cell,
});

const brandRowSchema = z.object({
  generic_name: requiredCell('generic_name'),
  brand_name: requiredCell('brand_name'),
  company: cell,
  form: cell,
  strength: cell,
  price_range: cell,
});

const orDefault = (value: string, fallback: string): string => value || fallback;

export const splitList = (value: string): string[] =>
  value
    .split(LIST_DELIMITER)
    .map((item) => item.trim())
    .filter(Boolean);

const describeIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => issue.message).join('; ');

/**
 * Parse one medicine row. Optional cells fall back to their defaults;
 * a row without a name throws MalformedRecordError.
 */
export function parseMedicineRow(row: CsvRow, rowNumber: number): MedicineRecord {
  const parsed = medicineRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new MalformedRecordError(
      `Malformed medicine row ${rowNumber}: ${describeIssues(parsed.error)}`,
      rowNumber,
    );
  }

  const data = parsed.data;
  return {
    name: data.name,
    genericName: orDefault(data.generic_name, data.name),
    class: orDefault(data.class, 'Unknown'),
    uses: splitList(data.uses),
    dosageAdults: orDefault(data.dosage_adults, 'Not specified'),
    dosageChildren: orDefault(data.dosage_children, 'Not specified'),
    sideEffects: splitList(data.side_effects),
    contraindications: splitList(data.contraindications),
    interactions: splitList(data.interactions),
    pregnancy: orDefault(data.pregnancy, 'Not specified'),
    storage: orDefault(data.storage, 'Room temperature'),
    mechanism: orDefault(data.mechanism, 'Not specified'),
    onset: orDefault(data.onset, 'Not specified'),
    duration: orDefault(data.duration, 'Not specified'),
    brandNames: splitList(data.brand_names),
    prescription: data.prescription,
  };
}

export function parseInteractionRow(
  row: CsvRow,
  rowNumber: number,
): { medicine1: string; medicine2: string; interaction: InteractionRecord } {
  const parsed = interactionRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new MalformedRecordError(
      `Malformed interaction row ${rowNumber}: ${describeIssues(parsed.error)}`,
      rowNumber,
    );
  }

  const data = parsed.data;
  return {
    medicine1: data.medicine1,
    medicine2: data.medicine2,
    interaction: {
      severity: orDefault(data.severity, 'Unknown'),
      effect: orDefault(data.effect, 'Interaction present'),
      recommendation: orDefault(data.recommendation, 'Consult doctor'),
      mechanism: orDefault(data.mechanism, 'Not specified'),
    },
  };
}

export function parseBrandRow(
  row: CsvRow,
  rowNumber: number,
): { genericName: string; brand: BrandEntry } {
  const parsed = brandRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new MalformedRecordError(
      `Malformed brand row ${rowNumber}: ${describeIssues(parsed.error)}`,
      rowNumber,
    );
  }

  const data = parsed.data;
  return {
    genericName: data.generic_name,
    brand: {
      brandName: data.brand_name,
      company: orDefault(data.company, 'Unknown'),
      form: orDefault(data.form, 'Tablet'),
      strength: data.strength,
      priceRange: orDefault(data.price_range, 'Medium'),
    },
  };
}

/**
 * Parse delimited text into header-keyed rows. Cells are kept as text.
 */
export function parseCsvRows(content: string): CsvRow[] {
  // The list cells are ';'-delimited, which would otherwise win the
  // separator guess on short files. Pin the separator explicitly.
  const text = `sep=,\n${content.replace(/^\uFEFF/, '')}`;
  const workbook = XLSX.read(text, { type: 'string', raw: true });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    return [];
  }
  return XLSX.utils.sheet_to_json<CsvRow>(sheet, { raw: false, defval: '' });
}

const readCsvFile = (filePath: string): CsvRow[] =>
  parseCsvRows(fs.readFileSync(filePath, 'utf-8'));

export function loadMedicineCatalog(filePath: string): MedicineCatalog {
  if (!fs.existsSync(filePath)) {
    functions.logger.warn(`[catalog] ${filePath} not found. Using sample medicine data.`);
    return new MedicineCatalog(SAMPLE_MEDICINES);
  }

  try {
    const rows = readCsvFile(filePath);
    const records = rows.map((row, index) => parseMedicineRow(row, index + FIRST_DATA_ROW));
    const catalog = new MedicineCatalog(records);
    functions.logger.info(`[catalog] Loaded ${catalog.size} medicines from ${filePath}`);
    return catalog;
  } catch (error) {
    functions.logger.error('[catalog] Error loading medicines. Using sample medicine data.', error);
    return new MedicineCatalog(SAMPLE_MEDICINES);
  }
}

export function loadInteractionTable(filePath: string): InteractionTable {
  if (!fs.existsSync(filePath)) {
    functions.logger.warn(`[catalog] ${filePath} not found. Using sample interaction data.`);
    return new InteractionTable(SAMPLE_INTERACTIONS);
  }

  try {
    const rows = readCsvFile(filePath);
    const parsedRows = rows.flatMap((row, index) => {
      try {
        return [parseInteractionRow(row, index + FIRST_DATA_ROW)];
      } catch (error) {
        if (error instanceof MalformedRecordError) {
          functions.logger.warn(`[catalog] Skipping interaction: ${error.message}`);
          return [];
        }
        throw error;
      }
    });
    const table = new InteractionTable(parsedRows);
    functions.logger.info(`[catalog] Loaded ${table.size} interactions from ${filePath}`);
    return table;
  } catch (error) {
    functions.logger.error('[catalog] Error loading interactions. Using sample interaction data.', error);
    return new InteractionTable(SAMPLE_INTERACTIONS);
  }
}

export function loadBrandTable(filePath: string): BrandTable {
  if (!fs.existsSync(filePath)) {
    functions.logger.warn(`[catalog] ${filePath} not found. Skipping brands.`);
    return new BrandTable([]);
  }

  try {
    const rows = readCsvFile(filePath);
    const parsedRows = rows.flatMap((row, index) => {
      try {
        return [parseBrandRow(row, index + FIRST_DATA_ROW)];
      } catch (error) {
        if (error instanceof MalformedRecordError) {
          functions.logger.warn(`[catalog] Skipping brand: ${error.message}`);
          return [];
        }
        throw error;
      }
    });
    const table = new BrandTable(parsedRows);
    functions.logger.info(`[catalog] Loaded ${table.size} brand entries from ${filePath}`);
    return table;
  } catch (error) {
    functions.logger.error('[catalog] Error loading brands.', error);
    return new BrandTable([]);
  }
}

export function loadMedicineData(options: { dataDir: string }): MedicineDataSet {
  return {
    catalog: loadMedicineCatalog(path.join(options.dataDir, MEDICINES_FILE)),
    interactions: loadInteractionTable(path.join(options.dataDir, INTERACTIONS_FILE)),
    brands: loadBrandTable(path.join(options.dataDir, BRANDS_FILE)),
  };
}
