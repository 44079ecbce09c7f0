/**
 * Medicine Type Definitions
 *
 * Records held by the in-memory read model: medicines, pairwise
 * interactions, and brand listings per generic name.
 */

// =============================================================================
// Medicine
// =============================================================================

export interface MedicineRecord {
    name: string;
    genericName: string;
    class: string;
    uses: readonly string[];
    dosageAdults: string;
    dosageChildren: string;
    sideEffects: readonly string[];
    contraindications: readonly string[];
    interactions: readonly string[];
    pregnancy: string;
    storage: string;
    mechanism: string;
    onset: string;
    duration: string;
    brandNames: readonly string[];
    prescription: string;
}

// =============================================================================
// Interactions & Brands
// =============================================================================

export interface InteractionRecord {
    severity: string;
    effect: string;
    recommendation: string;
    mechanism: string;
}

export interface BrandEntry {
    brandName: string;
    company: string;
    form: string;
    strength: string;
    priceRange: string;
}

export type FieldCategory = 'uses' | 'prescription' | 'dosage';
