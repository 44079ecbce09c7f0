/**
 * Built-in fallback data
 *
 * Served when the CSV sources are missing or fail to load, so the
 * lookup endpoints keep answering with at least one medicine.
 */

import type { InteractionRecord, MedicineRecord } from '../types/medicine';

export const SAMPLE_MEDICINES: MedicineRecord[] = [
    {
        name: 'Paracetamol',
        genericName: 'Acetaminophen',
        class: 'Analgesic/Antipyretic',
        uses: ['Fever', 'Mild to moderate pain'],
        dosageAdults: '500-1000mg every 4-6 hours max 4000mg/day',
        dosageChildren: '10-15mg/kg every 4-6 hours',
        sideEffects: ['Nausea', 'Rash', 'Liver damage (overdose)'],
        contraindications: ['Severe liver disease'],
        interactions: ['Alcohol', 'Warfarin'],
        pregnancy: 'Category B - generally safe',
        storage: 'Room temperature, away from moisture',
        mechanism: 'Inhibits prostaglandin synthesis',
        onset: '30 minutes',
        duration: '4-6 hours',
        brandNames: ['Crocin', 'Calpol', 'Tylenol'],
        prescription: 'Available over the counter; no prescription needed',
    },
];

export const SAMPLE_INTERACTIONS: Array<{
    medicine1: string;
    medicine2: string;
    interaction: InteractionRecord;
}> = [
    {
        medicine1: 'paracetamol',
        medicine2: 'alcohol',
        interaction: {
            severity: 'High',
            effect: 'Increased risk of liver damage',
            recommendation: 'Avoid or limit alcohol consumption',
            mechanism: 'Induces CYP2E1 leading to toxic metabolite',
        },
    },
];
