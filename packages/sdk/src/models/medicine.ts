/**
 * Medicine Models
 * Response shapes served by the MedVoice API
 */

export interface Medicine {
  name: string;
  genericName: string;
  class: string;
  uses: string[];
  dosageAdults: string;
  dosageChildren: string;
  sideEffects: string[];
  contraindications: string[];
  interactions: string[];
  pregnancy: string;
  storage: string;
  mechanism: string;
  onset: string;
  duration: string;
  brandNames: string[];
  prescription: string;
}

export interface Interaction {
  severity: string;
  effect: string;
  recommendation: string;
  mechanism: string;
}

export interface Brand {
  brandName: string;
  company: string;
  form: string;
  strength: string;
  priceRange: string;
}

export type LLMProvider = 'openai' | 'groq';

export interface ChatReply {
  reply: string;
  source: 'llm' | 'rule_based';
  provider: LLMProvider | null;
}

export interface TranscriptionResult {
  transcript: string | null;
  reply: string | null;
  message?: string;
}

export interface HealthStatus {
  status: string;
  medicines: number;
  timestamp: string;
}
