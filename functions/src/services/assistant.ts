/**
 * Assistant Service
 *
 * Optional free-form chat on top of the medicine lookup. Talks to an
 * OpenAI-compatible chat completions API (OpenAI or Groq). When the provider
 * has no key, or the call fails or times out, the reply comes from a fixed
 * keyword table and is tagged `rule_based`.
 */

import axios from 'axios';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import { describeExternalError } from '../utils/externalApi';

// =============================================================================
// Types
// =============================================================================

export type LLMProvider = 'openai' | 'groq';

export type AssistantReplySource = 'llm' | 'rule_based';

export interface AssistantReply {
    text: string;
    source: AssistantReplySource;
    provider?: LLMProvider;
}

export interface GenerateResponseOptions {
    systemPrompt?: string;
    provider?: LLMProvider;
}

export interface AssistantServiceOptions {
    openAIApiKey: string;
    groqApiKey: string;
    timeoutMs: number;
}

type ChatMessage = { role: 'system' | 'user'; content: string };

const PROVIDERS: Record<LLMProvider, { url: string; model: string; maxTokens: number }> = {
    openai: {
        url: 'https://api.openai.com/v1/chat/completions',
        model: 'gpt-3.5-turbo',
        maxTokens: 500,
    },
    groq: {
        url: 'https://api.groq.com/openai/v1/chat/completions',
        model: 'llama3-70b-8192',
        maxTokens: 1000,
    },
};

const chatCompletionSchema = z.object({
    choices: z
        .array(z.object({ message: z.object({ content: z.string() }) }))
        .min(1),
});

// =============================================================================
// Rule-based fallback
// =============================================================================

// Plain substring containment, first match wins: "hi" also matches inside "this".
const RULE_BASED_REPLIES: ReadonlyArray<{ keywords: readonly string[]; reply: string }> = [
    {
        keywords: ['hello', 'hi', 'hey'],
        reply: "Hello! I'm MedVoice. I can help you with medicine information, reminders, and interaction checks.",
    },
    {
        keywords: ['thank'],
        reply: "You're welcome! Let me know if you need any more help with medicines.",
    },
    {
        keywords: ['medicine', 'drug', 'pill'],
        reply: 'I can help you find information about medicines. Please tell me the name of the medicine you are interested in.',
    },
    {
        keywords: ['remind'],
        reply: "I can help you set reminders for taking medicines. Please tell me the time and what you'd like to be reminded about.",
    },
];

export function generateRuleBasedResponse(prompt: string): string {
    const lower = prompt.toLowerCase();
    const rule = RULE_BASED_REPLIES.find(({ keywords }) => keywords.some((keyword) => lower.includes(keyword)));
    if (rule) {
        return rule.reply;
    }
    return `I understand you're asking: '${prompt}'. I'm your medical assistant. I can help with medicine information, reminders, and checking interactions between medicines.`;
}

// =============================================================================
// Service
// =============================================================================

export class AssistantService {
    constructor(private readonly options: AssistantServiceOptions) {}

    private apiKeyFor(provider: LLMProvider): string {
        return provider === 'openai' ? this.options.openAIApiKey : this.options.groqApiKey;
    }

    async generateResponse(
        prompt: string,
        options: GenerateResponseOptions = {},
    ): Promise<AssistantReply> {
        const provider = options.provider ?? 'groq';
        const apiKey = this.apiKeyFor(provider);

        if (!apiKey) {
            return { text: generateRuleBasedResponse(prompt), source: 'rule_based' };
        }

        const text = await this.queryProvider(provider, apiKey, prompt, options.systemPrompt);
        if (!text) {
            return { text: generateRuleBasedResponse(prompt), source: 'rule_based' };
        }
        return { text, source: 'llm', provider };
    }

    private async queryProvider(
        provider: LLMProvider,
        apiKey: string,
        prompt: string,
        systemPrompt?: string,
    ): Promise<string | null> {
        const { url, model, maxTokens } = PROVIDERS[provider];
        const messages: ChatMessage[] = [];
        if (systemPrompt) {
            messages.push({ role: 'system', content: systemPrompt });
        }
        messages.push({ role: 'user', content: prompt });

        try {
            const response = await axios.post<unknown>(
                url,
                {
                    model,
                    messages,
                    temperature: 0.7,
                    max_tokens: maxTokens,
                },
                {
                    headers: {
                        Authorization: `Bearer ${apiKey}`,
                        'Content-Type': 'application/json',
                    },
                    timeout: this.options.timeoutMs,
                },
            );

            const parsed = chatCompletionSchema.safeParse(response.data);
            if (!parsed.success) {
                functions.logger.warn(`[assistant] Unexpected ${provider} response shape`);
                return null;
            }
            return parsed.data.choices[0].message.content.trim() || null;
        } catch (error) {
            functions.logger.error(
                `[assistant] ${provider} chat completion failed, using rule-based reply`,
                describeExternalError(error),
            );
            return null;
        }
    }
}
