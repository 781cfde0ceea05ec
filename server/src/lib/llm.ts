import { AnthropicProvider, OpenAICompatibleProvider } from './llm-provider.js';
import type { LLMProvider } from './llm-provider.js';
import { ANTHROPIC_MODEL } from './anthropic.js';

// ─── Model constants (OpenAI-compatible backend, Groq by default) ────

/** Writes the employer reply; may call tools. */
export const MODEL_RESPONDER = process.env.MODEL_RESPONDER ?? 'llama-3.3-70b-versatile';

/** Scores the reply as JSON. */
export const MODEL_EVALUATOR = process.env.MODEL_EVALUATOR ?? 'llama-3.3-70b-versatile';

export const MAX_TOKENS = parseInt(process.env.MAX_TOKENS ?? '2000', 10);

const DEFAULT_BASE_URL = 'https://api.groq.com/openai/v1';

export type ModelRole = 'responder' | 'evaluator';

// ─── Provider factory ────────────────────────────────────────────────

function resolveProviderName(): 'openai-compatible' | 'anthropic' {
  const configured = process.env.LLM_PROVIDER?.toLowerCase();
  if (configured === 'openai-compatible' || configured === 'anthropic') return configured;
  return process.env.LLM_API_KEY ? 'openai-compatible' : 'anthropic';
}

function createProvider(): LLMProvider {
  if (resolveProviderName() === 'openai-compatible') {
    const apiKey = process.env.LLM_API_KEY;
    if (!apiKey) {
      throw new Error('LLM_API_KEY environment variable is required when LLM_PROVIDER=openai-compatible');
    }
    return new OpenAICompatibleProvider({
      apiKey,
      baseUrl: process.env.LLM_BASE_URL ?? DEFAULT_BASE_URL,
    });
  }

  // Anthropic lazily initializes its client on first use.
  return new AnthropicProvider();
}

/** Active LLM provider instance based on LLM_PROVIDER / LLM_API_KEY */
export const llm: LLMProvider = createProvider();

/**
 * Model for a service role. Anthropic has a single configured model; the
 * OpenAI-compatible backend can split responder and evaluator.
 */
export function getModelFor(role: ModelRole): string {
  if (llm.name === 'anthropic') return ANTHROPIC_MODEL;
  return role === 'responder' ? MODEL_RESPONDER : MODEL_EVALUATOR;
}
