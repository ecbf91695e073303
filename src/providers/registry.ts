/**
 * AI Provider Registry
 *
 * Contains configurations for all known providers, organized by tier: paid,
 * free, and local.
 */

import type { ProviderConfig, ProviderTier } from './types';

export const PROVIDER_CONFIGS: ProviderConfig[] = [
  // ═══════════════════════════════════════════════════════════════════════════
  // PAID TIER - user brings own API key
  // ═══════════════════════════════════════════════════════════════════════════
  {
    id: 'openai',
    name: 'OpenAI',
    baseURL: 'https://api.openai.com/v1',
    defaultModel: 'gpt-4o-mini',
    tier: 'paid',
    requiresApiKey: true,
    models: ['gpt-4.1-mini', 'gpt-4o', 'gpt-4o-mini', 'o3-mini'],
    apiFormat: 'openai',
    description: 'Strong general reasoning',
  },
  {
    id: 'anthropic',
    name: 'Anthropic (Claude)',
    baseURL: 'https://api.anthropic.com/v1',
    defaultModel: 'claude-3-5-sonnet-20240620',
    tier: 'paid',
    requiresApiKey: true,
    models: ['claude-3-5-sonnet-20240620', 'claude-3-opus-20240229', 'claude-3-haiku-20240307'],
    apiFormat: 'anthropic',
    description: 'Careful instruction following',
    customHeaders: {
      'anthropic-version': '2023-06-01',
    },
  },
  {
    id: 'gemini',
    name: 'Google (Gemini)',
    baseURL: 'https://generativelanguage.googleapis.com/v1beta/openai',
    defaultModel: 'gemini-1.5-flash',
    tier: 'paid',
    requiresApiKey: true,
    models: ['gemini-1.5-flash', 'gemini-1.5-pro', 'gemini-2.0-flash'],
    apiFormat: 'openai',
    description: 'Long context, generous quota',
  },
  {
    id: 'mistral',
    name: 'Mistral',
    baseURL: 'https://api.mistral.ai/v1',
    defaultModel: 'mistral-small-latest',
    tier: 'paid',
    requiresApiKey: true,
    models: ['mistral-large-latest', 'mistral-medium-latest', 'mistral-small-latest'],
    apiFormat: 'openai',
    description: 'European option, fast',
  },

  // ═══════════════════════════════════════════════════════════════════════════
  // FREE TIER - free sign-up, rate-limited
  // ═══════════════════════════════════════════════════════════════════════════
  {
    id: 'groq',
    name: 'Groq',
    baseURL: 'https://api.groq.com/openai/v1',
    defaultModel: 'llama-3.3-70b-versatile',
    tier: 'free',
    requiresApiKey: true,
    models: ['llama-3.3-70b-versatile', 'llama-3.1-8b-instant', 'gemma2-9b-it'],
    apiFormat: 'openai',
    description: 'Fast inference, generous free tier',
  },
  {
    id: 'openrouter',
    name: 'OpenRouter',
    baseURL: 'https://openrouter.ai/api/v1',
    defaultModel: 'meta-llama/llama-3.3-70b-instruct:free',
    tier: 'free',
    requiresApiKey: true,
    models: [
      'meta-llama/llama-3.3-70b-instruct:free',
      'google/gemma-3-27b-it:free',
      'qwen/qwen-2.5-72b-instruct:free',
    ],
    apiFormat: 'openai',
    description: 'Many free models behind one key',
    customHeaders: {
      'X-Title': 'snapanswer',
    },
  },

  // ═══════════════════════════════════════════════════════════════════════════
  // LOCAL TIER - fully offline, no API key
  // ═══════════════════════════════════════════════════════════════════════════
  {
    id: 'ollama',
    name: 'Ollama (Local)',
    baseURL: 'http://localhost:11434/v1',
    defaultModel: 'llama3.1:8b',
    tier: 'local',
    requiresApiKey: false,
    models: ['llama3.1:8b', 'mistral:7b', 'qwen2.5:7b'],
    apiFormat: 'openai',
    description: 'Fully local, no internet needed',
  },
];

/**
 * Get a provider config by ID
 */
export function getProviderById(id: string): ProviderConfig | undefined {
  return PROVIDER_CONFIGS.find((p) => p.id === id);
}

export function getProvidersByTier(tier: ProviderTier): ProviderConfig[] {
  return PROVIDER_CONFIGS.filter((p) => p.tier === tier);
}

/**
 * Models offered for a provider, empty for unknown providers
 */
export function listModels(providerId: string): string[] {
  return getProviderById(providerId)?.models ?? [];
}
