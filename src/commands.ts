/**
 * One-shot CLI commands. Each returns the process exit code.
 */

import { createLogger } from './logging/logger';
import type { PromptStore } from './prompts';
import { checkProviderHealth, getProvidersByTier, listModels, validateApiKey, type AiRouter } from './providers';
import type { ProviderTier } from './providers';
import type { SinkDispatcher } from './sinks';
import type { PreferencesStoreApi } from './store/preferences-store';

const log = createLogger('cli');

const TIERS: readonly ProviderTier[] = ['paid', 'free', 'local'];

export type Print = (line: string) => void;

const printLine: Print = (line) => console.log(line);

export async function checkProvider(router: AiRouter, providerId: string, model: string): Promise<number> {
  const health = await checkProviderHealth(router, providerId, model);
  if (health.status === 'unhealthy') {
    log.error(`${providerId} is unreachable: ${health.error ?? 'unknown error'}`);
    return 1;
  }
  log.info(`${providerId} is ${health.status} (${health.latencyMs ?? 0}ms)`);
  return 0;
}

export async function validateKey(router: AiRouter, providerId: string, model: string): Promise<number> {
  const { valid, error } = await validateApiKey(router, providerId, model);
  if (!valid) {
    log.error(`API key for ${providerId} rejected: ${error ?? 'unknown error'}`);
    return 1;
  }
  log.info(`API key for ${providerId} accepted`);
  return 0;
}

export async function testSink(dispatcher: SinkDispatcher, name: string): Promise<number> {
  const outcome = await dispatcher.sendTest(name);
  if (!outcome.success) {
    log.error(`Sink ${name} failed: ${outcome.errorDetail ?? 'unknown error'}`);
    return 1;
  }
  log.info(`Sink ${name} OK`);
  return 0;
}

export function listProviders(print: Print = printLine): number {
  for (const tier of TIERS) {
    for (const provider of getProvidersByTier(tier)) {
      print(`${provider.id} (${tier}): ${listModels(provider.id).join(', ')}`);
    }
  }
  return 0;
}

export async function listPrompts(store: PromptStore, print: Print = printLine): Promise<number> {
  for (const prompt of await store.list()) {
    print(prompt.name);
  }
  return 0;
}

export async function newPrompt(store: PromptStore): Promise<number> {
  const prompt = await store.createUntitled();
  log.info(`Created "${prompt.name}"`);
  return 0;
}

export async function savePrompt(store: PromptStore, name: string, body: string | undefined): Promise<number> {
  if (!body?.trim()) {
    log.error('--save-prompt needs --prompt-body with the template text');
    return 1;
  }
  await store.save(name, body);
  return 0;
}

export async function deletePrompt(store: PromptStore, name: string): Promise<number> {
  if (!(await store.remove(name))) {
    log.error(`Prompt "${name}" does not exist`);
    return 1;
  }
  return 0;
}

export interface PreferenceFlags {
  provider?: string;
  model?: string;
  prompt?: string;
  temperature?: string;
  regionMode?: string;
}

/**
 * Apply preference changes given on the command line. Invalid values are
 * reported and skipped.
 */
export function applyPreferenceFlags(preferences: PreferencesStoreApi, flags: PreferenceFlags): void {
  const state = preferences.getState();
  if (flags.provider) state.setProvider(flags.provider.toLowerCase(), flags.model);
  else if (flags.model) state.setModel(flags.model);
  if (flags.prompt !== undefined) state.setPromptName(flags.prompt || undefined);
  if (flags.temperature !== undefined) {
    const temperature = Number(flags.temperature);
    if (Number.isNaN(temperature)) log.warn(`Ignoring temperature "${flags.temperature}"`);
    else state.setTemperature(temperature);
  }
  const { regionMode } = flags;
  if (regionMode === 'manual' || regionMode === 'interactive') state.setRegionMode(regionMode);
  else if (regionMode !== undefined) log.warn(`Ignoring region mode "${regionMode}"`);
}
