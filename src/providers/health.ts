/**
 * Provider Health Checking
 *
 * A single short completion tells whether a provider answers with the
 * configured key and how fast.
 */

import type { AiRouter } from './router';
import type { ProviderHealth } from './types';

const HEALTH_CHECK_TIMEOUT_MS = 10000;
const DEGRADED_LATENCY_MS = 5000;

/**
 * Simple test prompt to verify provider connectivity
 */
const TEST_PROMPT = 'Say "OK" and nothing else.';

/**
 * Check health of a specific provider
 */
export async function checkProviderHealth(
  router: AiRouter,
  providerId: string,
  model: string,
  now: () => number = Date.now
): Promise<ProviderHealth> {
  const startTime = now();

  const result = await router.complete(providerId, model, TEST_PROMPT, {
    maxTokens: 10,
    timeoutMs: HEALTH_CHECK_TIMEOUT_MS,
  });

  const latencyMs = now() - startTime;

  if (result.success) {
    return {
      providerId,
      status: latencyMs > DEGRADED_LATENCY_MS ? 'degraded' : 'healthy',
      latencyMs,
      lastChecked: now(),
    };
  }

  return {
    providerId,
    status: result.errorKind === 'RateLimited' ? 'degraded' : 'unhealthy',
    latencyMs,
    lastChecked: now(),
    error: result.providerMessage,
  };
}

/**
 * Validate an API key by making a test request
 */
export async function validateApiKey(
  router: AiRouter,
  providerId: string,
  model: string
): Promise<{ valid: boolean; error?: string }> {
  const result = await router.complete(providerId, model, TEST_PROMPT, {
    maxTokens: 10,
    timeoutMs: HEALTH_CHECK_TIMEOUT_MS,
  });

  if (result.success) {
    return { valid: true };
  }

  if (result.errorKind === 'AuthError') {
    return { valid: false, error: 'Invalid API key' };
  }

  // Rate limit doesn't mean the key is invalid
  if (result.errorKind === 'RateLimited') {
    return { valid: true };
  }

  return { valid: false, error: result.providerMessage };
}
