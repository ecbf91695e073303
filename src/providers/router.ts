/**
 * AI Router
 *
 * Holds one AiProvider per provider id and forwards each completion to the
 * selected one. The lookup is the only place provider identity matters.
 * No retry happens here: a failed call is reported and a new capture is the
 * retry.
 */

import { createLogger, describeError } from '../logging/logger';
import { createProvider } from './client';
import { PROVIDER_CONFIGS } from './registry';
import type { AiProvider, AiResult, RequestConfig } from './types';

const log = createLogger('ai');

/**
 * Build one provider instance per registry entry, with its API key if any
 */
export function createProviderMap(
  apiKeys: Readonly<Record<string, string | undefined>>
): Map<string, AiProvider> {
  return new Map(
    PROVIDER_CONFIGS.map((config) => [config.id, createProvider(config, apiKeys[config.id])] as const)
  );
}

export class AiRouter {
  constructor(private readonly providers: ReadonlyMap<string, AiProvider>) {}

  has(providerId: string): boolean {
    return this.providers.has(providerId);
  }

  async complete(
    provider: string,
    model: string,
    composedPrompt: string,
    config: RequestConfig
  ): Promise<AiResult> {
    const impl = this.providers.get(provider);
    if (!impl) {
      return {
        success: false,
        errorKind: 'ProviderError',
        providerMessage: `Unknown provider "${provider}"`,
        providerId: provider,
      };
    }

    const startedAt = Date.now();
    let result: AiResult;
    try {
      result = await impl.complete({ provider, model, composedPrompt, requestConfig: config });
    } catch (error) {
      result = {
        success: false,
        errorKind: 'ProviderError',
        providerMessage: describeError(error),
        providerId: provider,
      };
    }

    const latencyMs = Date.now() - startedAt;
    if (result.success) {
      log.info('Answer received', { provider, model, latencyMs, chars: result.answerText.length });
    } else {
      log.warn(`Provider call failed (${result.errorKind}): ${result.providerMessage}`, {
        provider,
        model,
        latencyMs,
      });
    }
    return result;
  }
}
