/**
 * Sink Dispatcher
 *
 * Fans one answer out to the configured sinks in configuration order. Sinks
 * run one after another and each is isolated: a failure, or a throw, is
 * recorded as that sink's outcome and the next sink still runs.
 */

import type { Settings } from '../config/settings';
import { createLogger, describeError } from '../logging/logger';
import { AnswerFileSink } from './answer-file';
import { ClipboardSink, type ClipboardWriter } from './clipboard';
import type { Sink, SinkOutcome, SinkPayload } from './types';
import { DiscordSink, JsonWebhookSink, TelegramSink } from './webhooks';

const log = createLogger('sinks');

export const NOT_CONFIGURED = 'not configured';

export class SinkDispatcher {
  constructor(private readonly sinks: readonly Sink[]) {}

  async dispatch(payload: SinkPayload): Promise<SinkOutcome[]> {
    const outcomes: SinkOutcome[] = [];
    for (const sink of this.sinks) {
      outcomes.push(await this.deliverTo(sink, payload));
    }
    return outcomes;
  }

  /**
   * Send a test message through one sink
   */
  async sendTest(name: string, now: Date = new Date()): Promise<SinkOutcome> {
    const sink = this.sinks.find((candidate) => candidate.name === name);
    if (!sink) {
      return { sinkName: name, success: false, errorDetail: 'not enabled' };
    }
    return this.deliverTo(sink, {
      ocrText: '',
      answer: 'Test message ✅',
      provider: 'test',
      model: 'test',
      promptName: 'test',
      timestamp: now.toISOString(),
    });
  }

  private async deliverTo(sink: Sink, payload: SinkPayload): Promise<SinkOutcome> {
    if (!sink.isConfigured()) {
      log.debug(`Skipping ${sink.name}: ${NOT_CONFIGURED}`);
      return { sinkName: sink.name, success: false, errorDetail: NOT_CONFIGURED };
    }

    let outcome: SinkOutcome;
    try {
      const delivery = await sink.deliver(payload);
      outcome = delivery.delivered
        ? { sinkName: sink.name, success: true }
        : { sinkName: sink.name, success: false, errorDetail: delivery.detail };
    } catch (error) {
      outcome = { sinkName: sink.name, success: false, errorDetail: describeError(error) };
    }

    if (outcome.success) {
      log.info(`Delivered to ${sink.name}`);
    } else {
      log.warn(`${sink.name} failed: ${outcome.errorDetail}`);
    }
    return outcome;
  }
}

export interface SinkDependencies {
  writeClipboard?: ClipboardWriter;
}

/**
 * Build the sinks named in Settings, in their configured order
 */
export function createSinks(settings: Settings, deps: SinkDependencies = {}): Sink[] {
  const { sinks, files } = settings;
  return sinks.order.map((kind): Sink => {
    switch (kind) {
      case 'clipboard':
        return new ClipboardSink(deps.writeClipboard);
      case 'log':
        return new AnswerFileSink(files.logDir);
      case 'discord':
        return new DiscordSink(sinks.discordWebhook, sinks.timeoutMs);
      case 'telegram':
        return new TelegramSink(sinks.telegramBotToken, sinks.telegramChatId, sinks.timeoutMs);
      case 'webhook':
        return new JsonWebhookSink(sinks.webhookUrl, sinks.timeoutMs);
    }
  });
}
