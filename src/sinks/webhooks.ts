/**
 * Webhook Sinks
 *
 * Discord, Telegram and a generic JSON webhook. Each delivery is one POST with
 * a timeout; a non-2xx status is reported with the start of the response body.
 */

import { describeError } from '../logging/logger';
import type { Sink, SinkDelivery, SinkPayload } from './types';

const DISCORD_MAX_CONTENT = 2000;
const TELEGRAM_MAX_TEXT = 4096;
const TELEGRAM_API = 'https://api.telegram.org';

function truncate(text: string, max: number): string {
  return text.length <= max ? text : `${text.slice(0, max - 1)}…`;
}

/**
 * POST a JSON body once. Never throws.
 */
export async function postJson(url: string, body: unknown, timeoutMs: number): Promise<SinkDelivery> {
  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  try {
    const response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal: controller.signal,
    });
    if (!response.ok) {
      const text = await response.text();
      return { delivered: false, detail: `HTTP ${response.status}: ${text.slice(0, 200)}` };
    }
    return { delivered: true };
  } catch (error) {
    if (timedOut) {
      return { delivered: false, detail: `Timed out after ${timeoutMs}ms` };
    }
    return { delivered: false, detail: describeError(error) };
  } finally {
    clearTimeout(timeoutId);
  }
}

interface MessageLayout {
  header: string;
  question: (ocrText: string) => string;
  answerPrefix: string;
}

/**
 * Header, OCR text, then answer, within `max` characters. The answer keeps
 * priority: the OCR text is cut first and left out when no room remains.
 */
function fitMessage(payload: SinkPayload, max: number, layout: MessageLayout): string {
  const fixed = layout.header.length + layout.answerPrefix.length;
  const room = max - fixed - payload.answer.length - layout.question('').length;
  const question = payload.ocrText && room > 0 ? layout.question(truncate(payload.ocrText, room)) : '';
  return layout.header + question + layout.answerPrefix + truncate(payload.answer, max - fixed - question.length);
}

export function formatDiscordContent(payload: SinkPayload): string {
  return fitMessage(payload, DISCORD_MAX_CONTENT, {
    header: `**AI Answer (${payload.provider} / ${payload.model} / ${payload.promptName})** ${payload.timestamp}\n`,
    question: (text) => `**Question:**\n\`\`\`\n${text}\n\`\`\`\n`,
    answerPrefix: '**Answer:**\n>>> ',
  });
}

export function formatTelegramText(payload: SinkPayload): string {
  return fitMessage(payload, TELEGRAM_MAX_TEXT, {
    header: `AI Answer (${payload.provider} / ${payload.model} / ${payload.promptName}) ${payload.timestamp}\n\n`,
    question: (text) => `Question:\n${text}\n\n`,
    answerPrefix: 'Answer:\n',
  });
}

export class DiscordSink implements Sink {
  readonly name = 'discord' as const;

  constructor(
    private readonly webhookUrl: string | undefined,
    private readonly timeoutMs: number
  ) {}

  isConfigured(): boolean {
    return Boolean(this.webhookUrl);
  }

  async deliver(payload: SinkPayload): Promise<SinkDelivery> {
    if (!this.webhookUrl) return { delivered: false, detail: 'not configured' };
    return postJson(this.webhookUrl, { content: formatDiscordContent(payload) }, this.timeoutMs);
  }
}

export class TelegramSink implements Sink {
  readonly name = 'telegram' as const;

  constructor(
    private readonly botToken: string | undefined,
    private readonly chatId: string | undefined,
    private readonly timeoutMs: number
  ) {}

  isConfigured(): boolean {
    return Boolean(this.botToken && this.chatId);
  }

  async deliver(payload: SinkPayload): Promise<SinkDelivery> {
    if (!this.botToken || !this.chatId) return { delivered: false, detail: 'not configured' };
    return postJson(
      `${TELEGRAM_API}/bot${this.botToken}/sendMessage`,
      { chat_id: this.chatId, text: formatTelegramText(payload) },
      this.timeoutMs
    );
  }
}

/**
 * Generic webhook: posts the payload itself
 */
export class JsonWebhookSink implements Sink {
  readonly name = 'webhook' as const;

  constructor(
    private readonly url: string | undefined,
    private readonly timeoutMs: number
  ) {}

  isConfigured(): boolean {
    return Boolean(this.url);
  }

  async deliver(payload: SinkPayload): Promise<SinkDelivery> {
    if (!this.url) return { delivered: false, detail: 'not configured' };
    return postJson(this.url, payload, this.timeoutMs);
  }
}
