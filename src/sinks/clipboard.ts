import clipboard from 'clipboardy';
import { describeError } from '../logging/logger';
import type { Sink, SinkDelivery, SinkPayload } from './types';

export type ClipboardWriter = (text: string) => Promise<void>;

/**
 * Copies the answer to the system clipboard
 */
export class ClipboardSink implements Sink {
  readonly name = 'clipboard' as const;

  constructor(private readonly write: ClipboardWriter = (text) => clipboard.write(text)) {}

  isConfigured(): boolean {
    return true;
  }

  async deliver(payload: SinkPayload): Promise<SinkDelivery> {
    try {
      await this.write(payload.answer);
      return { delivered: true };
    } catch (error) {
      return { delivered: false, detail: `Clipboard write failed: ${describeError(error)}` };
    }
  }
}
