/**
 * Output Sink Type Definitions
 */

import type { SinkKind } from '../config/settings';

/**
 * What every sink receives for one answer
 */
export interface SinkPayload {
  ocrText: string;
  answer: string;
  provider: string;
  model: string;
  promptName: string;
  /** ISO-8601 time the answer was obtained */
  timestamp: string;
}

export type SinkDelivery = { delivered: true } | { delivered: false; detail: string };

export interface Sink {
  readonly name: SinkKind;
  /** False when the sink lacks its endpoint or credentials; it is then skipped */
  isConfigured(): boolean;
  /** One attempt, no retry */
  deliver(payload: SinkPayload): Promise<SinkDelivery>;
}

export interface SinkOutcome {
  sinkName: string;
  success: boolean;
  errorDetail?: string;
}
