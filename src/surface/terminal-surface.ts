/**
 * Terminal Surface
 *
 * Mirrors the session display on a terminal. While hidden the screen is
 * cleared and nothing is printed, log lines included; showing again prints the
 * held log lines and then the current content.
 */

import { holdLogs, releaseLogs } from '../logging/logger';
import type { DisplayContent, SessionState } from '../session/session-machine';
import { sessionLabel } from '../session/session-machine';
import type { SessionController } from '../session/session-store';

const CLEAR_SCREEN = '\x1b[2J\x1b[H';

export type Write = (text: string) => void;

export function renderDisplay(display: DisplayContent): string[] {
  const lines: string[] = [];
  if (display.status) lines.push(`Status: ${display.status}`);
  if (display.ocrText) lines.push('--- OCR ---', display.ocrText);
  if (display.answer) lines.push('--- Answer ---', display.answer);
  return lines;
}

export class TerminalSurface {
  private unsubscribe: (() => void) | null = null;

  constructor(
    private readonly session: SessionController,
    private readonly write: Write = (text) => {
      process.stdout.write(text);
    }
  ) {}

  start(): void {
    if (this.unsubscribe) return;
    const state = this.session.getState();
    if (state.visibility === 'visible') this.printAll(state.display);
    else holdLogs();
    this.unsubscribe = this.session.subscribe((state, previous) => this.onChange(state, previous));
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    releaseLogs();
  }

  private onChange(state: SessionState, previous: SessionState): void {
    if (state.visibility === 'hidden') {
      if (previous.visibility === 'visible') {
        this.write(CLEAR_SCREEN);
        holdLogs();
      }
      return;
    }

    if (previous.visibility === 'hidden') {
      releaseLogs();
      this.write(`[${sessionLabel(state)}]\n`);
      this.printAll(state.display);
      return;
    }

    const { display } = state;
    const before = previous.display;
    if (display.status && display.status !== before.status) this.write(`Status: ${display.status}\n`);
    if (display.ocrText && display.ocrText !== before.ocrText) this.write(`--- OCR ---\n${display.ocrText}\n`);
    if (display.answer && display.answer !== before.answer) this.write(`--- Answer ---\n${display.answer}\n`);
  }

  private printAll(display: DisplayContent): void {
    for (const line of renderDisplay(display)) {
      this.write(`${line}\n`);
    }
  }
}
