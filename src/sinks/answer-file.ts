/**
 * Answer File Sink
 *
 * Writes each answer with its OCR text to `<logDir>/result_YYYYMMDD_HHMMSS.txt`.
 * A second answer within the same second gets a `_2`, `_3`, ... suffix.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { describeError } from '../logging/logger';
import type { Sink, SinkDelivery, SinkPayload } from './types';

const MAX_SUFFIX = 100;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function resultFileStem(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `result_${day}_${time}`;
}

export function formatAnswerFile(payload: SinkPayload): string {
  return [
    `=== ${payload.timestamp} | ${payload.provider} | ${payload.model} | ${payload.promptName} ===`,
    '--- OCR ---',
    payload.ocrText,
    '--- ANSWER ---',
    payload.answer,
    '',
  ].join('\n');
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

export class AnswerFileSink implements Sink {
  readonly name = 'log' as const;

  constructor(private readonly logDir: string) {}

  isConfigured(): boolean {
    return true;
  }

  async deliver(payload: SinkPayload): Promise<SinkDelivery> {
    try {
      await mkdir(this.logDir, { recursive: true });
      const stem = resultFileStem(new Date(payload.timestamp));
      const contents = formatAnswerFile(payload);

      for (let attempt = 1; attempt <= MAX_SUFFIX; attempt++) {
        const file = join(this.logDir, attempt === 1 ? `${stem}.txt` : `${stem}_${attempt}.txt`);
        try {
          await writeFile(file, contents, { encoding: 'utf8', flag: 'wx' });
          return { delivered: true };
        } catch (error) {
          if (!isAlreadyExists(error)) throw error;
        }
      }
      return { delivered: false, detail: `Too many answer files named ${stem}` };
    } catch (error) {
      return { delivered: false, detail: `Answer file write failed: ${describeError(error)}` };
    }
  }
}
