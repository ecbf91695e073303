/**
 * Run Journal
 *
 * Append-only audit trail: one JSON line per completed or failed run in
 * `<logDir>/runs.jsonl`. Records are never rewritten.
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { PipelineStage } from '../errors';
import type { AiResult } from '../providers/types';
import type { SinkOutcome } from '../sinks/types';
import type { CaptureRegion } from '../vision/types';

export const RUN_JOURNAL_FILE = 'runs.jsonl';

export interface RunRecord {
  runId: number;
  /** ISO-8601 time the run ended */
  timestamp: string;
  status: 'completed' | 'failed';
  region: CaptureRegion | null;
  /** Null when the run failed before OCR produced text */
  ocrText: string | null;
  aiResult: AiResult | null;
  sinkOutcomes: SinkOutcome[];
  provider: string;
  model: string;
  promptName: string;
  failedStage?: PipelineStage;
  error?: string;
  /** Panic arrived before the answer was published; it was neither shown nor dispatched */
  discarded: boolean;
}

export interface RunJournal {
  append(record: RunRecord): Promise<void>;
}

export class FileRunJournal implements RunJournal {
  readonly filePath: string;

  constructor(private readonly logDir: string) {
    this.filePath = join(logDir, RUN_JOURNAL_FILE);
  }

  async append(record: RunRecord): Promise<void> {
    await mkdir(this.logDir, { recursive: true });
    await appendFile(this.filePath, `${JSON.stringify(record)}\n`, 'utf8');
  }
}
