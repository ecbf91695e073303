import { mkdtemp, readdir, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AnswerFileSink, formatAnswerFile, resultFileStem } from './answer-file';
import type { SinkPayload } from './types';

const payload: SinkPayload = {
  ocrText: 'What is 2+2? A)3 B)4 C)5',
  answer: 'B',
  provider: 'openai',
  model: 'gpt-4o-mini',
  promptName: 'QCM',
  timestamp: '2026-10-19T08:30:00.000Z',
};

describe('resultFileStem', () => {
  it('formats local date and time', () => {
    expect(resultFileStem(new Date(2026, 0, 5, 7, 8, 9))).toBe('result_20260105_070809');
  });
});

describe('AnswerFileSink', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'answers-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the header, OCR text and answer', async () => {
    const logDir = join(dir, 'logs');
    expect(await new AnswerFileSink(logDir).deliver(payload)).toEqual({ delivered: true });

    const files = await readdir(logDir);
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(/^result_\d{8}_\d{6}\.txt$/);
    expect(await readFile(join(logDir, files[0]), 'utf8')).toBe(
      '=== 2026-10-19T08:30:00.000Z | openai | gpt-4o-mini | QCM ===\n' +
        '--- OCR ---\nWhat is 2+2? A)3 B)4 C)5\n--- ANSWER ---\nB\n'
    );
    expect(formatAnswerFile(payload)).toBe(await readFile(join(logDir, files[0]), 'utf8'));
  });

  it('does not overwrite an answer from the same second', async () => {
    const sink = new AnswerFileSink(dir);
    await sink.deliver(payload);
    await sink.deliver({ ...payload, answer: 'C' });

    const files = (await readdir(dir)).sort();
    expect(files).toHaveLength(2);
    expect(files[1]).toBe(files[0].replace('.txt', '_2.txt'));
  });
});
