/**
 * Tesseract OCR Engine
 *
 * Runs the Tesseract CLI with the frame piped on stdin and reads the text from
 * stdout. The binary is looked up on PATH unless a full path is configured.
 */

import { spawn } from 'node:child_process';
import type { EventEmitter } from 'node:events';
import type { Readable, Writable } from 'node:stream';
import { OcrError } from '../errors';
import { createLogger } from '../logging/logger';
import type { CapturedFrame } from '../vision/types';
import { ocrOptionsSchema, type OcrEngine, type OcrOptions, type OcrResult } from './types';

const log = createLogger('ocr');

/** The parts of a child process the engine talks to */
export interface OcrProcess extends EventEmitter {
  stdin: Writable | null;
  stdout: Readable | null;
  stderr: Readable | null;
}

export type SpawnOcrProcess = (command: string, args: string[]) => OcrProcess;

const spawnTesseract: SpawnOcrProcess = (command, args) =>
  spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'], windowsHide: true });

export function buildTesseractArgs(options: OcrOptions): string[] {
  return [
    'stdin',
    'stdout',
    '-l',
    options.language,
    '--oem',
    String(options.engineMode),
    '--psm',
    String(options.segmentationMode),
  ];
}

export class TesseractEngine implements OcrEngine {
  constructor(
    private readonly command: string = 'tesseract',
    private readonly spawnProcess: SpawnOcrProcess = spawnTesseract
  ) {}

  async recognize(frame: CapturedFrame, options: OcrOptions): Promise<OcrResult> {
    const parsed = ocrOptionsSchema.safeParse(options);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new OcrError('invalid_options', `Rejected OCR options: ${detail}`);
    }

    const raw = await this.run(buildTesseractArgs(parsed.data), frame.image);
    const text = raw.trim();
    log.debug('Recognized text', { chars: text.length });

    return {
      text,
      sourceFrameRef: { region: frame.region, capturedAt: frame.capturedAt },
    };
  }

  private run(args: string[], image: Buffer): Promise<string> {
    return new Promise((resolve, reject) => {
      let settled = false;
      const settle = (outcome: () => void) => {
        if (settled) return;
        settled = true;
        outcome();
      };

      let child: OcrProcess;
      try {
        child = this.spawnProcess(this.command, args);
      } catch (error) {
        reject(new OcrError('engine_failed', `Could not start ${this.command}`, { cause: error }));
        return;
      }

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', (error: NodeJS.ErrnoException) => {
        settle(() =>
          reject(
            error.code === 'ENOENT'
              ? new OcrError(
                  'unavailable',
                  `Tesseract not found: "${this.command}" is not installed or not on PATH`,
                  { cause: error }
                )
              : new OcrError('engine_failed', `Tesseract failed: ${error.message}`, { cause: error })
          )
        );
      });

      child.on('close', (code: number | null) => {
        const errText = Buffer.concat(stderr).toString('utf8').trim();
        if (code === 0) {
          settle(() => resolve(Buffer.concat(stdout).toString('utf8')));
          return;
        }
        // Tesseract exits non-zero when the requested traineddata is missing
        const reason = /failed loading language|couldn't load any languages/i.test(errText)
          ? 'invalid_options'
          : 'engine_failed';
        settle(() =>
          reject(new OcrError(reason, `Tesseract exited with code ${code}: ${errText.slice(0, 200)}`))
        );
      });

      // The process may exit before reading all of stdin; the close handler reports that
      child.stdin?.on('error', (error: Error) => log.debug('stdin closed early', { error: error.message }));
      child.stdin?.end(image);
    });
  }
}
