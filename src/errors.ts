/**
 * Pipeline stage errors.
 *
 * Each stage that can end a run throws a PipelineError subclass; the
 * orchestrator catches them and records `stage` as the failure point.
 * Provider and sink failures are values, not exceptions (see AiResult and
 * SinkOutcome).
 */

export type PipelineStage = 'capture' | 'ocr' | 'prompt' | 'ai';

export abstract class PipelineError extends Error {
  abstract readonly stage: PipelineStage;
}

export class CaptureError extends PipelineError {
  readonly stage = 'capture' as const;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CaptureError';
  }
}

export type OcrErrorReason = 'unavailable' | 'invalid_options' | 'engine_failed';

export class OcrError extends PipelineError {
  readonly stage = 'ocr' as const;

  constructor(
    readonly reason: OcrErrorReason,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'OcrError';
  }
}

export class TemplateError extends PipelineError {
  readonly stage = 'prompt' as const;

  constructor(readonly templateName: string) {
    super(`Prompt template "${templateName}" does not exist`);
    this.name = 'TemplateError';
  }
}
