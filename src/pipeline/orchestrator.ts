/**
 * Pipeline Orchestrator
 *
 * Runs one capture-to-answer pass: region → frame → OCR → prompt → AI → sinks.
 * The first failing stage ends the run. Whatever happens, the run is completed
 * in the session store so capture never stays stuck in flight.
 */

import { PipelineError, type PipelineStage } from '../errors';
import { createLogger, describeError } from '../logging/logger';
import type { OcrEngine, OcrOptions } from '../ocr/types';
import { compose, DEFAULT_PROMPT_NAME, type PromptTemplate } from '../prompts/templates';
import type { AiResult, RequestConfig } from '../providers/types';
import { isDiscarded } from '../session/session-machine';
import type { SessionController } from '../session/session-store';
import type { SinkOutcome, SinkPayload } from '../sinks/types';
import { snapshotPreferences, type Preferences } from '../store/preferences-store';
import type { CaptureRegion, CapturedFrame, RegionMode, RegionSelection } from '../vision/types';
import type { RunJournal, RunRecord } from './run-journal';

const log = createLogger('pipeline');

export type RunOutcome =
  | { kind: 'completed'; record: RunRecord }
  | { kind: 'failed'; stage: PipelineStage; message: string; record: RunRecord }
  | { kind: 'cancelled'; runId: number }
  | { kind: 'rejected'; activeRunId: number };

export interface PipelineDependencies {
  session: SessionController;
  preferences: {
    getState(): Preferences & { rememberRegion(region: CaptureRegion): void };
  };
  regionSelector: {
    resolve(mode: RegionMode, stored: CaptureRegion, signal?: AbortSignal): Promise<RegionSelection>;
  };
  frameGrabber: { grab(region: CaptureRegion): Promise<CapturedFrame> };
  ocr: OcrEngine;
  ocrOptions: OcrOptions;
  prompts: { get(name: string): Promise<PromptTemplate> };
  router: {
    complete(provider: string, model: string, composedPrompt: string, config: RequestConfig): Promise<AiResult>;
  };
  /** Limits applied to every AI request; temperature comes from preferences */
  requestLimits: { maxTokens: number; timeoutMs: number };
  sinks: { dispatch(payload: SinkPayload): Promise<SinkOutcome[]> };
  journal: RunJournal;
  /** Preview image for the display; skipped when absent */
  thumbnail?: (frame: CapturedFrame) => Promise<string>;
  now?: () => Date;
}

/** Mutable progress of one run, folded into its RunRecord at the end */
interface RunProgress {
  stage: PipelineStage;
  region: CaptureRegion | null;
  ocrText: string | null;
  aiResult: AiResult | null;
  sinkOutcomes: SinkOutcome[];
  /** Set once, where the run decides whether its answer may still be shown and dispatched */
  discarded: boolean;
}

export class PipelineOrchestrator {
  private readonly now: () => Date;

  constructor(private readonly deps: PipelineDependencies) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Ask for a capture. Refused while another run is in flight.
   */
  async capture(): Promise<RunOutcome> {
    const admission = this.deps.session.requestCapture();
    if (!admission.admitted) {
      return { kind: 'rejected', activeRunId: admission.activeRunId };
    }

    const { runId } = admission;
    // Panic aborts a pending region selection; later stages run to completion
    const panicked = new AbortController();
    const stopWatching = this.deps.session.subscribe((state) => {
      if (isDiscarded(state, runId)) panicked.abort();
    });
    try {
      return await this.execute(runId, panicked.signal);
    } finally {
      stopWatching();
      this.deps.session.completeRun(runId);
    }
  }

  private async execute(runId: number, panicked: AbortSignal): Promise<RunOutcome> {
    const { session } = this.deps;
    const prefs = snapshotPreferences(this.deps.preferences.getState());
    const promptName = prefs.promptName ?? DEFAULT_PROMPT_NAME;
    const progress: RunProgress = {
      stage: 'capture',
      region: null,
      ocrText: null,
      aiResult: null,
      sinkOutcomes: [],
      discarded: false,
    };

    session.publish(runId, { status: 'Capturing...', ocrText: '', answer: '' });

    try {
      const selection = await this.deps.regionSelector.resolve(prefs.regionMode, prefs.region, panicked);
      if (panicked.aborted) {
        log.info(`Run ${runId} dropped during region selection by panic`);
        return { kind: 'cancelled', runId };
      }
      if (selection.kind === 'cancelled') {
        log.info(`Run ${runId} cancelled during region selection`);
        session.publish(runId, { status: 'Selection cancelled.' });
        return { kind: 'cancelled', runId };
      }
      progress.region = selection.region;
      if (prefs.regionMode === 'interactive') {
        this.deps.preferences.getState().rememberRegion(selection.region);
      }

      const frame = await this.deps.frameGrabber.grab(selection.region);
      await this.publishPreview(runId, frame);

      progress.stage = 'ocr';
      const ocr = await this.deps.ocr.recognize(frame, this.deps.ocrOptions);
      progress.ocrText = ocr.text;
      session.publish(runId, {
        ocrText: ocr.text,
        status: `Capture OK (${ocr.text.length} chars). Asking ${prefs.providerId}...`,
      });

      progress.stage = 'prompt';
      const template = await this.deps.prompts.get(promptName);
      const composedPrompt = compose(template, ocr.text);

      progress.stage = 'ai';
      const aiResult = await this.deps.router.complete(prefs.providerId, prefs.model, composedPrompt, {
        temperature: prefs.temperature,
        maxTokens: this.deps.requestLimits.maxTokens,
        timeoutMs: this.deps.requestLimits.timeoutMs,
      });
      progress.aiResult = aiResult;

      if (!aiResult.success) {
        const message = `${aiResult.errorKind}: ${aiResult.providerMessage}`;
        return this.fail(runId, progress, prefs, promptName, 'ai', message);
      }

      progress.discarded = session.isDiscarded(runId);
      if (progress.discarded) {
        log.info(`Run ${runId} discarded after panic; answer not dispatched`);
        return { kind: 'completed', record: await this.record(runId, 'completed', progress, prefs, promptName) };
      }

      session.publish(runId, { answer: aiResult.answerText, status: 'Answer received.' });

      progress.sinkOutcomes = await this.deps.sinks.dispatch({
        ocrText: ocr.text,
        answer: aiResult.answerText,
        provider: aiResult.providerId,
        model: aiResult.model,
        promptName,
        timestamp: this.now().toISOString(),
      });

      return { kind: 'completed', record: await this.record(runId, 'completed', progress, prefs, promptName) };
    } catch (error) {
      const stage = error instanceof PipelineError ? error.stage : progress.stage;
      return this.fail(runId, progress, prefs, promptName, stage, describeError(error));
    }
  }

  private async fail(
    runId: number,
    progress: RunProgress,
    prefs: Preferences,
    promptName: string,
    stage: PipelineStage,
    message: string
  ): Promise<RunOutcome> {
    log.error(`Run ${runId} failed at ${stage}: ${message}`);
    progress.discarded = this.deps.session.isDiscarded(runId);
    this.deps.session.publish(runId, { status: `Error (${stage}): ${message}` });
    const record = await this.record(runId, 'failed', progress, prefs, promptName, { stage, message });
    return { kind: 'failed', stage, message, record };
  }

  private async record(
    runId: number,
    status: RunRecord['status'],
    progress: RunProgress,
    prefs: Preferences,
    promptName: string,
    failure?: { stage: PipelineStage; message: string }
  ): Promise<RunRecord> {
    const record: RunRecord = {
      runId,
      timestamp: this.now().toISOString(),
      status,
      region: progress.region,
      ocrText: progress.ocrText,
      aiResult: progress.aiResult,
      sinkOutcomes: progress.sinkOutcomes,
      provider: prefs.providerId,
      model: prefs.model,
      promptName,
      ...(failure ? { failedStage: failure.stage, error: failure.message } : {}),
      discarded: progress.discarded,
    };

    try {
      await this.deps.journal.append(record);
    } catch (error) {
      log.error(`Failed to write run record ${runId}`, { error: describeError(error) });
    }
    return record;
  }

  private async publishPreview(runId: number, frame: CapturedFrame): Promise<void> {
    if (!this.deps.thumbnail) return;
    try {
      this.deps.session.publish(runId, { preview: await this.deps.thumbnail(frame) });
    } catch (error) {
      log.warn(`Preview unavailable for run ${runId}`, { error: describeError(error) });
    }
  }
}
