/**
 * Application wiring: builds every component from Settings and connects the
 * hotkeys to the session and the pipeline.
 */

import type { Settings } from './config/settings';
import { bindHotkeys, buildBindings, HookDragOverlay, type HotkeyIssue, type InputHook } from './input';
import { createLogger, describeError } from './logging/logger';
import { TesseractEngine } from './ocr';
import { FileRunJournal, PipelineOrchestrator, type RunOutcome } from './pipeline';
import { PromptStore } from './prompts';
import { AiRouter, createProviderMap } from './providers';
import { SessionController } from './session';
import { createSinks, SinkDispatcher } from './sinks';
import type { PreferencesStoreApi } from './store/preferences-store';
import { TerminalSurface } from './surface/terminal-surface';
import { createDesktopScreenSource, createThumbnail, FrameGrabber, RegionSelector } from './vision';

const log = createLogger('app');

export interface App {
  session: SessionController;
  orchestrator: PipelineOrchestrator;
  preferences: PreferencesStoreApi;
  prompts: PromptStore;
  router: AiRouter;
  sinks: SinkDispatcher;
  hotkeyIssues: HotkeyIssue[];
  stop(): void;
}

function reportOutcome(outcome: RunOutcome): void {
  switch (outcome.kind) {
    case 'completed':
      log.info(`Run ${outcome.record.runId} completed`, { discarded: outcome.record.discarded });
      break;
    case 'failed':
      log.warn(`Run ${outcome.record.runId} failed at ${outcome.stage}`);
      break;
    case 'cancelled':
      log.info(`Run ${outcome.runId} cancelled`);
      break;
    case 'rejected':
      log.debug(`Capture ignored while run ${outcome.activeRunId} is in flight`);
      break;
  }
}

export function createApp(settings: Settings, hook: InputHook, preferences: PreferencesStoreApi): App {
  const session = new SessionController();
  const prompts = new PromptStore(settings.files.promptsFile);
  const router = new AiRouter(createProviderMap(settings.apiKeys));
  const sinks = new SinkDispatcher(createSinks(settings));

  const orchestrator = new PipelineOrchestrator({
    session,
    preferences,
    regionSelector: new RegionSelector(new HookDragOverlay(hook)),
    frameGrabber: new FrameGrabber(createDesktopScreenSource(settings.capture.display)),
    ocr: new TesseractEngine(settings.ocr.command),
    ocrOptions: {
      language: settings.ocr.language,
      engineMode: settings.ocr.engineMode,
      segmentationMode: settings.ocr.segmentationMode,
    },
    prompts,
    router,
    requestLimits: { maxTokens: settings.ai.maxTokens, timeoutMs: settings.ai.timeoutMs },
    sinks,
    journal: new FileRunJournal(settings.files.logDir),
    thumbnail: createThumbnail,
  });

  const { bindings, issues } = buildBindings(settings.hotkeys, hook.keyCodes);
  for (const issue of issues) {
    log.warn(`Hotkey for ${issue.action} not registered: ${issue.message}`);
  }

  const surface = new TerminalSurface(session);
  surface.start();

  const unbind = bindHotkeys(hook, bindings, {
    capture: () => {
      orchestrator
        .capture()
        .then(reportOutcome)
        .catch((error: unknown) => {
          log.error('Capture crashed', { error: describeError(error) });
        });
    },
    hide: () => session.hide(),
    show: () => session.show(),
    panic: () => session.panic(),
  });

  hook.start();

  return {
    session,
    orchestrator,
    preferences,
    prompts,
    router,
    sinks,
    hotkeyIssues: issues,
    stop: () => {
      unbind();
      surface.stop();
      hook.stop();
    },
  };
}
