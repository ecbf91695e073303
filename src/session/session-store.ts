/**
 * Session Store
 *
 * The only mutator of session state. Hotkey callbacks and the pipeline both
 * go through these methods; each applies one reducer step synchronously on the
 * event loop, so transitions never interleave.
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import { createLogger } from '../logging/logger';
import {
  INITIAL_SESSION_STATE,
  isDiscarded,
  reduceSession,
  sessionLabel,
  type DisplayContent,
  type SessionEvent,
  type SessionState,
} from './session-machine';

const log = createLogger('session');

export type Admission =
  | { admitted: true; runId: number }
  | { admitted: false; reason: 'capture_in_flight'; activeRunId: number };

export type Rejection = Extract<Admission, { admitted: false }>;

export class SessionController {
  readonly store: StoreApi<SessionState>;
  private readonly rejectionListeners = new Set<(rejection: Rejection) => void>();

  constructor(initial: SessionState = INITIAL_SESSION_STATE) {
    this.store = createStore<SessionState>()(() => initial);
  }

  getState(): SessionState {
    return this.store.getState();
  }

  subscribe(listener: (state: SessionState, previous: SessionState) => void): () => void {
    return this.store.subscribe(listener);
  }

  /**
   * Listen for captures refused because another run is in flight
   */
  onRejected(listener: (rejection: Rejection) => void): () => void {
    this.rejectionListeners.add(listener);
    return () => {
      this.rejectionListeners.delete(listener);
    };
  }

  /**
   * Admit a new run, or refuse it while one is in flight. Refused requests are
   * dropped, not queued.
   */
  requestCapture(): Admission {
    const { before, after } = this.apply({ type: 'CaptureRequested' });

    if (after !== before && after.capture.kind === 'inFlight') {
      log.debug(`Run ${after.capture.runId} admitted`, { state: sessionLabel(after) });
      return { admitted: true, runId: after.capture.runId };
    }

    const activeRunId = before.capture.kind === 'inFlight' ? before.capture.runId : before.lastRunId;
    const rejection: Rejection = { admitted: false, reason: 'capture_in_flight', activeRunId };
    log.warn(`Capture rejected: run ${activeRunId} is still in flight`);
    for (const listener of this.rejectionListeners) {
      listener(rejection);
    }
    return rejection;
  }

  completeRun(runId: number): void {
    this.apply({ type: 'RunCompleted', runId });
  }

  hide(): void {
    this.apply({ type: 'HideRequested' });
  }

  show(): void {
    this.apply({ type: 'ShowRequested' });
  }

  /**
   * Hide and clear everything. An in-flight run keeps going but its results
   * are dropped on arrival.
   */
  panic(): void {
    const { before } = this.apply({ type: 'PanicRequested' });
    log.info('Panic: display cleared and hidden', {
      discardedRun: before.capture.kind === 'inFlight' ? before.capture.runId : undefined,
    });
  }

  /**
   * Update the display for a run. Returns false when the run was discarded.
   */
  publish(runId: number, content: Partial<DisplayContent>): boolean {
    const { after } = this.apply({ type: 'ContentPublished', runId, content });
    return !isDiscarded(after, runId);
  }

  isDiscarded(runId: number): boolean {
    return isDiscarded(this.getState(), runId);
  }

  private apply(event: SessionEvent): { before: SessionState; after: SessionState } {
    const before = this.store.getState();
    const after = reduceSession(before, event);
    if (after !== before) {
      this.store.setState(after, true);
    }
    return { before, after };
  }
}
