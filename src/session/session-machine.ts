/**
 * Session state machine.
 *
 * Visibility (visible/hidden) and capture (idle/in flight) are orthogonal.
 * Panic is transient: it clears the display and lands on Hidden·Idle in one
 * step. Every admitted run gets the next generation id; panic marks all ids
 * issued so far as discarded so their late results cannot repopulate the
 * display.
 */

export type Visibility = 'visible' | 'hidden';

export type CaptureStatus = { kind: 'idle' } | { kind: 'inFlight'; runId: number };

export interface DisplayContent {
  status: string;
  ocrText: string;
  answer: string;
  /** PNG data URL of the last capture */
  preview: string | null;
}

export interface SessionState {
  visibility: Visibility;
  capture: CaptureStatus;
  /** Id of the most recently admitted run, 0 before the first */
  lastRunId: number;
  /** Runs with an id at or below this are discarded */
  discardThrough: number;
  display: DisplayContent;
}

export type SessionEvent =
  | { type: 'HideRequested' }
  | { type: 'ShowRequested' }
  | { type: 'CaptureRequested' }
  | { type: 'RunCompleted'; runId: number }
  | { type: 'PanicRequested' }
  | { type: 'ContentPublished'; runId: number; content: Partial<DisplayContent> };

export type SessionLabel = 'Visible·Idle' | 'Visible·CaptureInFlight' | 'Hidden·Idle' | 'Hidden·CaptureInFlight';

export const EMPTY_DISPLAY: DisplayContent = {
  status: '',
  ocrText: '',
  answer: '',
  preview: null,
};

export const INITIAL_SESSION_STATE: SessionState = {
  visibility: 'visible',
  capture: { kind: 'idle' },
  lastRunId: 0,
  discardThrough: 0,
  display: EMPTY_DISPLAY,
};

export function isDiscarded(state: SessionState, runId: number): boolean {
  return runId <= state.discardThrough;
}

export function sessionLabel(state: SessionState): SessionLabel {
  const visibility = state.visibility === 'visible' ? 'Visible' : 'Hidden';
  const capture = state.capture.kind === 'idle' ? 'Idle' : 'CaptureInFlight';
  return `${visibility}·${capture}`;
}

/**
 * Apply one event. Returns the same object when the event does not apply, so
 * callers can tell a rejected or ignored event by identity.
 */
export function reduceSession(state: SessionState, event: SessionEvent): SessionState {
  switch (event.type) {
    case 'HideRequested':
      return state.visibility === 'hidden' ? state : { ...state, visibility: 'hidden' };
    case 'ShowRequested':
      return state.visibility === 'visible' ? state : { ...state, visibility: 'visible' };
    case 'CaptureRequested': {
      if (state.capture.kind === 'inFlight') return state;
      const runId = state.lastRunId + 1;
      return { ...state, capture: { kind: 'inFlight', runId }, lastRunId: runId };
    }
    case 'RunCompleted':
      if (state.capture.kind !== 'inFlight' || state.capture.runId !== event.runId) return state;
      return { ...state, capture: { kind: 'idle' } };
    case 'PanicRequested':
      return {
        visibility: 'hidden',
        capture: { kind: 'idle' },
        lastRunId: state.lastRunId,
        discardThrough: state.lastRunId,
        display: EMPTY_DISPLAY,
      };
    case 'ContentPublished':
      if (isDiscarded(state, event.runId)) return state;
      return { ...state, display: { ...state.display, ...event.content } };
    default:
      return state;
  }
}
