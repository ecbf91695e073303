import { describe, expect, it } from 'vitest';
import {
  EMPTY_DISPLAY,
  INITIAL_SESSION_STATE,
  reduceSession,
  sessionLabel,
  type SessionEvent,
  type SessionState,
} from './session-machine';

function run(events: SessionEvent[], from: SessionState = INITIAL_SESSION_STATE): SessionState {
  return events.reduce(reduceSession, from);
}

describe('reduceSession', () => {
  it('starts visible and idle', () => {
    expect(sessionLabel(INITIAL_SESSION_STATE)).toBe('Visible·Idle');
  });

  it('toggles visibility independently of capture', () => {
    const state = run([{ type: 'CaptureRequested' }, { type: 'HideRequested' }]);
    expect(sessionLabel(state)).toBe('Hidden·CaptureInFlight');
    expect(sessionLabel(reduceSession(state, { type: 'ShowRequested' }))).toBe('Visible·CaptureInFlight');
  });

  it('ignores hide while hidden and show while visible', () => {
    const hidden = run([{ type: 'HideRequested' }]);
    expect(reduceSession(hidden, { type: 'HideRequested' })).toBe(hidden);
    expect(reduceSession(INITIAL_SESSION_STATE, { type: 'ShowRequested' })).toBe(INITIAL_SESSION_STATE);
  });

  it('assigns increasing run ids', () => {
    const first = run([{ type: 'CaptureRequested' }]);
    expect(first.capture).toEqual({ kind: 'inFlight', runId: 1 });

    const second = run([{ type: 'RunCompleted', runId: 1 }, { type: 'CaptureRequested' }], first);
    expect(second.capture).toEqual({ kind: 'inFlight', runId: 2 });
    expect(second.lastRunId).toBe(2);
  });

  it('rejects a capture while one is in flight', () => {
    const inFlight = run([{ type: 'CaptureRequested' }]);
    expect(reduceSession(inFlight, { type: 'CaptureRequested' })).toBe(inFlight);
  });

  it('only completes the run that is in flight', () => {
    const inFlight = run([{ type: 'CaptureRequested' }]);
    expect(reduceSession(inFlight, { type: 'RunCompleted', runId: 7 })).toBe(inFlight);
    expect(reduceSession(inFlight, { type: 'RunCompleted', runId: 1 }).capture).toEqual({ kind: 'idle' });
  });

  it('panic clears the display, hides, and discards issued runs', () => {
    const state = run([
      { type: 'CaptureRequested' },
      { type: 'ContentPublished', runId: 1, content: { status: 'Capturing...', ocrText: 'question' } },
      { type: 'PanicRequested' },
    ]);

    expect(sessionLabel(state)).toBe('Hidden·Idle');
    expect(state.display).toEqual(EMPTY_DISPLAY);
    expect(state.discardThrough).toBe(1);
  });

  it('drops content from discarded runs', () => {
    const panicked = run([{ type: 'CaptureRequested' }, { type: 'PanicRequested' }]);
    const after = reduceSession(panicked, { type: 'ContentPublished', runId: 1, content: { answer: 'B' } });
    expect(after).toBe(panicked);
  });

  it('a stale completion does not end a newer run', () => {
    const state = run([
      { type: 'CaptureRequested' },
      { type: 'PanicRequested' },
      { type: 'CaptureRequested' },
      { type: 'RunCompleted', runId: 1 },
    ]);
    expect(state.capture).toEqual({ kind: 'inFlight', runId: 2 });
  });

  it('merges published content', () => {
    const state = run([
      { type: 'CaptureRequested' },
      { type: 'ContentPublished', runId: 1, content: { ocrText: 'text' } },
      { type: 'ContentPublished', runId: 1, content: { answer: 'B' } },
    ]);
    expect(state.display).toEqual({ status: '', ocrText: 'text', answer: 'B', preview: null });
  });
});
