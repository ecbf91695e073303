import { describe, expect, it, vi } from 'vitest';
import { parseSettings } from '../config/settings';
import { createSinks, NOT_CONFIGURED, SinkDispatcher } from './dispatcher';
import type { Sink, SinkDelivery, SinkPayload } from './types';

const payload: SinkPayload = {
  ocrText: 'What is 2+2? A)3 B)4 C)5',
  answer: 'B',
  provider: 'openai',
  model: 'gpt-4o-mini',
  promptName: 'QCM',
  timestamp: '2026-10-19T08:30:00.000Z',
};

function fakeSink(name: Sink['name'], deliver: () => Promise<SinkDelivery>, configured = true) {
  return {
    name,
    isConfigured: () => configured,
    deliver: vi.fn(deliver),
  };
}

describe('SinkDispatcher', () => {
  it('keeps dispatching after a sink throws', async () => {
    const first = fakeSink('clipboard', async () => ({ delivered: true }));
    const second = fakeSink('discord', async () => {
      throw new Error('socket hang up');
    });
    const third = fakeSink('log', async () => ({ delivered: true }));

    const outcomes = await new SinkDispatcher([first, second, third]).dispatch(payload);

    expect(outcomes).toEqual([
      { sinkName: 'clipboard', success: true },
      { sinkName: 'discord', success: false, errorDetail: 'socket hang up' },
      { sinkName: 'log', success: true },
    ]);
    expect(third.deliver).toHaveBeenCalledWith(payload);
  });

  it('invokes sinks in configuration order, one at a time', async () => {
    const calls: string[] = [];
    const track = (name: Sink['name']) =>
      fakeSink(name, async () => {
        calls.push(`start:${name}`);
        await new Promise((resolve) => setTimeout(resolve, 5));
        calls.push(`end:${name}`);
        return { delivered: true };
      });

    await new SinkDispatcher([track('log'), track('clipboard')]).dispatch(payload);

    expect(calls).toEqual(['start:log', 'end:log', 'start:clipboard', 'end:clipboard']);
  });

  it('records a reported failure with its detail', async () => {
    const sink = fakeSink('webhook', async () => ({ delivered: false, detail: 'HTTP 500: oops' }));
    expect(await new SinkDispatcher([sink]).dispatch(payload)).toEqual([
      { sinkName: 'webhook', success: false, errorDetail: 'HTTP 500: oops' },
    ]);
  });

  it('skips unconfigured sinks without attempting them', async () => {
    const sink = fakeSink('telegram', async () => ({ delivered: true }), false);

    const outcomes = await new SinkDispatcher([sink]).dispatch(payload);

    expect(outcomes).toEqual([{ sinkName: 'telegram', success: false, errorDetail: NOT_CONFIGURED }]);
    expect(sink.deliver).not.toHaveBeenCalled();
  });

  it('sends a test message through one sink', async () => {
    const sink = fakeSink('discord', async () => ({ delivered: true }));
    const dispatcher = new SinkDispatcher([sink]);

    expect(await dispatcher.sendTest('discord', new Date('2026-10-19T08:30:00.000Z'))).toEqual({
      sinkName: 'discord',
      success: true,
    });
    expect(sink.deliver).toHaveBeenCalledWith({
      ocrText: '',
      answer: 'Test message ✅',
      provider: 'test',
      model: 'test',
      promptName: 'test',
      timestamp: '2026-10-19T08:30:00.000Z',
    });
    expect(await dispatcher.sendTest('telegram')).toEqual({
      sinkName: 'telegram',
      success: false,
      errorDetail: 'not enabled',
    });
  });
});

describe('createSinks', () => {
  it('builds sinks in the configured order', () => {
    const settings = parseSettings({ SINKS: 'discord, clipboard,log,telegram' });
    const sinks = createSinks(settings, { writeClipboard: async () => {} });

    expect(sinks.map((sink) => sink.name)).toEqual(['discord', 'clipboard', 'log', 'telegram']);
    expect(sinks.map((sink) => sink.isConfigured())).toEqual([false, true, true, false]);
  });
});
