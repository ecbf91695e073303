import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, describeError, holdLogs, releaseLogs, setLogLevel } from './logger';

describe('createLogger', () => {
  afterEach(() => {
    setLogLevel('info');
  });

  it('prefixes lines with the scope', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    createLogger('capture').info('Capture OK');
    expect(spy).toHaveBeenCalledWith('[capture] Capture OK');
  });

  it('passes a non-empty context as a second argument', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    createLogger('session').warn('Capture rejected', { runId: 3 });
    expect(spy).toHaveBeenCalledWith('[session] Capture rejected', { runId: 3 });
  });

  it('drops lines below the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const info = vi.spyOn(console, 'log').mockImplementation(() => {});
    setLogLevel('warn');
    const log = createLogger('ocr');
    log.debug('hidden');
    log.info('hidden too');
    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
  });
});

describe('describeError', () => {
  it('uses the message of Error instances', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError(42)).toBe('42');
  });
});

describe('holdLogs', () => {
  afterEach(() => {
    releaseLogs();
  });

  it('prints nothing until released, then prints in order', () => {
    const info = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const log = createLogger('pipeline');

    holdLogs();
    log.info('first');
    log.error('Run 1 failed at ai', { provider: 'openai' });
    expect(info).not.toHaveBeenCalled();
    expect(error).not.toHaveBeenCalled();

    releaseLogs();
    expect(info).toHaveBeenCalledWith('[pipeline] first');
    expect(error).toHaveBeenCalledWith('[pipeline] Run 1 failed at ai', { provider: 'openai' });

    log.info('direct');
    expect(info).toHaveBeenLastCalledWith('[pipeline] direct');
  });

  it('keeps only the most recent lines', () => {
    const info = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const log = createLogger('input');

    holdLogs();
    for (let i = 1; i <= 502; i++) log.info(`line ${i}`);
    releaseLogs();

    expect(warn).toHaveBeenCalledWith('[logging] 2 earlier lines dropped while output was hidden');
    expect(info).toHaveBeenCalledTimes(500);
    expect(info.mock.calls[0]).toEqual(['[input] line 3']);
  });
});
