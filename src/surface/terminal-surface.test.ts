import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, releaseLogs } from '../logging/logger';
import { SessionController } from '../session/session-store';
import { renderDisplay, TerminalSurface } from './terminal-surface';

afterEach(() => {
  releaseLogs();
  vi.restoreAllMocks();
});

function setup() {
  const session = new SessionController();
  const output: string[] = [];
  const surface = new TerminalSurface(session, (text) => output.push(text));
  surface.start();
  return { session, output, surface };
}

describe('renderDisplay', () => {
  it('skips empty fields', () => {
    expect(renderDisplay({ status: 'Answer received.', ocrText: '', answer: 'B', preview: null })).toEqual([
      'Status: Answer received.',
      '--- Answer ---',
      'B',
    ]);
  });
});

describe('TerminalSurface', () => {
  it('prints new content while visible', () => {
    const { session, output } = setup();
    session.requestCapture();
    session.publish(1, { status: 'Capturing...' });
    session.publish(1, { answer: 'B', status: 'Answer received.' });

    expect(output).toEqual(['Status: Capturing...\n', 'Status: Answer received.\n', '--- Answer ---\nB\n']);
  });

  it('prints nothing while hidden and reprints on show', () => {
    const { session, output } = setup();
    session.requestCapture();
    session.hide();
    session.publish(1, { answer: 'B' });

    expect(output).toEqual(['\x1b[2J\x1b[H']);

    session.show();
    expect(output.slice(1)).toEqual(['[Visible·CaptureInFlight]\n', '--- Answer ---\n', 'B\n']);
  });

  it('clears on panic and shows nothing afterwards', () => {
    const { session, output } = setup();
    session.requestCapture();
    session.publish(1, { answer: 'B' });
    session.panic();
    session.show();

    expect(output).toEqual(['--- Answer ---\nB\n', '\x1b[2J\x1b[H', '[Visible·Idle]\n']);
  });

  it('stops listening after stop', () => {
    const { session, output, surface } = setup();
    surface.stop();
    session.hide();
    expect(output).toEqual([]);
  });
});

describe('TerminalSurface log output', () => {
  it('holds log lines while hidden and prints them on show', () => {
    const info = vi.spyOn(console, 'log').mockImplementation(() => {});
    const { session } = setup();
    const log = createLogger('pipeline');

    session.hide();
    log.info('Run 1 failed at ai');
    expect(info).not.toHaveBeenCalled();

    session.show();
    expect(info).toHaveBeenCalledWith('[pipeline] Run 1 failed at ai');
  });

  it('holds log lines after panic', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const { session, surface } = setup();

    session.panic();
    createLogger('pipeline').error('Run 1 failed at ocr');
    expect(error).not.toHaveBeenCalled();

    surface.stop();
    expect(error).toHaveBeenCalledWith('[pipeline] Run 1 failed at ocr');
  });
});
