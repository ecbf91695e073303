import { describe, expect, it } from 'vitest';
import { ConfigError, parseSettings } from './settings';

function issuesOf(env: Record<string, string>): string[] {
  try {
    parseSettings(env);
  } catch (error) {
    if (error instanceof ConfigError) return error.issues;
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('parseSettings', () => {
  it('fills in defaults', () => {
    const settings = parseSettings({});

    expect(settings.capture).toEqual({
      region: { left: 40, top: 40, width: 1200, height: 700 },
      regionMode: 'manual',
    });
    expect(settings.ocr).toEqual({ command: 'tesseract', language: 'fra', engineMode: 3, segmentationMode: 6 });
    expect(settings.ai).toEqual({
      provider: 'openai',
      model: 'gpt-4o-mini',
      temperature: 0,
      maxTokens: 800,
      timeoutMs: 30000,
    });
    expect(settings.sinks.order).toEqual(['clipboard', 'log']);
    expect(settings.hotkeys).toEqual({
      capture: 'f2',
      hide: 'ctrl+shift+h',
      show: 'ctrl+shift+s',
      panic: 'ctrl+shift+x',
    });
    expect(settings.logLevel).toBe('info');
  });

  it('reads values from the environment', () => {
    const settings = parseSettings({
      CAP_LEFT: '0',
      CAP_TOP: '0',
      CAP_WIDTH: '800',
      CAP_HEIGHT: '600',
      REGION_MODE: 'interactive',
      PROVIDER: ' Anthropic ',
      MODEL: 'claude-3-5-sonnet-20240620',
      PROMPT: 'QCM',
      LLM_TEMP: '0.4',
      ANTHROPIC_API_KEY: 'test-secret',
      SINKS: 'Log, discord',
      DISCORD_WEBHOOK: 'https://discord.test/hook',
    });

    expect(settings.capture.region).toEqual({ left: 0, top: 0, width: 800, height: 600 });
    expect(settings.capture.regionMode).toBe('interactive');
    expect(settings.ai.provider).toBe('anthropic');
    expect(settings.ai.promptName).toBe('QCM');
    expect(settings.ai.temperature).toBe(0.4);
    expect(settings.apiKeys.anthropic).toBe('test-secret');
    expect(settings.sinks.order).toEqual(['log', 'discord']);
    expect(settings.sinks.discordWebhook).toBe('https://discord.test/hook');
  });

  it('treats blank optional values as absent', () => {
    const settings = parseSettings({ OPENAI_API_KEY: '   ', PROMPT: '' });
    expect(settings.apiKeys.openai).toBeUndefined();
    expect(settings.ai.promptName).toBeUndefined();
  });

  it('names every offending key', () => {
    const issues = issuesOf({ CAP_WIDTH: '0', PROVIDER: 'nope', LOG_LEVEL: 'loud' });
    expect(issues.map((issue) => issue.split(':')[0])).toEqual(['CAP_WIDTH', 'PROVIDER', 'LOG_LEVEL']);
    expect(issues[1]).toBe('PROVIDER: Unknown provider');
  });

  it('rejects unknown and repeated sinks', () => {
    expect(issuesOf({ SINKS: 'clipboard,fax' })[0]).toMatch(/^SINKS\.1: /);
    expect(issuesOf({ SINKS: 'clipboard,log,LOG' })).toEqual(['SINKS: Sink listed more than once']);
  });

  it('returns a frozen object', () => {
    const settings = parseSettings({});
    expect(Object.isFrozen(settings)).toBe(true);
    expect(Object.isFrozen(settings.capture.region)).toBe(true);
  });
});
