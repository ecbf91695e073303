/**
 * Entry point.
 *
 *   snapanswer                   run with global hotkeys
 *   snapanswer --check           test the selected provider and exit
 *   snapanswer --validate-key    check the selected provider's API key and exit
 *   snapanswer --test-sink X     send a test message through sink X and exit
 *   snapanswer --list-providers  print providers and their models
 *   snapanswer --list-prompts    print prompt template names
 *   snapanswer --new-prompt      add an untitled prompt template to edit
 *   snapanswer --save-prompt N --prompt-body T   create or replace template N
 *   snapanswer --delete-prompt N                 delete template N
 *
 * `--provider`, `--model`, `--prompt`, `--temperature` and `--region-mode`
 * change the saved preferences before starting.
 */

import { parseArgs } from 'node:util';
import { createApp } from './app';
import {
  applyPreferenceFlags,
  checkProvider,
  deletePrompt,
  listPrompts,
  listProviders,
  newPrompt,
  savePrompt,
  testSink,
  validateKey,
} from './commands';
import { ConfigError, loadSettings } from './config/settings';
import { createNativeInputHook } from './input';
import { createLogger, describeError, setLogLevel } from './logging/logger';
import { PromptStore } from './prompts';
import { AiRouter, createProviderMap } from './providers';
import { createSinks, SinkDispatcher } from './sinks';
import { loadPreferences } from './store/preferences-store';

const log = createLogger('main');

function parseCli() {
  return parseArgs({
    options: {
      env: { type: 'string' },
      check: { type: 'boolean', default: false },
      'validate-key': { type: 'boolean', default: false },
      'test-sink': { type: 'string' },
      'list-providers': { type: 'boolean', default: false },
      'list-prompts': { type: 'boolean', default: false },
      'new-prompt': { type: 'boolean', default: false },
      'save-prompt': { type: 'string' },
      'prompt-body': { type: 'string' },
      'delete-prompt': { type: 'string' },
      provider: { type: 'string' },
      model: { type: 'string' },
      prompt: { type: 'string' },
      temperature: { type: 'string' },
      'region-mode': { type: 'string' },
    },
  }).values;
}

async function main(): Promise<number> {
  const values = parseCli();
  const settings = loadSettings(values.env);
  setLogLevel(settings.logLevel);

  const prompts = new PromptStore(settings.files.promptsFile);
  if (values['list-providers']) return listProviders();
  if (values['list-prompts']) return listPrompts(prompts);
  if (values['new-prompt']) return newPrompt(prompts);
  if (values['save-prompt']) return savePrompt(prompts, values['save-prompt'], values['prompt-body']);
  if (values['delete-prompt']) return deletePrompt(prompts, values['delete-prompt']);
  if (values['test-sink']) return testSink(new SinkDispatcher(createSinks(settings)), values['test-sink']);

  const preferences = await loadPreferences(settings);
  applyPreferenceFlags(preferences, {
    provider: values.provider,
    model: values.model,
    prompt: values.prompt,
    temperature: values.temperature,
    regionMode: values['region-mode'],
  });

  const { providerId, model, promptName } = preferences.getState();
  if (values.check || values['validate-key']) {
    const router = new AiRouter(createProviderMap(settings.apiKeys));
    return values.check ? checkProvider(router, providerId, model) : validateKey(router, providerId, model);
  }

  const app = createApp(settings, await createNativeInputHook(), preferences);
  log.info(`Ready. ${providerId} / ${model}${promptName ? ` / ${promptName}` : ''}`);

  await new Promise<void>((resolve) => {
    process.once('SIGINT', () => resolve());
    process.once('SIGTERM', () => resolve());
  });

  app.stop();
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof ConfigError) {
      for (const issue of error.issues) log.error(issue);
    } else {
      log.error('Fatal error', { error: describeError(error) });
    }
    process.exitCode = 1;
  });
