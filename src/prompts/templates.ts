/**
 * Prompt Templates
 *
 * A template is a named prompt body with an `{ocrText}` placeholder (the older
 * `{text}` token works too). Templates live in a JSON file the user edits
 * between runs; the store re-reads it on every call so edits apply to the next
 * capture without a restart.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { TemplateError } from '../errors';
import { createLogger } from '../logging/logger';

const log = createLogger('prompts');

export interface PromptTemplate {
  name: string;
  body: string;
}

const PLACEHOLDER = /\{(?:ocrText|text)\}/g;

const UNTITLED_NAME = 'New Prompt';
const UNTITLED_BODY = 'Write your prompt here. The OCR text replaces {ocrText}.';

export const DEFAULT_PROMPT_NAME = 'Default (General Reasoning)';

export const DEFAULT_PROMPTS: Readonly<Record<string, string>> = {
  [DEFAULT_PROMPT_NAME]:
    'You are a logic expert and precision matters.\n' +
    'The text below was extracted by OCR from a multiple-choice question and may contain noise.\n' +
    '--- OCR TEXT ---\n{ocrText}\n--- END OF OCR TEXT ---\n' +
    'Identify the question and its choices, then return ONLY the text of the correct choice.',
  'Reading Comprehension':
    'Act like a reading test grader. Given the OCR text (passage, question and choices), ' +
    'return ONLY the letter and text of the correct choice. If ambiguous, pick the most plausible.\n' +
    '--- OCR TEXT ---\n{ocrText}\n--- END OF OCR TEXT ---',
  'Numeric Aptitude (Math/Logic)':
    'You are a rigorous mathematician. Solve the problem step by step but return ONLY the exact ' +
    'option among the choices.\n--- OCR TEXT ---\n{ocrText}\n--- END OF OCR TEXT ---',
  'Data Sufficiency':
    'Evaluate statement (1) alone, (2) alone, then (1) and (2) together. Return ONLY the correct option.\n' +
    '--- OCR TEXT ---\n{ocrText}\n--- END OF OCR TEXT ---',
};

/**
 * Merge a template with OCR text. Every placeholder is replaced by the text
 * verbatim; a template without a placeholder gets the text appended after a
 * blank line.
 */
export function compose(template: PromptTemplate, ocrText: string): string {
  if (template.body.search(PLACEHOLDER) === -1) {
    return `${template.body}\n\n${ocrText}`;
  }
  return template.body.replace(PLACEHOLDER, () => ocrText);
}

const promptFileSchema = z.record(z.string());

export class PromptStore {
  constructor(
    private readonly filePath: string,
    private readonly defaults: Readonly<Record<string, string>> = DEFAULT_PROMPTS
  ) {}

  async list(): Promise<PromptTemplate[]> {
    const prompts = await this.read();
    return Object.entries(prompts).map(([name, body]) => ({ name, body }));
  }

  /**
   * Look up a template by name; TemplateError when it does not exist
   */
  async get(name: string): Promise<PromptTemplate> {
    const prompts = await this.read();
    const body = prompts[name];
    if (body === undefined) {
      throw new TemplateError(name);
    }
    return { name, body };
  }

  async save(name: string, body: string): Promise<PromptTemplate> {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new Error('Prompt name is empty');
    }
    const prompts = await this.read();
    prompts[trimmed] = body.trim();
    await this.write(prompts);
    log.info(`Prompt "${trimmed}" saved`);
    return { name: trimmed, body: prompts[trimmed] };
  }

  /**
   * Delete a template. Returns false when it did not exist.
   */
  async remove(name: string): Promise<boolean> {
    const prompts = await this.read();
    if (!(name in prompts)) return false;
    delete prompts[name];
    await this.write(prompts);
    log.info(`Prompt "${name}" deleted`);
    return true;
  }

  /**
   * Add a placeholder template under the first free "New Prompt", "New Prompt 2", ... name
   */
  async createUntitled(): Promise<PromptTemplate> {
    const prompts = await this.read();
    let name = UNTITLED_NAME;
    for (let i = 2; name in prompts; i++) {
      name = `${UNTITLED_NAME} ${i}`;
    }
    prompts[name] = UNTITLED_BODY;
    await this.write(prompts);
    return { name, body: UNTITLED_BODY };
  }

  private async read(): Promise<Record<string, string>> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return { ...this.defaults };
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new Error(`Prompt file ${this.filePath} is not valid JSON`, { cause: error });
    }

    const parsed = promptFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new Error(`Prompt file ${this.filePath} must map prompt names to template strings`);
    }
    return parsed.data;
  }

  private async write(prompts: Record<string, string>): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, `${JSON.stringify(prompts, null, 2)}\n`, 'utf8');
  }
}
