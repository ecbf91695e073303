/**
 * Hotkeys
 *
 * Parses chords like `ctrl+shift+h` or `f2` against the hook's key table and
 * routes matching key presses to session actions. Bad or duplicate chords are
 * reported as registration issues and left unbound; the rest still work.
 */

import { createLogger } from '../logging/logger';
import type { InputHook, KeyEvent } from './types';

const log = createLogger('hotkeys');

export const HOTKEY_ACTIONS = ['capture', 'hide', 'show', 'panic'] as const;

export type HotkeyAction = (typeof HOTKEY_ACTIONS)[number];

export interface KeyChord {
  keycode: number;
  ctrl: boolean;
  shift: boolean;
  alt: boolean;
  meta: boolean;
  /** Normalized form, e.g. `ctrl+shift+h` */
  label: string;
}

export type ChordParse = { ok: true; chord: KeyChord } | { ok: false; error: string };

export type HotkeyIssueKind = 'invalid' | 'duplicate';

export interface HotkeyIssue {
  kind: HotkeyIssueKind;
  message: string;
  action: HotkeyAction;
  shortcut: string;
  existingAction?: HotkeyAction;
}

export interface HotkeyBinding {
  action: HotkeyAction;
  chord: KeyChord;
}

type Modifier = 'ctrl' | 'shift' | 'alt' | 'meta';

const MODIFIER_ALIASES: Readonly<Record<string, Modifier>> = {
  ctrl: 'ctrl',
  control: 'ctrl',
  shift: 'shift',
  alt: 'alt',
  option: 'alt',
  meta: 'meta',
  cmd: 'meta',
  command: 'meta',
  win: 'meta',
  super: 'meta',
};

const KEY_ALIASES: Readonly<Record<string, string>> = {
  esc: 'escape',
  return: 'enter',
  del: 'delete',
  up: 'arrowup',
  down: 'arrowdown',
  left: 'arrowleft',
  right: 'arrowright',
};

function lookupKey(name: string, keyCodes: Readonly<Record<string, number>>): number | undefined {
  const wanted = KEY_ALIASES[name] ?? name;
  for (const [keyName, code] of Object.entries(keyCodes)) {
    if (keyName.toLowerCase() === wanted) return code;
  }
  return undefined;
}

export function parseChord(text: string, keyCodes: Readonly<Record<string, number>>): ChordParse {
  const parts = text
    .toLowerCase()
    .split('+')
    .map((part) => part.trim());

  if (parts.some((part) => part.length === 0)) {
    return { ok: false, error: `Malformed shortcut "${text}"` };
  }

  const modifiers = new Set<Modifier>();
  let key: { name: string; code: number } | null = null;

  for (const part of parts) {
    const modifier = MODIFIER_ALIASES[part];
    if (modifier) {
      modifiers.add(modifier);
      continue;
    }
    if (key) {
      return { ok: false, error: `Shortcut "${text}" names more than one key` };
    }
    const code = lookupKey(part, keyCodes);
    if (code === undefined) {
      return { ok: false, error: `Unknown key "${part}" in shortcut "${text}"` };
    }
    key = { name: part, code };
  }

  if (!key) {
    return { ok: false, error: `Shortcut "${text}" has no key besides modifiers` };
  }

  const ordered = (['ctrl', 'shift', 'alt', 'meta'] as const).filter((m) => modifiers.has(m));
  return {
    ok: true,
    chord: {
      keycode: key.code,
      ctrl: modifiers.has('ctrl'),
      shift: modifiers.has('shift'),
      alt: modifiers.has('alt'),
      meta: modifiers.has('meta'),
      label: [...ordered, key.name].join('+'),
    },
  };
}

/**
 * Modifiers must match exactly: `f2` does not fire on `ctrl+f2`.
 */
export function matchesChord(chord: KeyChord, event: KeyEvent): boolean {
  return (
    event.keycode === chord.keycode &&
    event.ctrlKey === chord.ctrl &&
    event.shiftKey === chord.shift &&
    event.altKey === chord.alt &&
    event.metaKey === chord.meta
  );
}

export function buildBindings(
  shortcuts: Readonly<Record<HotkeyAction, string>>,
  keyCodes: Readonly<Record<string, number>>
): { bindings: HotkeyBinding[]; issues: HotkeyIssue[] } {
  const bindings: HotkeyBinding[] = [];
  const issues: HotkeyIssue[] = [];

  for (const action of HOTKEY_ACTIONS) {
    const shortcut = shortcuts[action];
    const parsed = parseChord(shortcut, keyCodes);
    if (!parsed.ok) {
      issues.push({ kind: 'invalid', message: parsed.error, action, shortcut });
      continue;
    }

    const existing = bindings.find((binding) => binding.chord.label === parsed.chord.label);
    if (existing) {
      issues.push({
        kind: 'duplicate',
        message: `Shortcut "${parsed.chord.label}" is already bound to ${existing.action}`,
        action,
        shortcut,
        existingAction: existing.action,
      });
      continue;
    }

    bindings.push({ action, chord: parsed.chord });
  }

  return { bindings, issues };
}

/**
 * Dispatch key presses to the bound actions. Returns the unsubscribe function.
 */
export function bindHotkeys(
  hook: InputHook,
  bindings: readonly HotkeyBinding[],
  handlers: Readonly<Record<HotkeyAction, () => void>>
): () => void {
  for (const binding of bindings) {
    log.info(`${binding.action}: ${binding.chord.label}`);
  }

  return hook.onKeyDown((event) => {
    const binding = bindings.find((candidate) => matchesChord(candidate.chord, event));
    if (binding) {
      log.debug(`Hotkey ${binding.chord.label} → ${binding.action}`);
      handlers[binding.action]();
    }
  });
}
