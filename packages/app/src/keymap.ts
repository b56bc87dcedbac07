/**
 * @module keymap
 * Keyboard shortcuts understood by the editor session.
 *
 * Keys are `KeyboardEvent.key` values. Shortcuts carrying Ctrl or Alt are
 * left to the host (menus own those accelerators).
 */

import type { Modifiers } from '@layerkit/types';

export type KeyAction =
  | 'zoom-in'
  | 'zoom-out'
  | 'zoom-actual'
  | 'zoom-fit'
  | 'apply-crop'
  | 'cancel-crop';

const KEY_ACTIONS: ReadonlyMap<string, KeyAction> = new Map<string, KeyAction>([
  ['+', 'zoom-in'],
  ['=', 'zoom-in'],
  ['-', 'zoom-out'],
  ['_', 'zoom-out'],
  ['0', 'zoom-actual'],
  ['f', 'zoom-fit'],
  ['F', 'zoom-fit'],
  ['Enter', 'apply-crop'],
  ['Escape', 'cancel-crop'],
]);

/** Map a key press to an editor action, or null when it is not a shortcut. */
export function resolveKeyAction(key: string, modifiers: Modifiers = { shift: false }): KeyAction | null {
  if (modifiers.ctrl || modifiers.alt) return null;
  return KEY_ACTIONS.get(key) ?? null;
}
