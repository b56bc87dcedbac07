/**
 * @layerkit/app
 *
 * Host-side glue: the UI store and the editor session that connects pointer
 * and keyboard input, the editor core, the renderer and the file system.
 *
 * @packageDocumentation
 */

export { createEditorStore, NEUTRAL_BRIGHTNESS_CONTRAST } from './editor-store';
export type { EditorStore, EditorStoreActions, EditorStoreState, ToneRange } from './editor-store';
export { resolveKeyAction } from './keymap';
export type { KeyAction } from './keymap';
export { EditorSession } from './editor-session';
export type { EditorSessionOptions } from './editor-session';
