/**
 * @module session-store
 * Host-side editing session built on a zustand vanilla store.
 *
 * Input handlers never touch the editor directly: they `dispatch` commands,
 * which queue up until the host calls `processFrame` once per frame. The
 * frame runs every queued command in order, then commits the editor once so
 * that each touched layer is reported a single time.
 */

import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import type { Color, EditorCommand, EditorImage, PixelBuffer, Rect, RgbaImage, ToolKind } from '@layerpaint/types';
import { CommandQueueImpl, EditorImpl, createEditorImage, layerAt, rgba } from '@layerpaint/core';
import {
  copySelection,
  cutSelection,
  deleteSelection,
  moveSelection,
  pasteImage,
  rotateSelection,
  scaleSelection,
} from './selection-builder';
import type { SelectionEdit } from './selection-builder';

/** Session configuration. */
export interface SessionOptions {
  /** Canvas to start from. A blank canvas of `width` x `height` is created when omitted. */
  image?: EditorImage;
  /** Width of the blank starting canvas (default 640). */
  width?: number;
  /** Height of the blank starting canvas (default 480). */
  height?: number;
  /** Maximum number of undo entries. */
  maxHistoryDepth?: number;
  /** Log editor activity via `console.debug`. */
  debug?: boolean;
}

/** Session state and actions. */
export interface SessionState {
  /** The undo/redo engine. Mutated only while a frame is processed. */
  editor: EditorImpl;
  /** Currently selected tool. */
  tool: ToolKind;
  /** Color used by drawing tools. */
  primaryColor: Color;
  /** Alternate color, e.g. the gradient end. */
  secondaryColor: Color;
  /** Rectangle edits are clipped to, or null for the whole canvas. */
  selection: Rect | null;
  /** Pixels of the last copy or cut. */
  clipboard: RgbaImage | null;
  /** Whether undo is available. */
  canUndo: boolean;
  /** Whether redo is available. */
  canRedo: boolean;
  /** Labels of the undo entries, oldest first. */
  historyEntries: string[];
  /** Bumped after each frame that ran at least one command. */
  revision: number;
  /** Message describing the last failed command, or null. */
  lastError: string | null;

  // Actions
  /** Queue a command for the next frame. */
  dispatch: (command: EditorCommand) => void;
  /** Number of commands waiting for the next frame. */
  pendingCommands: () => number;
  /**
   * Run every queued command in FIFO order and commit once.
   * @returns Number of commands run.
   */
  processFrame: () => number;
}

/** A session store. */
export type SessionStore = StoreApi<SessionState>;

const DEFAULT_WIDTH = 640;
const DEFAULT_HEIGHT = 480;

/** Creates an editing session. */
export function createSessionStore(options: SessionOptions = {}): SessionStore {
  const queue = new CommandQueueImpl<EditorCommand>();
  const editor = new EditorImpl(
    options.image ?? createEditorImage(options.width ?? DEFAULT_WIDTH, options.height ?? DEFAULT_HEIGHT),
    { autoCommit: false, maxHistoryDepth: options.maxHistoryDepth, debug: options.debug },
  );

  return createStore<SessionState>()((set, get) => ({
    editor,
    tool: 'pencil',
    primaryColor: rgba(0, 0, 0),
    secondaryColor: rgba(255, 255, 255),
    selection: null,
    clipboard: null,
    canUndo: false,
    canRedo: false,
    historyEntries: [],
    revision: 0,
    lastError: null,

    dispatch: (command: EditorCommand): void => {
      queue.push(command);
    },

    pendingCommands: (): number => queue.size,

    processFrame: (): number => {
      const commands = queue.drain();
      if (commands.length === 0) {
        return 0;
      }
      let lastError: string | null = null;
      for (const command of commands) {
        try {
          executeCommand(command, get, set);
        } catch (error) {
          lastError = error instanceof Error ? error.message : String(error);
        }
      }
      const state = get();
      state.editor.commit();
      set({
        canUndo: state.editor.canUndo,
        canRedo: state.editor.canRedo,
        historyEntries: state.editor.historyEntries,
        revision: state.revision + 1,
        lastError,
      });
      return commands.length;
    },
  }));
}

// ── helpers ────────────────────────────────────────────────────────────

/** Run one command against the editor and the session fields it touches. */
function executeCommand(
  command: EditorCommand,
  get: () => SessionState,
  set: (partial: Partial<SessionState>) => void,
): void {
  const { editor } = get();
  switch (command.type) {
    case 'set-tool':
      set({ tool: command.tool });
      break;
    case 'set-primary-color':
      set({ primaryColor: { ...command.color } });
      break;
    case 'set-secondary-color':
      set({ secondaryColor: { ...command.color } });
      break;
    case 'swap-colors': {
      const { primaryColor, secondaryColor } = get();
      set({ primaryColor: secondaryColor, secondaryColor: primaryColor });
      break;
    }
    case 'apply':
      editor.applyToActiveLayer(command.operation);
      break;
    case 'undo':
      editor.undo();
      break;
    case 'redo':
      editor.redo();
      break;
    case 'new-image':
      editor.setImage(createEditorImage(command.width, command.height));
      set({ selection: null });
      break;
    case 'set-image':
      editor.setImage(command.image);
      set({ selection: null });
      break;
    case 'resize-image':
      editor.resizeImage(command.width, command.height);
      break;
    case 'resize-canvas':
      editor.resizeCanvas(command.width, command.height, command.anchorX, command.anchorY);
      break;
    case 'set-selection':
      selectRegion(editor, set, command.region);
      break;
    case 'select-all':
      selectRegion(editor, set, { x: 0, y: 0, width: editor.width, height: editor.height });
      break;
    case 'copy-selection':
      set({ clipboard: copySelection(activeSurface(editor), requireSelection(get)) });
      break;
    case 'cut-selection': {
      const cut = cutSelection(activeSurface(editor), requireSelection(get));
      if (cut) {
        editor.applyToActiveLayer(cut.operation);
        set({ clipboard: cut.clipboard });
      }
      break;
    }
    case 'paste': {
      const { clipboard } = get();
      if (!clipboard) {
        throw new Error('Clipboard is empty');
      }
      applySelectionEdit(editor, set, pasteImage(clipboard, command.x, command.y, editor));
      break;
    }
    case 'delete-selection':
      editor.applyToActiveLayer(deleteSelection(requireSelection(get)));
      break;
    case 'move-selection':
      applySelectionEdit(
        editor,
        set,
        moveSelection(activeSurface(editor), requireSelection(get), command.dx, command.dy),
      );
      break;
    case 'scale-selection':
      applySelectionEdit(
        editor,
        set,
        scaleSelection(activeSurface(editor), requireSelection(get), command.width, command.height),
      );
      break;
    case 'rotate-selection':
      applySelectionEdit(editor, set, rotateSelection(activeSurface(editor), requireSelection(get), command.degrees));
      break;
    case 'pick-color': {
      const color = editor.pickColor(command.x, command.y, editor.activeLayer);
      set(command.target === 'secondary' ? { secondaryColor: color } : { primaryColor: color });
      break;
    }
    case 'add-layer':
      editor.addLayer();
      break;
    case 'duplicate-layer':
      editor.duplicateLayer(command.layer);
      break;
    case 'delete-layer':
      editor.deleteLayer(command.layer);
      break;
    case 'set-layer-visible':
      editor.setLayerVisible(command.layer, command.visible);
      break;
    case 'set-active-layer':
      editor.setActiveLayer(command.layer);
      break;
  }
}

function selectRegion(
  editor: EditorImpl,
  set: (partial: Partial<SessionState>) => void,
  region: Rect | null,
): void {
  editor.setValidRegion(region);
  set({ selection: region ? { ...region } : null });
}

function requireSelection(get: () => SessionState): Rect {
  const { selection } = get();
  if (!selection) {
    throw new Error('Nothing is selected');
  }
  return selection;
}

function activeSurface(editor: EditorImpl): PixelBuffer {
  return layerAt(editor.image, editor.activeLayer).image;
}

/**
 * Apply a selection edit with the mask lifted, since its pixels land outside
 * the old selection, then select what was placed. The history entry records
 * no region, so undo restores both the source and the destination.
 */
function applySelectionEdit(
  editor: EditorImpl,
  set: (partial: Partial<SessionState>) => void,
  edit: SelectionEdit | null,
): void {
  if (!edit) {
    return;
  }
  const previous = editor.validRegion;
  editor.setValidRegion(null);
  try {
    editor.applyToActiveLayer(edit.operation);
  } catch (error) {
    editor.setValidRegion(previous);
    throw error;
  }
  selectRegion(editor, set, edit.selection);
}
