// ============================================
// Terminal Input Adapter
// Raw-mode stdin keypresses -> InputState
// ============================================

import { emitKeypressEvents } from 'readline';
import type { InputState } from './InputState';

interface Keypress {
  name?: string;
  ctrl?: boolean;
}

/**
 * Feed keypresses from a TTY into `state`. Ctrl+C calls `onQuit`.
 * Returns a function that detaches the listener and restores the TTY.
 * Without a TTY (piped stdin, CI) nothing is attached.
 */
export function attachTerminalInput(
  state: InputState,
  onQuit: () => void,
  stdin: NodeJS.ReadStream = process.stdin
): () => void {
  if (!stdin.isTTY) return () => {};

  emitKeypressEvents(stdin);
  stdin.setRawMode(true);
  stdin.resume();

  const onKeypress = (_chunk: string | undefined, key: Keypress | undefined) => {
    if (!key?.name) return;
    if (key.ctrl && key.name === 'c') {
      onQuit();
      return;
    }
    state.press(key.name, Date.now());
  };
  stdin.on('keypress', onKeypress);

  return () => {
    stdin.off('keypress', onKeypress);
    stdin.setRawMode(false);
    stdin.pause();
  };
}
