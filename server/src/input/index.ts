export { InputState, KEY_HOLD_MS } from './InputState';
export { loadBindings, parseBindings, readAxes } from './bindings';
export type { AxisBinding, InputBindings } from './bindings';
export { attachTerminalInput } from './terminal';
