export { DebugView } from "./DebugView";
export { InputManager } from "./InputManager";
export type { InputHandler } from "./InputManager";
export { resolveButton, resolveKey } from "./KeyMap";
