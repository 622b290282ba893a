export type { IStateBackend } from './IStateBackend';
export { LocalBackend, DEFAULT_STATE_PATH } from './backends/LocalBackend';
export { emptyState, type IState, StateManager } from './StateManager';
