import type { IState } from './StateManager';

/**
 * Storage for the state document. Only a local file backend exists today.
 */
export interface IStateBackend {
  read(): Promise<IState>;

  write(state: IState): Promise<void>;

  /**
   * Acquire a lock to prevent concurrent modifications
   */
  lock(): Promise<void>;

  unlock(): Promise<void>;
}
