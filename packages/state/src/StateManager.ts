import type { IResource } from '@stratoform/contracts';

import { LocalBackend } from './backends/LocalBackend';
import type { IStateBackend } from './IStateBackend';

export interface IState {
  version: number;
  resources: Record<string, IResource>;
}

export function emptyState(): IState {
  return { version: 1, resources: {} };
}

export class StateManager {
  constructor(private readonly backend: IStateBackend = new LocalBackend()) {}

  read(): Promise<IState> {
    return this.backend.read();
  }

  write(state: IState): Promise<void> {
    return this.backend.write(state);
  }

  lock(): Promise<void> {
    return this.backend.lock();
  }

  unlock(): Promise<void> {
    return this.backend.unlock();
  }

  /**
   * Run a read-modify-write cycle under the state lock
   */
  async update(mutate: (state: IState) => Promise<void> | void): Promise<IState> {
    await this.lock();
    try {
      const state = await this.read();
      await mutate(state);
      await this.write(state);
      return state;
    } finally {
      await this.unlock();
    }
  }
}
