import * as fs from 'node:fs/promises';
import path from 'node:path';

import type { IStateBackend } from '../IStateBackend';
import { emptyState, type IState } from '../StateManager';

export const DEFAULT_STATE_PATH = path.join('.stratoform', 'state.json');

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') return error.code;
  return undefined;
}

function isState(value: unknown): value is IState {
  return typeof value === 'object' && value !== null && 'version' in value && typeof value.version === 'number';
}

/**
 * Local file system backend for state storage.
 * Stores state in a JSON file with locking and backup support.
 */
export class LocalBackend implements IStateBackend {
  private readonly filePath: string;
  private readonly lockFilePath: string;

  constructor(filePath: string = path.resolve(DEFAULT_STATE_PATH)) {
    this.filePath = filePath;
    this.lockFilePath = `${this.filePath}.lock`;
  }

  async read(): Promise<IState> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return emptyState();
      throw error;
    }

    const parsed: unknown = JSON.parse(content);
    if (!isState(parsed)) throw new Error(`Invalid state file: ${this.filePath}`);

    return { version: parsed.version, resources: parsed.resources ?? {} };
  }

  async write(state: IState): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });

    // Keep the previous state as a backup
    try {
      await fs.copyFile(this.filePath, `${this.filePath}.bak`);
    } catch (error) {
      if (errorCode(error) !== 'ENOENT') throw error;
    }

    await fs.writeFile(this.filePath, JSON.stringify(state, null, 2), 'utf8');
  }

  async lock(): Promise<void> {
    await fs.mkdir(path.dirname(this.lockFilePath), { recursive: true });
    try {
      // 'wx' flag fails if file exists
      await fs.writeFile(this.lockFilePath, String(Date.now()), { flag: 'wx' });
    } catch (error) {
      if (errorCode(error) === 'EEXIST') throw new Error('State is locked by another process.');
      throw error;
    }
  }

  async unlock(): Promise<void> {
    try {
      await fs.unlink(this.lockFilePath);
    } catch (error) {
      // Already unlocked
      if (errorCode(error) !== 'ENOENT') throw error;
    }
  }
}
