import type { IProvider, IResource, ISchema } from '@stratoform/contracts';
import type { IState, IStateBackend } from '@stratoform/state';
import { vi } from 'vitest';

export const NAMESPACE_ID = '/subscriptions/00000000-0000-0000-0000-000000000000/resourceGroups/rg-relay/providers/Microsoft.Relay/namespaces/relay-example';

export const RELAY_SCHEMA: ISchema = {
  name: { type: 'string', required: true, forceNew: true },
  sku_name: { type: 'string', required: true },
  primary_key: { type: 'string', computed: true, sensitive: true },
};

export function relayResource(name: string, attributes: Record<string, unknown> = { name: 'relay-example' }): IResource {
  return { id: NAMESPACE_ID, type: 'Resource', resourceType: 'azure_relay_namespace', name, attributes, sensitiveAttributes: ['primary_key'] };
}

/** Keeps the state document in memory, copying on every read and write like a file would */
export class MemoryBackend implements IStateBackend {
  writes = 0;
  private locked = false;

  constructor(public state: IState = { version: 1, resources: {} }) {}

  async read(): Promise<IState> {
    return structuredClone(this.state);
  }

  async write(state: IState): Promise<void> {
    this.state = structuredClone(state);
    this.writes++;
  }

  async lock(): Promise<void> {
    if (this.locked) throw new Error('State is locked by another process.');
    this.locked = true;
  }

  async unlock(): Promise<void> {
    this.locked = false;
  }
}

export function fakeProvider() {
  return {
    resources: ['azure_relay_namespace'],
    getSchema: vi.fn<IProvider['getSchema']>().mockResolvedValue(RELAY_SCHEMA),
    validate: vi.fn<IProvider['validate']>().mockResolvedValue(undefined),
    create: vi.fn<IProvider['create']>().mockResolvedValue(NAMESPACE_ID),
    read: vi.fn<IProvider['read']>(),
    update: vi.fn<IProvider['update']>().mockResolvedValue(undefined),
    delete: vi.fn<IProvider['delete']>().mockResolvedValue(undefined),
    importState: vi.fn<IProvider['importState']>(),
  } satisfies IProvider;
}

export function exitSpy() {
  return vi.spyOn(process, 'exit').mockImplementation((code) => {
    throw new Error(`process.exit(${code})`);
  });
}
