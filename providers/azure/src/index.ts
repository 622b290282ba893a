import type { IProvider, IResourceHandler, IResourceTimeouts, ISchema } from '@stratoform/contracts';
import type { Clock, Logger } from '@stratoform/reconciler';

import { ManagementClient } from './client/ManagementClient';
import { NamespacesApi } from './client/NamespacesApi';
import { WorkspacesApi } from './client/WorkspacesApi';
import type { ProviderConfig } from './config';
import { MachineLearningWorkspaceResource } from './resources/MachineLearningWorkspaceResource';
import { RELAY_NAMESPACE_TYPE, RelayNamespaceResource } from './resources/RelayNamespaceResource';
import { MACHINE_LEARNING_WORKSPACE_TYPE } from './resources/workspaceMapping';

export interface AzureProviderOptions {
  config: ProviderConfig;
  /** Defaults to a client for `config.endpoint` authenticated with `config.accessToken` */
  client?: ManagementClient;
  clock?: Clock;
  logger?: Logger;
}

export class AzureProvider implements IProvider {
  readonly resources = [MACHINE_LEARNING_WORKSPACE_TYPE, RELAY_NAMESPACE_TYPE];
  private handlers: Map<string, IResourceHandler> = new Map();

  constructor(options: AzureProviderOptions) {
    const { config, clock, logger } = options;
    const client = options.client ?? new ManagementClient({ endpoint: config.endpoint, accessToken: config.accessToken, logger });
    const context = { subscriptionId: config.subscriptionId, clock, logger };

    this.handlers.set(MACHINE_LEARNING_WORKSPACE_TYPE, new MachineLearningWorkspaceResource(new WorkspacesApi(client, { forceToPurge: config.features.purgeSoftDeletedWorkspaceOnDestroy }), context));
    this.handlers.set(RELAY_NAMESPACE_TYPE, new RelayNamespaceResource(new NamespacesApi(client), context));
  }

  private handler(type: string): IResourceHandler {
    const handler = this.handlers.get(type);
    if (!handler) throw new Error(`Unsupported resource type: ${type}`);
    return handler;
  }

  async getSchema(type: string): Promise<ISchema> {
    return await this.handler(type).getSchema();
  }

  async validate(type: string, inputs: Record<string, unknown>): Promise<void> {
    await this.handler(type).validate(inputs);
  }

  async create(type: string, inputs: Record<string, unknown>, timeouts?: Partial<IResourceTimeouts>): Promise<string> {
    return await this.handler(type).create(inputs, timeouts);
  }

  async read(id: string, type: string): Promise<Record<string, unknown> | null> {
    return await this.handler(type).read(id);
  }

  async update(id: string, type: string, inputs: Record<string, unknown>, timeouts?: Partial<IResourceTimeouts>): Promise<void> {
    await this.handler(type).update(id, inputs, timeouts);
  }

  async delete(id: string, type: string, timeouts?: Partial<IResourceTimeouts>): Promise<void> {
    await this.handler(type).delete(id, timeouts);
  }

  async importState(id: string, type: string): Promise<Record<string, unknown>> {
    return await this.handler(type).importState(id);
  }
}

export { DEFAULT_ENDPOINT, loadProviderConfig, type ProviderConfig, type ProviderFeatures } from './config';
export { ManagementClient, type ManagementClientOptions } from './client/ManagementClient';
export { type INamespacesApi, NamespacesApi, RELAY_API_VERSION } from './client/NamespacesApi';
export { WORKSPACES_API_VERSION, WorkspacesApi } from './client/WorkspacesApi';
export { AuthorizationRuleId, NamespaceId, WorkspaceId } from './ids';
export { MachineLearningWorkspaceResource } from './resources/MachineLearningWorkspaceResource';
export { RELAY_NAMESPACE_TYPE, RelayNamespaceResource } from './resources/RelayNamespaceResource';
export { MACHINE_LEARNING_WORKSPACE_TYPE } from './resources/workspaceMapping';
export { replacementTriggers, sensitiveAttributes } from './schema';
