import { ApiError, type ILongRunningOperation, type IResourceApi } from '@stratoform/reconciler';
import { type } from 'arktype';

import type { AuthorizationRuleId, NamespaceId } from '../ids';
import type { ManagementClient } from './ManagementClient';
import { AccessKeys, RelayNamespace } from './models';
import { operationFor } from './operations';

export const RELAY_API_VERSION = '2017-04-01';

export interface INamespacesApi extends IResourceApi<NamespaceId, RelayNamespace> {
  listKeys(id: AuthorizationRuleId): Promise<AccessKeys>;
}

export class NamespacesApi implements INamespacesApi {
  constructor(private readonly client: ManagementClient) {}

  async get(id: NamespaceId, signal?: AbortSignal): Promise<RelayNamespace> {
    const response = await this.client.send('GET', id.toString(), { apiVersion: RELAY_API_VERSION, signal });
    const namespace = RelayNamespace(response.body);
    if (namespace instanceof type.errors) throw new ApiError(`unexpected response body for ${id.toString()}: ${namespace.summary}`, response.status);
    return namespace;
  }

  async createOrUpdate(id: NamespaceId, body: RelayNamespace, signal?: AbortSignal): Promise<ILongRunningOperation> {
    const response = await this.client.send('PUT', id.toString(), { apiVersion: RELAY_API_VERSION, body, signal });
    return operationFor(this.client, response, { path: id.toString(), apiVersion: RELAY_API_VERSION });
  }

  async delete(id: NamespaceId, signal?: AbortSignal): Promise<ILongRunningOperation> {
    const response = await this.client.send('DELETE', id.toString(), { apiVersion: RELAY_API_VERSION, signal });
    return operationFor(this.client, response);
  }

  async listKeys(id: AuthorizationRuleId): Promise<AccessKeys> {
    const response = await this.client.send('POST', `${id.toString()}/listKeys`, { apiVersion: RELAY_API_VERSION });
    const keys = AccessKeys(response.body ?? {});
    if (keys instanceof type.errors) throw new ApiError(`unexpected response body for ${id.toString()}/listKeys: ${keys.summary}`, response.status);
    return keys;
  }
}
