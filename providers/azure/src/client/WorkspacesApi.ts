import { ApiError, type ILongRunningOperation, type IResourceApi } from '@stratoform/reconciler';
import { type } from 'arktype';

import type { WorkspaceId } from '../ids';
import type { ManagementClient } from './ManagementClient';
import { Workspace } from './models';
import { operationFor } from './operations';

export const WORKSPACES_API_VERSION = '2023-10-01';

export interface WorkspacesApiOptions {
  /** Purge instead of soft-deleting, so the name can be reused immediately */
  forceToPurge?: boolean;
}

export class WorkspacesApi implements IResourceApi<WorkspaceId, Workspace> {
  constructor(
    private readonly client: ManagementClient,
    private readonly options: WorkspacesApiOptions = {}
  ) {}

  async get(id: WorkspaceId, signal?: AbortSignal): Promise<Workspace> {
    const response = await this.client.send('GET', id.toString(), { apiVersion: WORKSPACES_API_VERSION, signal });
    const workspace = Workspace(response.body);
    if (workspace instanceof type.errors) throw new ApiError(`unexpected response body for ${id.toString()}: ${workspace.summary}`, response.status);
    return workspace;
  }

  async createOrUpdate(id: WorkspaceId, body: Workspace, signal?: AbortSignal): Promise<ILongRunningOperation> {
    const response = await this.client.send('PUT', id.toString(), { apiVersion: WORKSPACES_API_VERSION, body, signal });
    return operationFor(this.client, response, { path: id.toString(), apiVersion: WORKSPACES_API_VERSION });
  }

  async delete(id: WorkspaceId, signal?: AbortSignal): Promise<ILongRunningOperation> {
    const query = this.options.forceToPurge ? { forceToPurge: 'true' } : undefined;
    const response = await this.client.send('DELETE', id.toString(), { apiVersion: WORKSPACES_API_VERSION, query, signal });
    return operationFor(this.client, response);
  }
}
