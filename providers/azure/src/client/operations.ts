import { ApiError, type ILongRunningOperation, type OperationStatus } from '@stratoform/reconciler';
import { type } from 'arktype';

import { type ManagementClient, type ManagementResponse, parseRetryAfter } from './ManagementClient';
import { AsyncOperationStatus, ProvisioningStateBody } from './models';

const FAILED_STATES = new Set(['failed', 'canceled', 'cancelled']);

function isSucceeded(state: string): boolean {
  return state.toLowerCase() === 'succeeded';
}

function isFailed(state: string): boolean {
  return FAILED_STATES.has(state.toLowerCase());
}

function inProgress(response: ManagementResponse): OperationStatus {
  const retryAfterMs = parseRetryAfter(response.headers.get('Retry-After'));
  return retryAfterMs === undefined ? { status: 'InProgress' } : { status: 'InProgress', retryAfterMs };
}

/** The initial response already carried the final result */
export class CompletedOperation implements ILongRunningOperation {
  async poll(): Promise<OperationStatus> {
    return { status: 'Succeeded' };
  }
}

/** Polls the status monitor named by the `Azure-AsyncOperation` header */
export class AsyncOperation implements ILongRunningOperation {
  constructor(
    private readonly client: ManagementClient,
    private readonly url: string
  ) {}

  async poll(signal?: AbortSignal): Promise<OperationStatus> {
    const response = await this.client.send('GET', this.url, { signal });
    const body = AsyncOperationStatus(response.body);
    if (body instanceof type.errors) throw new ApiError(`unexpected operation status body: ${body.summary}`, response.status);

    if (isSucceeded(body.status)) return { status: 'Succeeded' };
    if (isFailed(body.status)) {
      const detail = body.error?.message ?? body.error?.code;
      return { status: 'Failed', reason: detail ? `${body.status}: ${detail}` : body.status };
    }
    return inProgress(response);
  }
}

/** Polls the `Location` header: 202 while running, any other 2xx once done */
export class LocationOperation implements ILongRunningOperation {
  constructor(
    private readonly client: ManagementClient,
    private readonly url: string
  ) {}

  async poll(signal?: AbortSignal): Promise<OperationStatus> {
    const response = await this.client.send('GET', this.url, { signal });
    if (response.status === 202) return inProgress(response);
    return { status: 'Succeeded' };
  }
}

/** Re-reads the resource until its `provisioningState` is terminal */
export class ProvisioningStateOperation implements ILongRunningOperation {
  constructor(
    private readonly client: ManagementClient,
    private readonly resourcePath: string,
    private readonly apiVersion: string
  ) {}

  async poll(signal?: AbortSignal): Promise<OperationStatus> {
    const response = await this.client.send('GET', this.resourcePath, { apiVersion: this.apiVersion, signal });
    const state = provisioningState(response.body);

    if (state === undefined || isSucceeded(state)) return { status: 'Succeeded' };
    if (isFailed(state)) return { status: 'Failed', reason: `provisioning state is ${state}` };
    return inProgress(response);
  }
}

function provisioningState(body: unknown): string | undefined {
  const parsed = ProvisioningStateBody(body);
  if (parsed instanceof type.errors) return undefined;
  return parsed.properties?.provisioningState;
}

/**
 * Picks how to follow a mutating request. `resource` enables the provisioning-state
 * fallback, which only makes sense for create/update.
 */
export function operationFor(client: ManagementClient, response: ManagementResponse, resource?: { path: string; apiVersion: string }): ILongRunningOperation {
  const asyncOperation = response.headers.get('Azure-AsyncOperation');
  if (asyncOperation) return new AsyncOperation(client, asyncOperation);

  const location = response.headers.get('Location');
  if (location) return new LocationOperation(client, location);

  if (resource) {
    const state = provisioningState(response.body);
    if (state !== undefined && !isSucceeded(state)) return new ProvisioningStateOperation(client, resource.path, resource.apiVersion);
  }

  return new CompletedOperation();
}
