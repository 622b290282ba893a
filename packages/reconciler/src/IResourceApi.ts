/** Anything that serializes to a canonical resource identifier */
export interface IResourceIdentity {
  toString(): string;
}

export type OperationStatus =
  | { readonly status: 'InProgress'; readonly retryAfterMs?: number }
  | { readonly status: 'Succeeded' }
  | { readonly status: 'Failed'; readonly reason: string };

/** Status handle of an asynchronous remote operation */
export interface ILongRunningOperation {
  poll(signal?: AbortSignal): Promise<OperationStatus>;
}

/**
 * Remote API for one resource type. Failed requests reject with an `ApiError`;
 * a 404 from `get` or `delete` means the resource does not exist.
 * The reconciler aborts `signal` when the caller's deadline passes.
 */
export interface IResourceApi<TId extends IResourceIdentity, TModel, TRequest = TModel> {
  get(id: TId, signal?: AbortSignal): Promise<TModel>;
  createOrUpdate(id: TId, body: TRequest, signal?: AbortSignal): Promise<ILongRunningOperation>;
  delete(id: TId, signal?: AbortSignal): Promise<ILongRunningOperation>;
}
