import { type Clock, systemClock } from './Clock';
import { ApiError, isNotFound, type ReconcilePhase, RequestError, TimeoutError } from './errors';
import type { ILongRunningOperation, IResourceApi, IResourceIdentity, OperationStatus } from './IResourceApi';
import { getComponentLogger, type Logger } from './logger';
import { failed, type FetchOutcome, type Outcome, succeeded, timedOut } from './Outcome';

/**
 * How Delete decides a resource is gone:
 * - `probe`: re-read the resource until it reports not found, ignoring the delete operation's status
 * - `operation`: poll the delete operation like any other long-running operation
 */
export type DeleteConfirmation = 'probe' | 'operation';

export interface ReconcilerOptions {
  clock?: Clock;
  logger?: Logger;
  /** Floor between existence probes, and the gap between operation polls when the API gives no hint */
  pollIntervalMs?: number;
  deleteConfirmation?: DeleteConfirmation;
}

export const DEFAULT_POLL_INTERVAL_MS = 15_000;

interface Deadline {
  deadline: number;
  /** Aborts when the deadline passes, cutting off any request still in flight */
  signal: AbortSignal;
  timeoutMs: number;
}

const PHASE_DESCRIPTIONS: Record<ReconcilePhase, string> = {
  'create/update': 'creating/updating',
  read: 'retrieving',
  delete: 'deleting',
  'create/update polling': 'waiting for creation/update of',
  'delete polling': 'waiting for deletion of',
};

function describeDuration(ms: number): string {
  return ms % 1000 === 0 ? `${ms / 1000}s` : `${ms}ms`;
}

/**
 * Settles with `call`, or rejects as soon as `signal` aborts even when the call itself never settles.
 */
async function untilAborted<T>(signal: AbortSignal, call: (signal: AbortSignal) => Promise<T>): Promise<T> {
  signal.throwIfAborted();

  return await new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });

    void call(signal).then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Drives one resource type through create/update, read and delete against its remote API.
 */
export class LifecycleReconciler<TId extends IResourceIdentity, TModel, TRequest = TModel> {
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly pollIntervalMs: number;
  private readonly deleteConfirmation: DeleteConfirmation;

  constructor(
    private readonly api: IResourceApi<TId, TModel, TRequest>,
    options: ReconcilerOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? getComponentLogger('reconciler');
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.deleteConfirmation = options.deleteConfirmation ?? 'probe';

    if (this.pollIntervalMs <= 0) throw new RangeError(`pollIntervalMs must be positive, got ${this.pollIntervalMs}`);
  }

  async apply(id: TId, desired: TRequest, timeoutMs: number): Promise<Outcome> {
    const wait = this.startDeadline(timeoutMs);
    this.logger.info('Creating or updating resource', { resourceId: id.toString() });

    let operation: ILongRunningOperation;
    try {
      operation = await untilAborted(wait.signal, (s) => this.api.createOrUpdate(id, desired, s));
    } catch (error) {
      if (wait.signal.aborted) return timedOut(this.timeoutError(id, 'create/update', timeoutMs));
      return failed(this.requestError(id, 'create/update', error));
    }

    return this.waitForOperation(id, operation, 'create/update polling', wait);
  }

  /**
   * A single read. With a `signal` the read is abandoned once it aborts.
   */
  async fetch(id: TId, signal?: AbortSignal): Promise<FetchOutcome<TModel>> {
    try {
      const model = signal ? await untilAborted(signal, (s) => this.api.get(id, s)) : await this.api.get(id);
      return succeeded({ found: true, model });
    } catch (error) {
      if (isNotFound(error)) return succeeded({ found: false });
      return failed(this.requestError(id, 'read', error));
    }
  }

  async delete(id: TId, timeoutMs: number): Promise<Outcome> {
    const wait = this.startDeadline(timeoutMs);
    this.logger.info('Deleting resource', { resourceId: id.toString(), confirmation: this.deleteConfirmation });

    let operation: ILongRunningOperation | undefined;
    try {
      operation = await untilAborted(wait.signal, (s) => this.api.delete(id, s));
    } catch (error) {
      if (wait.signal.aborted) return timedOut(this.timeoutError(id, 'delete', timeoutMs));
      if (!isNotFound(error)) return failed(this.requestError(id, 'delete', error));
      this.logger.debug('Delete request found no resource', { resourceId: id.toString() });
    }

    if (this.deleteConfirmation === 'operation') {
      if (!operation) return succeeded();
      return this.waitForOperation(id, operation, 'delete polling', wait);
    }

    return this.waitForDeletion(id, wait);
  }

  /**
   * Probes the resource until it is gone. The first probe runs immediately and
   * later probes are never closer together than the poll interval.
   */
  private async waitForDeletion(id: TId, { deadline, signal, timeoutMs }: Deadline): Promise<Outcome> {
    for (let probes = 1; ; probes++) {
      const probe = await this.fetch(id, signal);
      if (probe.kind === 'failed') {
        if (signal.aborted) return timedOut(this.timeoutError(id, 'delete polling', timeoutMs));
        return failed(this.requestError(id, 'delete polling', probe.error.cause ?? probe.error));
      }

      if (!probe.value.found) {
        this.logger.info('Resource deleted', { resourceId: id.toString(), probes });
        return succeeded();
      }

      this.logger.debug('Waiting for resource to be deleted', { resourceId: id.toString(), probes });
      if (!(await this.sleepUntilNextTick(this.pollIntervalMs, deadline))) return timedOut(this.timeoutError(id, 'delete polling', timeoutMs));
    }
  }

  private async waitForOperation(
    id: TId,
    operation: ILongRunningOperation,
    phase: 'create/update polling' | 'delete polling',
    { deadline, signal, timeoutMs }: Deadline
  ): Promise<Outcome> {
    for (;;) {
      let status: OperationStatus;
      try {
        status = await untilAborted(signal, (s) => operation.poll(s));
      } catch (error) {
        if (signal.aborted) return timedOut(this.timeoutError(id, phase, timeoutMs));
        return failed(this.requestError(id, phase, error));
      }

      switch (status.status) {
        case 'Succeeded': {
          return succeeded();
        }
        case 'Failed': {
          return failed(new RequestError(`${PHASE_DESCRIPTIONS[phase]} ${id.toString()}: operation failed: ${status.reason}`, { resourceId: id.toString(), phase }));
        }
        case 'InProgress': {
          const interval = status.retryAfterMs ?? this.pollIntervalMs;
          if (!(await this.sleepUntilNextTick(interval, deadline))) return timedOut(this.timeoutError(id, phase, timeoutMs));
          break;
        }
      }
    }
  }

  private startDeadline(timeoutMs: number): Deadline {
    return { deadline: this.clock.now() + timeoutMs, signal: this.clock.timeout(timeoutMs), timeoutMs };
  }

  /**
   * Sleeps one interval. When a full interval would overrun the deadline it sleeps
   * only until the deadline and returns false.
   */
  private async sleepUntilNextTick(intervalMs: number, deadline: number): Promise<boolean> {
    const remaining = deadline - this.clock.now();
    if (remaining < intervalMs) {
      if (remaining > 0) await this.clock.sleep(remaining);
      return false;
    }

    await this.clock.sleep(intervalMs);
    return true;
  }

  private requestError(id: TId, phase: ReconcilePhase, error: unknown): RequestError {
    const detail = error instanceof Error ? error.message : String(error);
    const statusCode = error instanceof ApiError || error instanceof RequestError ? error.statusCode : undefined;

    return new RequestError(`${PHASE_DESCRIPTIONS[phase]} ${id.toString()}: ${detail}`, { resourceId: id.toString(), phase, statusCode, cause: error });
  }

  private timeoutError(id: TId, phase: ReconcilePhase, timeoutMs: number): TimeoutError {
    this.logger.warn('Timed out waiting for resource', { resourceId: id.toString(), phase, timeoutMs });
    return new TimeoutError(`${PHASE_DESCRIPTIONS[phase]} ${id.toString()}: timed out after ${describeDuration(timeoutMs)}`, id.toString(), phase, timeoutMs);
  }
}
