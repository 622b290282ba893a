import type { IProvider } from '@stratoform/contracts';
import { AzureProvider, loadProviderConfig } from '@stratoform/provider-azure';
import { getComponentLogger } from '@stratoform/reconciler';
import { DEFAULT_STATE_PATH, LocalBackend, StateManager } from '@stratoform/state';
import path from 'node:path';

export function resolveStatePath(statePath?: string): string {
  return path.resolve(process.cwd(), statePath ?? DEFAULT_STATE_PATH);
}

export function getStateManager(statePath?: string): StateManager {
  return new StateManager(new LocalBackend(resolveStatePath(statePath)));
}

/**
 * Provider for the current environment. `--subscription` wins over STRATOFORM_SUBSCRIPTION_ID.
 */
export function createProvider(subscription?: string): IProvider {
  const config = loadProviderConfig(process.env, { subscriptionId: subscription });
  return new AzureProvider({ config, logger: getComponentLogger('provider-azure') });
}
