import { ConfigurationError } from '@stratoform/reconciler';

export const DEFAULT_ENDPOINT = 'https://management.azure.com';

export interface ProviderFeatures {
  /** Send `forceToPurge=true` when deleting a machine learning workspace */
  purgeSoftDeletedWorkspaceOnDestroy: boolean;
}

export interface ProviderConfig {
  subscriptionId: string;
  accessToken: string;
  endpoint: string;
  features: ProviderFeatures;
}

function parseBoolean(value: string | undefined, setting: string): boolean {
  if (value === undefined || value === '') return false;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  throw new ConfigurationError(`${setting} must be "true" or "false", got "${value}"`, setting);
}

function required(value: string | undefined, setting: string, hint: string): string {
  const trimmed = value?.trim();
  if (!trimmed) throw new ConfigurationError(`${setting} is not set. ${hint}`, setting);
  return trimmed;
}

/**
 * Builds the provider configuration from environment variables; explicit overrides win.
 */
export function loadProviderConfig(env: NodeJS.ProcessEnv = process.env, overrides: { subscriptionId?: string } = {}): ProviderConfig {
  const subscriptionId = required(overrides.subscriptionId ?? env.STRATOFORM_SUBSCRIPTION_ID, 'STRATOFORM_SUBSCRIPTION_ID', 'Set it or pass --subscription.');
  const accessToken = required(env.STRATOFORM_ACCESS_TOKEN, 'STRATOFORM_ACCESS_TOKEN', 'Set it to a bearer token for the management API.');

  const endpoint = env.STRATOFORM_ENDPOINT?.trim() || DEFAULT_ENDPOINT;
  if (!URL.canParse(endpoint)) throw new ConfigurationError(`STRATOFORM_ENDPOINT is not a valid URL: "${endpoint}"`, 'STRATOFORM_ENDPOINT');

  return {
    subscriptionId,
    accessToken,
    endpoint: endpoint.replace(/\/+$/, ''),
    features: {
      purgeSoftDeletedWorkspaceOnDestroy: parseBoolean(env.STRATOFORM_PURGE_SOFT_DELETED_WORKSPACE, 'STRATOFORM_PURGE_SOFT_DELETED_WORKSPACE'),
    },
  };
}
