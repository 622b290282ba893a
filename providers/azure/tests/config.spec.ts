import { ConfigurationError } from '@stratoform/reconciler';
import { describe, expect, it } from 'vitest';

import { DEFAULT_ENDPOINT, loadProviderConfig } from '../src/config';

const SUB = '00000000-0000-0000-0000-000000000000';

describe('loadProviderConfig', () => {
  const env = { STRATOFORM_SUBSCRIPTION_ID: SUB, STRATOFORM_ACCESS_TOKEN: 'test-token' };

  it('should load the required settings with defaults', () => {
    expect(loadProviderConfig(env)).toEqual({
      subscriptionId: SUB,
      accessToken: 'test-token',
      endpoint: DEFAULT_ENDPOINT,
      features: { purgeSoftDeletedWorkspaceOnDestroy: false },
    });
  });

  it('should prefer an explicit subscription', () => {
    expect(loadProviderConfig(env, { subscriptionId: 'other-sub' }).subscriptionId).toBe('other-sub');
  });

  it('should fail when the subscription is missing', () => {
    expect(() => loadProviderConfig({ STRATOFORM_ACCESS_TOKEN: 'test-token' })).toThrow('STRATOFORM_SUBSCRIPTION_ID is not set. Set it or pass --subscription.');
  });

  it('should fail when the access token is missing', () => {
    expect(() => loadProviderConfig({ STRATOFORM_SUBSCRIPTION_ID: SUB, STRATOFORM_ACCESS_TOKEN: '  ' })).toThrow(ConfigurationError);
  });

  it('should trim a trailing slash from a custom endpoint', () => {
    expect(loadProviderConfig({ ...env, STRATOFORM_ENDPOINT: 'http://localhost:8080/' }).endpoint).toBe('http://localhost:8080');
  });

  it('should reject an endpoint that is not a URL', () => {
    expect(() => loadProviderConfig({ ...env, STRATOFORM_ENDPOINT: 'not a url' })).toThrow('STRATOFORM_ENDPOINT is not a valid URL: "not a url"');
  });

  it('should parse the purge feature flag', () => {
    expect(loadProviderConfig({ ...env, STRATOFORM_PURGE_SOFT_DELETED_WORKSPACE: 'TRUE' }).features.purgeSoftDeletedWorkspaceOnDestroy).toBe(true);
    expect(loadProviderConfig({ ...env, STRATOFORM_PURGE_SOFT_DELETED_WORKSPACE: 'false' }).features.purgeSoftDeletedWorkspaceOnDestroy).toBe(false);
    expect(() => loadProviderConfig({ ...env, STRATOFORM_PURGE_SOFT_DELETED_WORKSPACE: 'maybe' })).toThrow('STRATOFORM_PURGE_SOFT_DELETED_WORKSPACE must be "true" or "false", got "maybe"');
  });
});
