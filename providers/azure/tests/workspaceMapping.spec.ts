import { ValidationError } from '@stratoform/reconciler';
import { describe, expect, it } from 'vitest';

import type { Workspace } from '../src/client/models';
import { WorkspaceId } from '../src/ids';
import {
  expandEncryption,
  expandFeatureStore,
  expandIdentity,
  expandManagedNetwork,
  expandServerlessCompute,
  expandWorkspace,
  flattenEncryption,
  flattenFeatureStore,
  flattenIdentity,
  flattenManagedNetwork,
  flattenServerlessCompute,
  flattenWorkspace,
} from '../src/resources/workspaceMapping';
import { SUB } from './helpers';

const RG = `/subscriptions/${SUB}/resourceGroups/rg-ml`;
const UAI = `${RG}/providers/Microsoft.ManagedIdentity/userAssignedIdentities/uai-example`;
const KEY_VAULT = `${RG}/providers/Microsoft.KeyVault/vaults/kv-example`;
const APP_INSIGHTS = `${RG}/providers/Microsoft.Insights/components/ai-example`;
const STORAGE = `${RG}/providers/Microsoft.Storage/storageAccounts/saexample`;

const id = new WorkspaceId(SUB, 'rg-ml', 'ws-example');

const baseInputs = {
  name: 'ws-example',
  location: 'West Europe',
  resource_group_name: 'rg-ml',
  application_insights_id: APP_INSIGHTS,
  key_vault_id: KEY_VAULT,
  storage_account_id: STORAGE,
  identity: [{ type: 'SystemAssigned' }],
};

describe('workspace mapping', () => {
  describe('identity', () => {
    it('should send the combined identity type without a space', () => {
      expect(expandIdentity({ type: 'SystemAssigned, UserAssigned', identity_ids: [UAI] })).toEqual({
        type: 'SystemAssigned,UserAssigned',
        userAssignedIdentities: { [UAI]: {} },
      });
    });

    it('should require identity_ids for user-assigned identities', () => {
      expect(() => expandIdentity({ type: 'UserAssigned' })).toThrow('`identity_ids` must be specified when `type` includes `UserAssigned`');
    });

    it('should reject identity_ids for a system-assigned identity', () => {
      expect(() => expandIdentity({ type: 'SystemAssigned', identity_ids: [UAI] })).toThrow('`identity_ids` can only be specified when `type` includes `UserAssigned`');
    });

    it('should require the identity block', () => {
      expect(() => expandIdentity(undefined)).toThrow(ValidationError);
    });

    it('should flatten back to the spaced type with normalized IDs', () => {
      const lowerCased = UAI.replace('resourceGroups', 'resourcegroups').replace('Microsoft.ManagedIdentity', 'microsoft.managedidentity');

      expect(
        flattenIdentity({
          type: 'SystemAssigned,UserAssigned',
          principalId: 'principal-1',
          tenantId: 'tenant-1',
          userAssignedIdentities: { [lowerCased]: { clientId: 'client-1' } },
        })
      ).toEqual([{ type: 'SystemAssigned, UserAssigned', identity_ids: [UAI], principal_id: 'principal-1', tenant_id: 'tenant-1' }]);
    });

    it('should flatten no identity to an empty list', () => {
      expect(flattenIdentity(undefined)).toEqual([]);
      expect(flattenIdentity({ type: 'None' })).toEqual([]);
    });
  });

  describe('encryption', () => {
    it('should expand with the user-assigned identity when given', () => {
      expect(expandEncryption({ key_vault_id: KEY_VAULT, key_id: 'https://kv-example.vault.test/keys/cmk/1', user_assigned_identity_id: UAI })).toEqual({
        status: 'Enabled',
        keyVaultProperties: { keyVaultArmId: KEY_VAULT, keyIdentifier: 'https://kv-example.vault.test/keys/cmk/1' },
        identity: { userAssignedIdentity: UAI },
      });
    });

    it('should expand without an identity', () => {
      expect(expandEncryption({ key_vault_id: KEY_VAULT, key_id: 'https://kv-example.vault.test/keys/cmk/1' })?.identity).toEqual({});
      expect(expandEncryption(undefined)).toBeUndefined();
    });

    it('should only flatten enabled encryption', () => {
      const keyVaultProperties = { keyVaultArmId: KEY_VAULT, keyIdentifier: 'https://kv-example.vault.test/keys/cmk/1' };

      expect(flattenEncryption({ status: 'Disabled', keyVaultProperties })).toEqual([]);
      expect(flattenEncryption({ status: 'Enabled', keyVaultProperties, identity: { userAssignedIdentity: UAI.toLowerCase() } })).toEqual([
        {
          user_assigned_identity_id: `/subscriptions/${SUB}/resourceGroups/rg-ml/providers/Microsoft.ManagedIdentity/userAssignedIdentities/uai-example`,
          key_vault_id: KEY_VAULT,
          key_id: 'https://kv-example.vault.test/keys/cmk/1',
        },
      ]);
    });
  });

  describe('feature store', () => {
    it('should only send configured settings', () => {
      expect(expandFeatureStore({ computer_spark_runtime_version: '3.3', offline_connection_name: '', online_connection_name: 'online' })).toEqual({
        computeRuntime: { sparkRuntimeVersion: '3.3' },
        onlineStoreConnectionName: 'online',
      });
    });

    it('should flatten missing settings to empty strings', () => {
      expect(flattenFeatureStore({ offlineStoreConnectionName: 'offline' })).toEqual([{ computer_spark_runtime_version: '', offline_connection_name: 'offline', online_connection_name: '' }]);
      expect(flattenFeatureStore(undefined)).toEqual([]);
    });
  });

  describe('managed network', () => {
    it('should round-trip the isolation mode', () => {
      expect(expandManagedNetwork({ isolation_mode: 'AllowOnlyApprovedOutbound' })).toEqual({ isolationMode: 'AllowOnlyApprovedOutbound' });
      expect(expandManagedNetwork({})).toEqual({});
      expect(flattenManagedNetwork({ isolationMode: 'Disabled' })).toEqual([{ isolation_mode: 'Disabled' }]);
      expect(flattenManagedNetwork({})).toEqual([{}]);
      expect(flattenManagedNetwork(undefined)).toEqual([]);
    });
  });

  describe('serverless compute', () => {
    it('should invert public_ip_enabled', () => {
      expect(expandServerlessCompute({ public_ip_enabled: true })).toEqual({ serverlessComputeNoPublicIP: false });
      expect(expandServerlessCompute({ subnet_id: 'subnet' })).toEqual({ serverlessComputeNoPublicIP: true, serverlessComputeCustomSubnet: 'subnet' });
      expect(flattenServerlessCompute({ serverlessComputeNoPublicIP: true, serverlessComputeCustomSubnet: 'subnet' })).toEqual([{ subnet_id: 'subnet', public_ip_enabled: false }]);
      expect(flattenServerlessCompute(undefined)).toEqual([]);
    });
  });

  describe('expandWorkspace', () => {
    it('should build the request body', () => {
      expect(expandWorkspace(id, { ...baseInputs, tags: { env: 'test' }, description: 'demo', high_business_impact: true })).toEqual({
        name: 'ws-example',
        location: 'westeurope',
        tags: { env: 'test' },
        sku: { name: 'Basic', tier: 'Basic' },
        kind: 'Default',
        identity: { type: 'SystemAssigned' },
        properties: {
          applicationInsights: APP_INSIGHTS,
          keyVault: KEY_VAULT,
          storageAccount: STORAGE,
          publicNetworkAccess: 'Disabled',
          v1LegacyMode: false,
          description: 'demo',
          hbiWorkspace: true,
        },
      });
    });

    it('should enable public network access when requested', () => {
      expect(expandWorkspace(id, { ...baseInputs, public_network_access_enabled: true }).properties?.publicNetworkAccess).toBe('Enabled');
    });

    it('should reject a feature store on a default workspace', () => {
      expect(() => expandWorkspace(id, { ...baseInputs, feature_store: [{ online_connection_name: 'online' }] })).toThrow('`feature_store` can only be set when `kind` is `FeatureStore`');
    });

    it('should require a feature store for kind FeatureStore', () => {
      expect(() => expandWorkspace(id, { ...baseInputs, kind: 'FeatureStore' })).toThrow('`feature_store` can not be empty when `kind` is `FeatureStore`');
    });

    it('should send the feature store settings for kind FeatureStore', () => {
      const body = expandWorkspace(id, { ...baseInputs, kind: 'FeatureStore', feature_store: [{ offline_connection_name: 'offline' }] });

      expect(body.kind).toBe('FeatureStore');
      expect(body.properties?.featureStoreSettings).toEqual({ offlineStoreConnectionName: 'offline' });
    });

    it('should require a public IP for serverless compute without a subnet on a private workspace', () => {
      expect(() => expandWorkspace(id, { ...baseInputs, serverless_compute: [{ public_ip_enabled: false }] })).toThrow(
        '`public_ip_enabled` must be set to `true` if `subnet_id` is not set and `public_network_access_enabled` is `false`'
      );
    });

    it('should allow serverless compute without a public IP when a subnet is set', () => {
      const body = expandWorkspace(id, { ...baseInputs, serverless_compute: [{ subnet_id: 'subnet', public_ip_enabled: false }] });

      expect(body.properties?.serverlessComputeSettings).toEqual({ serverlessComputeNoPublicIP: true, serverlessComputeCustomSubnet: 'subnet' });
    });

    it('should refuse to turn off the public IP of existing serverless compute without a subnet', () => {
      const current: Workspace = { properties: { serverlessComputeSettings: { serverlessComputeNoPublicIP: false } } };
      const inputs = { ...baseInputs, public_network_access_enabled: true, serverless_compute: [{ public_ip_enabled: false }] };

      expect(() => expandWorkspace(id, inputs)).not.toThrow();
      expect(() => expandWorkspace(id, inputs, current)).toThrow('Not supported to update `public_ip_enabled` from `true` to `false` when `subnet_id` is null or empty');
    });
  });

  describe('flattenWorkspace', () => {
    it('should flatten the API model into attributes', () => {
      const model: Workspace = {
        location: 'West Europe',
        kind: 'Default',
        sku: { name: 'Basic', tier: 'Basic' },
        identity: { type: 'SystemAssigned', principalId: 'principal-1', tenantId: 'tenant-1' },
        tags: { env: 'test' },
        properties: {
          applicationInsights: APP_INSIGHTS.replace('Microsoft.Insights', 'microsoft.insights'),
          keyVault: KEY_VAULT.replace('resourceGroups', 'resourcegroups'),
          storageAccount: STORAGE,
          discoveryUrl: 'https://westeurope.api.example.test/discovery',
          publicNetworkAccess: 'Enabled',
          v1LegacyMode: false,
          workspaceId: 'workspace-guid',
          managedNetwork: { isolationMode: 'Disabled' },
        },
      };

      expect(flattenWorkspace(id, model)).toEqual({
        name: 'ws-example',
        resource_group_name: 'rg-ml',
        location: 'westeurope',
        sku_name: 'Basic',
        kind: 'Default',
        application_insights_id: APP_INSIGHTS,
        key_vault_id: KEY_VAULT,
        storage_account_id: STORAGE,
        container_registry_id: '',
        description: '',
        friendly_name: '',
        high_business_impact: false,
        image_build_compute_name: '',
        discovery_url: 'https://westeurope.api.example.test/discovery',
        primary_user_assigned_identity: '',
        public_network_access_enabled: true,
        v1_legacy_mode_enabled: false,
        workspace_id: 'workspace-guid',
        identity: [{ type: 'SystemAssigned', identity_ids: [], principal_id: 'principal-1', tenant_id: 'tenant-1' }],
        encryption: [],
        feature_store: [],
        managed_network: [{ isolation_mode: 'Disabled' }],
        serverless_compute: [],
        tags: { env: 'test' },
      });
    });
  });
});
