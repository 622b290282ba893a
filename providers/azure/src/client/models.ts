import { type } from 'arktype';

/*
 * Response and request bodies of the management API. Undeclared keys are ignored;
 * `null` values are dropped before validation (see ManagementClient).
 */

export const Sku = type({
  name: 'string',
  'tier?': 'string',
});
export type Sku = typeof Sku.infer;

export const ErrorResponse = type({
  error: {
    'code?': 'string',
    'message?': 'string',
  },
});

export const AsyncOperationStatus = type({
  status: 'string',
  'error?': {
    'code?': 'string',
    'message?': 'string',
  },
});

export const ProvisioningStateBody = type({
  'properties?': {
    'provisioningState?': 'string',
  },
});

// Machine learning workspaces

export const WorkspaceIdentity = type({
  type: 'string',
  'principalId?': 'string',
  'tenantId?': 'string',
  'userAssignedIdentities?': {
    '[string]': {
      'clientId?': 'string',
      'principalId?': 'string',
    },
  },
});
export type WorkspaceIdentity = typeof WorkspaceIdentity.infer;

export const EncryptionProperty = type({
  status: "'Enabled' | 'Disabled'",
  keyVaultProperties: {
    keyVaultArmId: 'string',
    keyIdentifier: 'string',
    'identityClientId?': 'string',
  },
  'identity?': {
    'userAssignedIdentity?': 'string',
  },
});
export type EncryptionProperty = typeof EncryptionProperty.infer;

export const FeatureStoreSettings = type({
  'computeRuntime?': {
    'sparkRuntimeVersion?': 'string',
  },
  'offlineStoreConnectionName?': 'string',
  'onlineStoreConnectionName?': 'string',
});
export type FeatureStoreSettings = typeof FeatureStoreSettings.infer;

export const ManagedNetworkSettings = type({
  'isolationMode?': 'string',
});
export type ManagedNetworkSettings = typeof ManagedNetworkSettings.infer;

export const ServerlessComputeSettings = type({
  'serverlessComputeCustomSubnet?': 'string',
  'serverlessComputeNoPublicIP?': 'boolean',
});
export type ServerlessComputeSettings = typeof ServerlessComputeSettings.infer;

export const Workspace = type({
  'id?': 'string',
  'name?': 'string',
  'location?': 'string',
  'kind?': 'string',
  'sku?': Sku,
  'identity?': WorkspaceIdentity,
  'tags?': { '[string]': 'string' },
  'properties?': {
    'applicationInsights?': 'string',
    'containerRegistry?': 'string',
    'description?': 'string',
    'discoveryUrl?': 'string',
    'encryption?': EncryptionProperty,
    'featureStoreSettings?': FeatureStoreSettings,
    'friendlyName?': 'string',
    'hbiWorkspace?': 'boolean',
    'imageBuildCompute?': 'string',
    'keyVault?': 'string',
    'managedNetwork?': ManagedNetworkSettings,
    'primaryUserAssignedIdentity?': 'string',
    'provisioningState?': 'string',
    'publicNetworkAccess?': "'Enabled' | 'Disabled'",
    'serverlessComputeSettings?': ServerlessComputeSettings,
    'storageAccount?': 'string',
    'v1LegacyMode?': 'boolean',
    'workspaceId?': 'string',
  },
});
export type Workspace = typeof Workspace.infer;
export type WorkspaceProperties = NonNullable<Workspace['properties']>;

// Relay namespaces

export const RelayNamespace = type({
  'id?': 'string',
  'name?': 'string',
  location: 'string',
  'sku?': Sku,
  'tags?': { '[string]': 'string' },
  'properties?': {
    'metricId?': 'string',
    'provisioningState?': 'string',
    'serviceBusEndpoint?': 'string',
  },
});
export type RelayNamespace = typeof RelayNamespace.infer;

export const AccessKeys = type({
  'keyName?': 'string',
  'primaryConnectionString?': 'string',
  'secondaryConnectionString?': 'string',
  'primaryKey?': 'string',
  'secondaryKey?': 'string',
});
export type AccessKeys = typeof AccessKeys.infer;
