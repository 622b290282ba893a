import { ValidationError } from '@stratoform/reconciler';

import { type Attributes, getBlock, getBoolean, getString, getStringList, getStringMap, normalizeLocation, requireString } from '../attributes';
import type { EncryptionProperty, FeatureStoreSettings, ManagedNetworkSettings, ServerlessComputeSettings, Workspace, WorkspaceIdentity, WorkspaceProperties } from '../client/models';
import { APPLICATION_INSIGHTS_ID, KEY_VAULT_ID, USER_ASSIGNED_IDENTITY_ID, type WorkspaceId } from '../ids';

export const MACHINE_LEARNING_WORKSPACE_TYPE = 'azure_machine_learning_workspace';

const SYSTEM_AND_USER_ASSIGNED = 'SystemAssigned, UserAssigned';
// The workspaces API spells the combined identity type without a space
const API_SYSTEM_AND_USER_ASSIGNED = 'SystemAssigned,UserAssigned';

function invalid(message: string, field: string): ValidationError {
  return new ValidationError(message, MACHINE_LEARNING_WORKSPACE_TYPE, field);
}

export function expandIdentity(block: Attributes | undefined): WorkspaceIdentity {
  if (!block) throw invalid(`${MACHINE_LEARNING_WORKSPACE_TYPE} requires "identity" block`, 'identity');

  const identityType = requireString(block, 'type', MACHINE_LEARNING_WORKSPACE_TYPE);
  const identityIds = getStringList(block, 'identity_ids');

  if (identityType.includes('UserAssigned') && identityIds.length === 0) throw invalid('expanding `identity`: `identity_ids` must be specified when `type` includes `UserAssigned`', 'identity.0.identity_ids');
  if (!identityType.includes('UserAssigned') && identityIds.length > 0) throw invalid('expanding `identity`: `identity_ids` can only be specified when `type` includes `UserAssigned`', 'identity.0.identity_ids');

  const identity: WorkspaceIdentity = { type: identityType === SYSTEM_AND_USER_ASSIGNED ? API_SYSTEM_AND_USER_ASSIGNED : identityType };
  if (identityIds.length > 0) {
    const userAssignedIdentities: NonNullable<WorkspaceIdentity['userAssignedIdentities']> = {};
    for (const identityId of identityIds) userAssignedIdentities[identityId] = {};
    identity.userAssignedIdentities = userAssignedIdentities;
  }
  return identity;
}

export function flattenIdentity(input: WorkspaceIdentity | undefined): Attributes[] {
  if (!input || input.type === 'None') return [];

  return [
    {
      type: input.type === API_SYSTEM_AND_USER_ASSIGNED ? SYSTEM_AND_USER_ASSIGNED : input.type,
      identity_ids: Object.keys(input.userAssignedIdentities ?? {}).map((id) => USER_ASSIGNED_IDENTITY_ID.normalize(id)),
      principal_id: input.principalId ?? '',
      tenant_id: input.tenantId ?? '',
    },
  ];
}

export function expandEncryption(block: Attributes | undefined): EncryptionProperty | undefined {
  if (!block) return undefined;

  const userAssignedIdentity = getString(block, 'user_assigned_identity_id');
  return {
    status: 'Enabled',
    keyVaultProperties: {
      keyVaultArmId: requireString(block, 'key_vault_id', MACHINE_LEARNING_WORKSPACE_TYPE),
      keyIdentifier: requireString(block, 'key_id', MACHINE_LEARNING_WORKSPACE_TYPE),
    },
    identity: userAssignedIdentity ? { userAssignedIdentity } : {},
  };
}

export function flattenEncryption(input: EncryptionProperty | undefined): Attributes[] {
  if (!input || input.status !== 'Enabled') return [];

  const userAssignedIdentity = input.identity?.userAssignedIdentity;
  return [
    {
      user_assigned_identity_id: userAssignedIdentity ? USER_ASSIGNED_IDENTITY_ID.normalize(userAssignedIdentity) : '',
      key_vault_id: input.keyVaultProperties.keyVaultArmId,
      key_id: input.keyVaultProperties.keyIdentifier,
    },
  ];
}

export function expandFeatureStore(block: Attributes | undefined): FeatureStoreSettings | undefined {
  if (!block) return undefined;

  const settings: FeatureStoreSettings = {};
  const sparkRuntimeVersion = getString(block, 'computer_spark_runtime_version');
  const offline = getString(block, 'offline_connection_name');
  const online = getString(block, 'online_connection_name');

  if (sparkRuntimeVersion) settings.computeRuntime = { sparkRuntimeVersion };
  if (offline) settings.offlineStoreConnectionName = offline;
  if (online) settings.onlineStoreConnectionName = online;
  return settings;
}

export function flattenFeatureStore(input: FeatureStoreSettings | undefined): Attributes[] {
  if (!input) return [];

  return [
    {
      computer_spark_runtime_version: input.computeRuntime?.sparkRuntimeVersion ?? '',
      offline_connection_name: input.offlineStoreConnectionName ?? '',
      online_connection_name: input.onlineStoreConnectionName ?? '',
    },
  ];
}

export function expandManagedNetwork(block: Attributes | undefined): ManagedNetworkSettings | undefined {
  if (!block) return undefined;

  const isolationMode = getString(block, 'isolation_mode');
  return isolationMode ? { isolationMode } : {};
}

export function flattenManagedNetwork(input: ManagedNetworkSettings | undefined): Attributes[] {
  if (!input) return [];
  return [input.isolationMode === undefined ? {} : { isolation_mode: input.isolationMode }];
}

export function expandServerlessCompute(block: Attributes | undefined): ServerlessComputeSettings | undefined {
  if (!block) return undefined;

  const settings: ServerlessComputeSettings = { serverlessComputeNoPublicIP: !(getBoolean(block, 'public_ip_enabled') ?? false) };
  const subnetId = getString(block, 'subnet_id');
  if (subnetId) settings.serverlessComputeCustomSubnet = subnetId;
  return settings;
}

export function flattenServerlessCompute(input: ServerlessComputeSettings | undefined): Attributes[] {
  if (!input) return [];

  const block: Attributes = {};
  if (input.serverlessComputeCustomSubnet !== undefined) block.subnet_id = input.serverlessComputeCustomSubnet;
  if (input.serverlessComputeNoPublicIP !== undefined) block.public_ip_enabled = !input.serverlessComputeNoPublicIP;
  return [block];
}

/**
 * Builds the request body from configured attributes (defaults already applied).
 * `current` is the workspace as it exists remotely when updating.
 */
export function expandWorkspace(id: WorkspaceId, inputs: Attributes, current?: Workspace): Workspace {
  const kind = getString(inputs, 'kind') ?? 'Default';
  const skuName = getString(inputs, 'sku_name') ?? 'Basic';
  const publicNetworkAccessEnabled = getBoolean(inputs, 'public_network_access_enabled') ?? false;

  const serverlessCompute = expandServerlessCompute(getBlock(inputs, 'serverless_compute'));
  if (serverlessCompute && serverlessCompute.serverlessComputeCustomSubnet === undefined) {
    if (serverlessCompute.serverlessComputeNoPublicIP && !publicNetworkAccessEnabled) {
      throw invalid('`public_ip_enabled` must be set to `true` if `subnet_id` is not set and `public_network_access_enabled` is `false`', 'serverless_compute.0.public_ip_enabled');
    }

    const previous = current?.properties?.serverlessComputeSettings;
    const wasPublic = previous?.serverlessComputeNoPublicIP === false;
    if (wasPublic && serverlessCompute.serverlessComputeNoPublicIP) {
      throw invalid('Not supported to update `public_ip_enabled` from `true` to `false` when `subnet_id` is null or empty', 'serverless_compute.0.public_ip_enabled');
    }
  }

  const featureStore = expandFeatureStore(getBlock(inputs, 'feature_store'));
  if (kind.toLowerCase() === 'default') {
    if (featureStore) throw invalid('`feature_store` can only be set when `kind` is `FeatureStore`', 'feature_store');
  } else if (!featureStore) {
    throw invalid('`feature_store` can not be empty when `kind` is `FeatureStore`', 'feature_store');
  }

  const properties: WorkspaceProperties = {
    applicationInsights: requireString(inputs, 'application_insights_id', MACHINE_LEARNING_WORKSPACE_TYPE),
    keyVault: requireString(inputs, 'key_vault_id', MACHINE_LEARNING_WORKSPACE_TYPE),
    storageAccount: requireString(inputs, 'storage_account_id', MACHINE_LEARNING_WORKSPACE_TYPE),
    publicNetworkAccess: publicNetworkAccessEnabled ? 'Enabled' : 'Disabled',
    v1LegacyMode: getBoolean(inputs, 'v1_legacy_mode_enabled') ?? false,
    encryption: expandEncryption(getBlock(inputs, 'encryption')),
    managedNetwork: expandManagedNetwork(getBlock(inputs, 'managed_network')),
    serverlessComputeSettings: serverlessCompute,
    featureStoreSettings: featureStore,
  };

  const description = getString(inputs, 'description');
  if (description) properties.description = description;

  const friendlyName = getString(inputs, 'friendly_name');
  if (friendlyName) properties.friendlyName = friendlyName;

  const containerRegistry = getString(inputs, 'container_registry_id');
  if (containerRegistry) properties.containerRegistry = containerRegistry;

  const imageBuildCompute = getString(inputs, 'image_build_compute_name');
  if (imageBuildCompute) properties.imageBuildCompute = imageBuildCompute;

  const primaryUserAssignedIdentity = getString(inputs, 'primary_user_assigned_identity');
  if (primaryUserAssignedIdentity) properties.primaryUserAssignedIdentity = primaryUserAssignedIdentity;

  if (getBoolean(inputs, 'high_business_impact')) properties.hbiWorkspace = true;

  return {
    name: id.workspaceName,
    location: normalizeLocation(requireString(inputs, 'location', MACHINE_LEARNING_WORKSPACE_TYPE)),
    tags: getStringMap(inputs, 'tags'),
    sku: { name: skuName, tier: skuName },
    kind,
    identity: expandIdentity(getBlock(inputs, 'identity')),
    properties,
  };
}

export function flattenWorkspace(id: WorkspaceId, model: Workspace): Attributes {
  const props: WorkspaceProperties = model.properties ?? {};

  return {
    name: id.workspaceName,
    resource_group_name: id.resourceGroupName,
    location: model.location ? normalizeLocation(model.location) : '',
    sku_name: model.sku?.name ?? '',
    kind: model.kind ?? '',
    application_insights_id: props.applicationInsights ? APPLICATION_INSIGHTS_ID.normalize(props.applicationInsights) : '',
    key_vault_id: props.keyVault ? KEY_VAULT_ID.normalize(props.keyVault) : '',
    storage_account_id: props.storageAccount ?? '',
    container_registry_id: props.containerRegistry ?? '',
    description: props.description ?? '',
    friendly_name: props.friendlyName ?? '',
    high_business_impact: props.hbiWorkspace ?? false,
    image_build_compute_name: props.imageBuildCompute ?? '',
    discovery_url: props.discoveryUrl ?? '',
    primary_user_assigned_identity: props.primaryUserAssignedIdentity ?? '',
    public_network_access_enabled: props.publicNetworkAccess === 'Enabled',
    v1_legacy_mode_enabled: props.v1LegacyMode ?? false,
    workspace_id: props.workspaceId ?? '',
    identity: flattenIdentity(model.identity),
    encryption: flattenEncryption(props.encryption),
    feature_store: flattenFeatureStore(props.featureStoreSettings),
    managed_network: flattenManagedNetwork(props.managedNetwork),
    serverless_compute: flattenServerlessCompute(props.serverlessComputeSettings),
    tags: model.tags ?? {},
  };
}
