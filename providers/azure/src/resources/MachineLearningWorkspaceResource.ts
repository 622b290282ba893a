import type { IResourceHandler, IResourceTimeouts, ISchema } from '@stratoform/contracts';
import { getComponentLogger, type IResourceApi, LifecycleReconciler, type Logger, ResourceExistsError, unwrap, ValidationError } from '@stratoform/reconciler';

import { type Attributes, getBlock, getString, requireString } from '../attributes';
import type { Workspace } from '../client/models';
import { APPLICATION_INSIGHTS_ID, CONTAINER_REGISTRY_ID, KEY_VAULT_ID, type ResourceIdFormat, STORAGE_ACCOUNT_ID, SUBNET_ID, USER_ASSIGNED_IDENTITY_ID, WorkspaceId } from '../ids';
import { applyDefaults, assertUpdatableInPlace, MINUTE, resolveTimeouts, validateAttributes } from '../schema';
import type { ResourceContext } from './RelayNamespaceResource';
import { expandWorkspace, flattenWorkspace, MACHINE_LEARNING_WORKSPACE_TYPE } from './workspaceMapping';

const WORKSPACE_NAME = /^[A-Za-z0-9][A-Za-z0-9_-]{2,32}$/;

const IDENTITY_TYPES = ['SystemAssigned', 'UserAssigned', 'SystemAssigned, UserAssigned'] as const;
const ISOLATION_MODES = ['Disabled', 'AllowInternetOutbound', 'AllowOnlyApprovedOutbound'] as const;

export class MachineLearningWorkspaceResource implements IResourceHandler {
  readonly timeouts: IResourceTimeouts = { create: 30 * MINUTE, update: 30 * MINUTE, delete: 30 * MINUTE };

  private readonly schema: ISchema = {
    name: { type: 'string', required: true, forceNew: true },
    location: { type: 'string', required: true, forceNew: true },
    resource_group_name: { type: 'string', required: true, forceNew: true },
    application_insights_id: { type: 'string', required: true, forceNew: true },
    key_vault_id: { type: 'string', required: true, forceNew: true },
    storage_account_id: { type: 'string', required: true, forceNew: true },
    identity: {
      type: 'list',
      required: true,
      maxItems: 1,
      block: {
        type: { type: 'string', required: true, allowedValues: IDENTITY_TYPES },
        identity_ids: { type: 'list', optional: true, elemType: 'string' },
        principal_id: { type: 'string', computed: true },
        tenant_id: { type: 'string', computed: true },
      },
    },
    kind: { type: 'string', optional: true, default: 'Default', allowedValues: ['Default', 'FeatureStore'] },
    feature_store: {
      type: 'list',
      optional: true,
      maxItems: 1,
      block: {
        computer_spark_runtime_version: { type: 'string', optional: true },
        offline_connection_name: { type: 'string', optional: true },
        online_connection_name: { type: 'string', optional: true },
      },
    },
    primary_user_assigned_identity: { type: 'string', optional: true },
    container_registry_id: { type: 'string', optional: true, forceNew: true },
    public_network_access_enabled: { type: 'boolean', optional: true, computed: true },
    image_build_compute_name: { type: 'string', optional: true },
    description: { type: 'string', optional: true },
    encryption: {
      type: 'list',
      optional: true,
      forceNew: true,
      maxItems: 1,
      block: {
        key_vault_id: { type: 'string', required: true },
        key_id: { type: 'string', required: true },
        user_assigned_identity_id: { type: 'string', optional: true },
      },
    },
    managed_network: {
      type: 'list',
      optional: true,
      computed: true,
      maxItems: 1,
      block: {
        isolation_mode: { type: 'string', optional: true, computed: true, allowedValues: ISOLATION_MODES },
      },
    },
    friendly_name: { type: 'string', optional: true },
    high_business_impact: { type: 'boolean', optional: true, forceNew: true },
    sku_name: { type: 'string', optional: true, default: 'Basic', allowedValues: ['Basic'] },
    v1_legacy_mode_enabled: { type: 'boolean', optional: true, default: false },
    serverless_compute: {
      type: 'list',
      optional: true,
      maxItems: 1,
      block: {
        subnet_id: { type: 'string', optional: true },
        public_ip_enabled: { type: 'boolean', optional: true, default: false },
      },
    },
    discovery_url: { type: 'string', computed: true },
    workspace_id: { type: 'string', computed: true },
    tags: { type: 'map', optional: true, elemType: 'string' },
  };

  private readonly reconciler: LifecycleReconciler<WorkspaceId, Workspace>;
  private readonly logger: Logger;

  constructor(
    api: IResourceApi<WorkspaceId, Workspace>,
    private readonly context: ResourceContext
  ) {
    this.logger = (context.logger ?? getComponentLogger('provider-azure')).child({ resourceType: MACHINE_LEARNING_WORKSPACE_TYPE });
    this.reconciler = new LifecycleReconciler(api, { clock: context.clock, logger: this.logger, deleteConfirmation: 'operation' });
  }

  async getSchema(): Promise<ISchema> {
    return this.schema;
  }

  async validate(inputs: Record<string, unknown>): Promise<void> {
    validateAttributes(MACHINE_LEARNING_WORKSPACE_TYPE, this.schema, inputs);

    const name = requireString(inputs, 'name', MACHINE_LEARNING_WORKSPACE_TYPE);
    if (!WORKSPACE_NAME.test(name)) {
      throw new ValidationError(
        `${MACHINE_LEARNING_WORKSPACE_TYPE}: "name" must be between 3 and 33 characters, start with a letter or digit and contain only letters, digits, hyphens and underscores, got ${name}`,
        MACHINE_LEARNING_WORKSPACE_TYPE,
        'name'
      );
    }

    checkReference(inputs, 'application_insights_id', APPLICATION_INSIGHTS_ID);
    checkReference(inputs, 'key_vault_id', KEY_VAULT_ID);
    checkReference(inputs, 'storage_account_id', STORAGE_ACCOUNT_ID);
    checkReference(inputs, 'container_registry_id', CONTAINER_REGISTRY_ID);
    checkReference(inputs, 'primary_user_assigned_identity', USER_ASSIGNED_IDENTITY_ID);

    const encryption = getBlock(inputs, 'encryption');
    if (encryption) {
      checkReference(encryption, 'key_vault_id', KEY_VAULT_ID, 'encryption.0.');
      checkReference(encryption, 'user_assigned_identity_id', USER_ASSIGNED_IDENTITY_ID, 'encryption.0.');

      const keyId = getString(encryption, 'key_id');
      if (keyId && !/^https?:\/\/[^/]+/.test(keyId)) {
        throw new ValidationError(`${MACHINE_LEARNING_WORKSPACE_TYPE}: expected "encryption.0.key_id" to have a host and a http or https scheme, got ${keyId}`, MACHINE_LEARNING_WORKSPACE_TYPE, 'encryption.0.key_id');
      }
    }

    const serverlessCompute = getBlock(inputs, 'serverless_compute');
    if (serverlessCompute) checkReference(serverlessCompute, 'subnet_id', SUBNET_ID, 'serverless_compute.0.');
  }

  async create(inputs: Record<string, unknown>, timeouts?: Partial<IResourceTimeouts>): Promise<string> {
    await this.validate(inputs);
    const attributes = applyDefaults(this.schema, inputs);
    const id = new WorkspaceId(this.context.subscriptionId, requireString(attributes, 'resource_group_name', MACHINE_LEARNING_WORKSPACE_TYPE), requireString(attributes, 'name', MACHINE_LEARNING_WORKSPACE_TYPE));

    const existing = unwrap(await this.reconciler.fetch(id));
    if (existing.found) throw new ResourceExistsError(MACHINE_LEARNING_WORKSPACE_TYPE, id.toString());

    unwrap(await this.reconciler.apply(id, expandWorkspace(id, attributes), resolveTimeouts(this.timeouts, timeouts).create));
    return id.toString();
  }

  async read(id: string): Promise<Record<string, unknown> | null> {
    const workspaceId = WorkspaceId.parse(id);

    const observation = unwrap(await this.reconciler.fetch(workspaceId));
    if (!observation.found) {
      this.logger.info('Resource no longer exists', { resourceId: id });
      return null;
    }

    return flattenWorkspace(workspaceId, observation.model);
  }

  async update(id: string, inputs: Record<string, unknown>, timeouts?: Partial<IResourceTimeouts>): Promise<void> {
    await this.validate(inputs);
    const workspaceId = WorkspaceId.parse(id);

    const observation = unwrap(await this.reconciler.fetch(workspaceId));
    const current = observation.found ? observation.model : undefined;
    const prior = current ? flattenWorkspace(workspaceId, current) : { name: workspaceId.workspaceName, resource_group_name: workspaceId.resourceGroupName };
    assertUpdatableInPlace(MACHINE_LEARNING_WORKSPACE_TYPE, this.schema, prior, inputs);

    unwrap(await this.reconciler.apply(workspaceId, expandWorkspace(workspaceId, applyDefaults(this.schema, inputs), current), resolveTimeouts(this.timeouts, timeouts).update));
  }

  async delete(id: string, timeouts?: Partial<IResourceTimeouts>): Promise<void> {
    const workspaceId = WorkspaceId.parse(id);
    unwrap(await this.reconciler.delete(workspaceId, resolveTimeouts(this.timeouts, timeouts).delete));
  }

  async importState(id: string): Promise<Record<string, unknown>> {
    const workspaceId = WorkspaceId.parse(id);
    const attributes = await this.read(workspaceId.toString());
    if (!attributes) throw new Error(`Cannot import non-existent remote object: ${id}`);
    return attributes;
  }
}

function checkReference<K extends string>(attributes: Attributes, key: string, format: ResourceIdFormat<K>, path = ''): void {
  const value = getString(attributes, key);
  if (value === undefined) return;

  try {
    format.parse(value, { insensitively: true });
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`${MACHINE_LEARNING_WORKSPACE_TYPE}: "${path}${key}" is not a valid ID: ${detail}`, MACHINE_LEARNING_WORKSPACE_TYPE, `${path}${key}`);
  }
}
