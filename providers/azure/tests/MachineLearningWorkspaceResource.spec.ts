import { ApiError, createLogger, type ILongRunningOperation, type IResourceApi, ManualClock, type OperationStatus, RequestError, ResourceExistsError } from '@stratoform/reconciler';
import { beforeEach, describe, expect, it, type Mock, vi } from 'vitest';

import type { Workspace } from '../src/client/models';
import { WorkspaceId } from '../src/ids';
import { MachineLearningWorkspaceResource } from '../src/resources/MachineLearningWorkspaceResource';
import { SUB } from './helpers';

const RG = `/subscriptions/${SUB}/resourceGroups/rg-ml`;
const WORKSPACE = `${RG}/providers/Microsoft.MachineLearningServices/workspaces/ws-example`;
const KEY_VAULT = `${RG}/providers/Microsoft.KeyVault/vaults/kv-example`;
const APP_INSIGHTS = `${RG}/providers/Microsoft.Insights/components/ai-example`;
const STORAGE = `${RG}/providers/Microsoft.Storage/storageAccounts/saexample`;

const inputs = {
  name: 'ws-example',
  location: 'westeurope',
  resource_group_name: 'rg-ml',
  application_insights_id: APP_INSIGHTS,
  key_vault_id: KEY_VAULT,
  storage_account_id: STORAGE,
  identity: [{ type: 'SystemAssigned' }],
};

const remote: Workspace = {
  id: WORKSPACE,
  name: 'ws-example',
  location: 'westeurope',
  kind: 'Default',
  sku: { name: 'Basic', tier: 'Basic' },
  identity: { type: 'SystemAssigned', principalId: 'principal-1', tenantId: 'tenant-1' },
  properties: {
    applicationInsights: APP_INSIGHTS,
    keyVault: KEY_VAULT,
    storageAccount: STORAGE,
    publicNetworkAccess: 'Disabled',
    v1LegacyMode: false,
    serverlessComputeSettings: { serverlessComputeNoPublicIP: false },
  },
};

const notFound = () => new ApiError('unexpected status 404 (ResourceNotFound): not found', 404, 'ResourceNotFound');

function operation(...statuses: OperationStatus[]): { poll: Mock<() => Promise<OperationStatus>> } {
  const poll = vi.fn<() => Promise<OperationStatus>>();
  for (const status of statuses) poll.mockResolvedValueOnce(status);
  return { poll };
}

describe('MachineLearningWorkspaceResource', () => {
  let clock: ManualClock;
  let api: {
    get: Mock<(id: WorkspaceId) => Promise<Workspace>>;
    createOrUpdate: Mock<(id: WorkspaceId, body: Workspace) => Promise<ILongRunningOperation>>;
    delete: Mock<(id: WorkspaceId) => Promise<ILongRunningOperation>>;
  };
  let resource: MachineLearningWorkspaceResource;

  beforeEach(() => {
    clock = new ManualClock();
    api = {
      get: vi.fn<(id: WorkspaceId) => Promise<Workspace>>(),
      createOrUpdate: vi.fn<(id: WorkspaceId, body: Workspace) => Promise<ILongRunningOperation>>().mockResolvedValue(operation({ status: 'Succeeded' })),
      delete: vi.fn<(id: WorkspaceId) => Promise<ILongRunningOperation>>(),
    };
    const typedApi: IResourceApi<WorkspaceId, Workspace> = api;
    resource = new MachineLearningWorkspaceResource(typedApi, { subscriptionId: SUB, clock, logger: createLogger({ level: 'silent' }) });
  });

  describe('validate', () => {
    it('should accept a minimal configuration', async () => {
      await expect(resource.validate(inputs)).resolves.toBeUndefined();
    });

    it('should require the identity block', async () => {
      const { identity: _identity, ...withoutIdentity } = inputs;

      await expect(resource.validate(withoutIdentity)).rejects.toThrow('azure_machine_learning_workspace requires "identity" attribute (list)');
    });

    it('should reject an unknown identity type', async () => {
      await expect(resource.validate({ ...inputs, identity: [{ type: 'Managed' }] })).rejects.toThrow('expected "identity.0.type" to be one of [SystemAssigned, UserAssigned, SystemAssigned, UserAssigned], got Managed');
    });

    it('should reject an invalid workspace name', async () => {
      await expect(resource.validate({ ...inputs, name: '-ws' })).rejects.toThrow('"name" must be between 3 and 33 characters');
    });

    it('should reject a reference of the wrong resource type', async () => {
      await expect(resource.validate({ ...inputs, key_vault_id: STORAGE })).rejects.toThrow('"key_vault_id" is not a valid ID');
    });

    it('should accept references in any casing', async () => {
      await expect(resource.validate({ ...inputs, key_vault_id: KEY_VAULT.toLowerCase() })).resolves.toBeUndefined();
    });

    it('should require an http or https key URL for encryption', async () => {
      await expect(resource.validate({ ...inputs, encryption: [{ key_vault_id: KEY_VAULT, key_id: 'kv-example/keys/cmk' }] })).rejects.toThrow(
        'expected "encryption.0.key_id" to have a host and a http or https scheme, got kv-example/keys/cmk'
      );
    });

    it('should validate the serverless compute subnet', async () => {
      await expect(resource.validate({ ...inputs, serverless_compute: [{ subnet_id: KEY_VAULT }] })).rejects.toThrow('"serverless_compute.0.subnet_id" is not a valid ID');
    });
  });

  describe('create', () => {
    it('should create the workspace with defaults applied', async () => {
      api.get.mockRejectedValue(notFound());

      const id = await resource.create(inputs);

      expect(id).toBe(WORKSPACE);
      const [calledId, body] = api.createOrUpdate.mock.calls[0];
      expect(calledId.toString()).toBe(WORKSPACE);
      expect(body.kind).toBe('Default');
      expect(body.sku).toEqual({ name: 'Basic', tier: 'Basic' });
      expect(body.properties?.v1LegacyMode).toBe(false);
      expect(body.properties?.publicNetworkAccess).toBe('Disabled');
    });

    it('should refuse to take over an existing workspace', async () => {
      api.get.mockResolvedValue(remote);

      await expect(resource.create(inputs)).rejects.toThrow(ResourceExistsError);
      expect(api.createOrUpdate).not.toHaveBeenCalled();
    });

    it('should surface a failed operation', async () => {
      api.get.mockRejectedValue(notFound());
      api.createOrUpdate.mockResolvedValue(operation({ status: 'Failed', reason: 'Failed: quota exceeded' }));

      const error = await resource.create(inputs).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RequestError);
      expect(error).toHaveProperty('message', `waiting for creation/update of ${WORKSPACE}: operation failed: Failed: quota exceeded`);
    });
  });

  describe('read', () => {
    it('should flatten the workspace', async () => {
      api.get.mockResolvedValue(remote);

      const attributes = await resource.read(WORKSPACE);

      expect(attributes).toMatchObject({
        name: 'ws-example',
        resource_group_name: 'rg-ml',
        kind: 'Default',
        key_vault_id: KEY_VAULT,
        public_network_access_enabled: false,
        serverless_compute: [{ public_ip_enabled: true }],
        identity: [{ type: 'SystemAssigned', identity_ids: [], principal_id: 'principal-1', tenant_id: 'tenant-1' }],
      });
    });

    it('should return null when the workspace is gone', async () => {
      api.get.mockRejectedValue(notFound());

      await expect(resource.read(WORKSPACE)).resolves.toBeNull();
    });
  });

  describe('update', () => {
    it('should compare serverless compute against the remote workspace', async () => {
      api.get.mockResolvedValue(remote);

      await expect(resource.update(WORKSPACE, { ...inputs, public_network_access_enabled: true, serverless_compute: [{ public_ip_enabled: false }] })).rejects.toThrow(
        'Not supported to update `public_ip_enabled` from `true` to `false` when `subnet_id` is null or empty'
      );
      expect(api.createOrUpdate).not.toHaveBeenCalled();
    });

    it('should apply the configuration', async () => {
      api.get.mockResolvedValue(remote);

      await resource.update(WORKSPACE, { ...inputs, description: 'updated' });

      expect(api.createOrUpdate.mock.calls[0][1].properties?.description).toBe('updated');
    });

    it('should refuse to change the storage account in place', async () => {
      api.get.mockResolvedValue(remote);

      await expect(resource.update(WORKSPACE, { ...inputs, storage_account_id: `${RG}/providers/Microsoft.Storage/storageAccounts/saother` })).rejects.toThrow(
        'azure_machine_learning_workspace: "storage_account_id" cannot be changed in place, the resource must be replaced'
      );
      expect(api.createOrUpdate).not.toHaveBeenCalled();
    });

    it('should refuse to add encryption in place', async () => {
      api.get.mockResolvedValue(remote);

      await expect(resource.update(WORKSPACE, { ...inputs, encryption: [{ key_vault_id: KEY_VAULT, key_id: 'https://kv-example.vault.azure.net/keys/key/1' }] })).rejects.toThrow('"encryption" cannot be changed in place');
      expect(api.createOrUpdate).not.toHaveBeenCalled();
    });
  });

  describe('delete', () => {
    it('should wait for the delete operation instead of probing', async () => {
      api.delete.mockResolvedValue(operation({ status: 'InProgress', retryAfterMs: 10_000 }, { status: 'Succeeded' }));

      await resource.delete(WORKSPACE);

      expect(api.get).not.toHaveBeenCalled();
      expect(clock.sleeps).toEqual([10_000]);
    });

    it('should surface a failed delete operation', async () => {
      api.delete.mockResolvedValue(operation({ status: 'Failed', reason: 'Canceled' }));

      await expect(resource.delete(WORKSPACE)).rejects.toThrow(`waiting for deletion of ${WORKSPACE}: operation failed: Canceled`);
    });

    it('should treat a 404 from the delete request as already deleted', async () => {
      api.delete.mockRejectedValue(notFound());

      await expect(resource.delete(WORKSPACE)).resolves.toBeUndefined();
    });
  });

  it('should import an existing workspace', async () => {
    api.get.mockResolvedValue(remote);

    await expect(resource.importState(WORKSPACE)).resolves.toMatchObject({ name: 'ws-example' });
    expect(WorkspaceId.parse(WORKSPACE).workspaceName).toBe('ws-example');
  });
});
