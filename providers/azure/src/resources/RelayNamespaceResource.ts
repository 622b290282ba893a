import type { IResourceHandler, IResourceTimeouts, ISchema } from '@stratoform/contracts';
import { type Clock, getComponentLogger, LifecycleReconciler, type Logger, RequestError, ResourceExistsError, unwrap, ValidationError } from '@stratoform/reconciler';

import { type Attributes, getStringMap, normalizeLocation, requireString } from '../attributes';
import type { AccessKeys, RelayNamespace } from '../client/models';
import type { INamespacesApi } from '../client/NamespacesApi';
import { NamespaceId } from '../ids';
import { applyDefaults, assertUpdatableInPlace, MINUTE, resolveTimeouts, validateAttributes } from '../schema';

export const RELAY_NAMESPACE_TYPE = 'azure_relay_namespace';

const ROOT_AUTHORIZATION_RULE = 'RootManageSharedAccessKey';

export interface ResourceContext {
  subscriptionId: string;
  clock?: Clock;
  logger?: Logger;
}

export class RelayNamespaceResource implements IResourceHandler {
  readonly timeouts: IResourceTimeouts = { create: 30 * MINUTE, update: 30 * MINUTE, delete: 60 * MINUTE };

  private readonly schema: ISchema = {
    name: { type: 'string', required: true, forceNew: true },
    location: { type: 'string', required: true, forceNew: true },
    resource_group_name: { type: 'string', required: true, forceNew: true },
    sku_name: { type: 'string', required: true, allowedValues: ['Standard'] },
    tags: { type: 'map', optional: true, elemType: 'string' },
    metric_id: { type: 'string', computed: true },
    primary_connection_string: { type: 'string', computed: true, sensitive: true },
    secondary_connection_string: { type: 'string', computed: true, sensitive: true },
    primary_key: { type: 'string', computed: true, sensitive: true },
    secondary_key: { type: 'string', computed: true, sensitive: true },
  };

  private readonly reconciler: LifecycleReconciler<NamespaceId, RelayNamespace>;
  private readonly logger: Logger;

  constructor(
    private readonly api: INamespacesApi,
    private readonly context: ResourceContext
  ) {
    this.logger = (context.logger ?? getComponentLogger('provider-azure')).child({ resourceType: RELAY_NAMESPACE_TYPE });
    // The namespace delete operation does not report a 404 as success, so deletion
    // is confirmed by reading the namespace until it is gone.
    this.reconciler = new LifecycleReconciler(api, { clock: context.clock, logger: this.logger, deleteConfirmation: 'probe' });
  }

  async getSchema(): Promise<ISchema> {
    return this.schema;
  }

  async validate(inputs: Record<string, unknown>): Promise<void> {
    validateAttributes(RELAY_NAMESPACE_TYPE, this.schema, inputs);

    const name = requireString(inputs, 'name', RELAY_NAMESPACE_TYPE);
    if (name.length < 6 || name.length > 50) throw new ValidationError(`${RELAY_NAMESPACE_TYPE}: expected length of "name" to be in the range (6 - 50), got ${name}`, RELAY_NAMESPACE_TYPE, 'name');
  }

  async create(inputs: Record<string, unknown>, timeouts?: Partial<IResourceTimeouts>): Promise<string> {
    await this.validate(inputs);
    const attributes = applyDefaults(this.schema, inputs);
    const id = new NamespaceId(this.context.subscriptionId, requireString(attributes, 'resource_group_name', RELAY_NAMESPACE_TYPE), requireString(attributes, 'name', RELAY_NAMESPACE_TYPE));

    const existing = unwrap(await this.reconciler.fetch(id));
    if (existing.found) throw new ResourceExistsError(RELAY_NAMESPACE_TYPE, id.toString());

    unwrap(await this.reconciler.apply(id, this.expand(attributes), resolveTimeouts(this.timeouts, timeouts).create));
    return id.toString();
  }

  async read(id: string): Promise<Record<string, unknown> | null> {
    const namespaceId = NamespaceId.parse(id);

    const observation = unwrap(await this.reconciler.fetch(namespaceId));
    if (!observation.found) {
      this.logger.info('Resource no longer exists', { resourceId: id });
      return null;
    }

    const ruleId = namespaceId.authorizationRule(ROOT_AUTHORIZATION_RULE);
    let keys: AccessKeys;
    try {
      keys = await this.api.listKeys(ruleId);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new RequestError(`listing keys for ${id}: ${detail}`, { resourceId: id, phase: 'read', cause: error });
    }

    const { model } = observation;
    return {
      name: namespaceId.namespaceName,
      resource_group_name: namespaceId.resourceGroupName,
      location: normalizeLocation(model.location),
      sku_name: model.sku?.name ?? '',
      metric_id: model.properties?.metricId ?? '',
      tags: model.tags ?? {},
      primary_connection_string: keys.primaryConnectionString ?? '',
      secondary_connection_string: keys.secondaryConnectionString ?? '',
      primary_key: keys.primaryKey ?? '',
      secondary_key: keys.secondaryKey ?? '',
    };
  }

  async update(id: string, inputs: Record<string, unknown>, timeouts?: Partial<IResourceTimeouts>): Promise<void> {
    await this.validate(inputs);
    const namespaceId = NamespaceId.parse(id);
    assertUpdatableInPlace(RELAY_NAMESPACE_TYPE, this.schema, { name: namespaceId.namespaceName, resource_group_name: namespaceId.resourceGroupName }, inputs);

    unwrap(await this.reconciler.apply(namespaceId, this.expand(applyDefaults(this.schema, inputs)), resolveTimeouts(this.timeouts, timeouts).update));
  }

  async delete(id: string, timeouts?: Partial<IResourceTimeouts>): Promise<void> {
    const namespaceId = NamespaceId.parse(id);
    unwrap(await this.reconciler.delete(namespaceId, resolveTimeouts(this.timeouts, timeouts).delete));
  }

  async importState(id: string): Promise<Record<string, unknown>> {
    const namespaceId = NamespaceId.parse(id);
    const attributes = await this.read(namespaceId.toString());
    if (!attributes) throw new Error(`Cannot import non-existent remote object: ${id}`);
    return attributes;
  }

  private expand(attributes: Attributes): RelayNamespace {
    const skuName = requireString(attributes, 'sku_name', RELAY_NAMESPACE_TYPE);
    return {
      location: normalizeLocation(requireString(attributes, 'location', RELAY_NAMESPACE_TYPE)),
      sku: { name: skuName, tier: skuName },
      properties: {},
      tags: getStringMap(attributes, 'tags'),
    };
  }
}
