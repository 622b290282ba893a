import { InvalidResourceIdError } from '@stratoform/reconciler';

type Segment<K extends string> = { readonly kind: 'static'; readonly value: string } | { readonly kind: 'user'; readonly name: K };

/**
 * Segment layout of a management resource ID, e.g.
 * `/subscriptions/{subscriptionId}/resourceGroups/{resourceGroupName}/providers/Microsoft.Relay/namespaces/{namespaceName}`
 */
export class ResourceIdFormat<K extends string> {
  constructor(private readonly segments: readonly Segment<K>[]) {}

  get example(): string {
    return '/' + this.segments.map((s) => (s.kind === 'static' ? s.value : `{${s.name}}`)).join('/');
  }

  /**
   * Split an ID into its user segments. With `insensitively`, fixed segments
   * match in any casing (the API echoes referenced IDs back in varying case).
   */
  parse(input: string, options: { insensitively?: boolean } = {}): Record<K, string> {
    if (!input.startsWith('/')) throw new InvalidResourceIdError(input, this.example, 'an ID must start with "/"');

    const parts = input.slice(1).split('/');
    if (parts.length !== this.segments.length) throw new InvalidResourceIdError(input, this.example, `expected ${this.segments.length} segments but got ${parts.length}`);

    const values: Partial<Record<K, string>> = {};
    for (const [index, segment] of this.segments.entries()) {
      const part = parts[index];
      if (segment.kind === 'static') {
        const matches = options.insensitively ? part.toLowerCase() === segment.value.toLowerCase() : part === segment.value;
        if (!matches) throw new InvalidResourceIdError(input, this.example, `expected segment ${index + 1} to be ${JSON.stringify(segment.value)} but got ${JSON.stringify(part)}`);
        continue;
      }

      if (!part) throw new InvalidResourceIdError(input, this.example, `the segment ${segment.name} is empty`);
      values[segment.name] = part;
    }

    if (!isComplete(values, this.segments)) throw new InvalidResourceIdError(input, this.example, 'the ID is incomplete');
    return values;
  }

  format(values: Record<K, string>): string {
    return '/' + this.segments.map((s) => (s.kind === 'static' ? s.value : values[s.name])).join('/');
  }

  /** Re-format an ID parsed insensitively so fixed segments use canonical casing */
  normalize(input: string): string {
    return this.format(this.parse(input, { insensitively: true }));
  }

  isValid(input: string, options: { insensitively?: boolean } = {}): boolean {
    try {
      this.parse(input, options);
      return true;
    } catch (error) {
      if (error instanceof InvalidResourceIdError) return false;
      throw error;
    }
  }
}

function isComplete<K extends string>(values: Partial<Record<K, string>>, segments: readonly Segment<K>[]): values is Record<K, string> {
  return segments.every((s) => s.kind === 'static' || typeof values[s.name] === 'string');
}

function resourceGroupScoped<K extends string>(providerNamespace: string, ...types: [string, K][]): ResourceIdFormat<'subscriptionId' | 'resourceGroupName' | K> {
  const segments: Segment<'subscriptionId' | 'resourceGroupName' | K>[] = [
    { kind: 'static', value: 'subscriptions' },
    { kind: 'user', name: 'subscriptionId' },
    { kind: 'static', value: 'resourceGroups' },
    { kind: 'user', name: 'resourceGroupName' },
    { kind: 'static', value: 'providers' },
    { kind: 'static', value: providerNamespace },
  ];
  for (const [type, name] of types) segments.push({ kind: 'static', value: type }, { kind: 'user', name });

  return new ResourceIdFormat(segments);
}

export const WORKSPACE_ID = resourceGroupScoped('Microsoft.MachineLearningServices', ['workspaces', 'workspaceName']);
export const NAMESPACE_ID = resourceGroupScoped('Microsoft.Relay', ['namespaces', 'namespaceName']);
export const AUTHORIZATION_RULE_ID = resourceGroupScoped('Microsoft.Relay', ['namespaces', 'namespaceName'], ['authorizationRules', 'authorizationRuleName']);

// Resources referenced by a workspace
export const APPLICATION_INSIGHTS_ID = resourceGroupScoped('Microsoft.Insights', ['components', 'componentName']);
export const KEY_VAULT_ID = resourceGroupScoped('Microsoft.KeyVault', ['vaults', 'vaultName']);
export const STORAGE_ACCOUNT_ID = resourceGroupScoped('Microsoft.Storage', ['storageAccounts', 'storageAccountName']);
export const CONTAINER_REGISTRY_ID = resourceGroupScoped('Microsoft.ContainerRegistry', ['registries', 'registryName']);
export const USER_ASSIGNED_IDENTITY_ID = resourceGroupScoped('Microsoft.ManagedIdentity', ['userAssignedIdentities', 'userAssignedIdentityName']);
export const SUBNET_ID = resourceGroupScoped('Microsoft.Network', ['virtualNetworks', 'virtualNetworkName'], ['subnets', 'subnetName']);

export class WorkspaceId {
  constructor(
    readonly subscriptionId: string,
    readonly resourceGroupName: string,
    readonly workspaceName: string
  ) {}

  static parse(input: string): WorkspaceId {
    const { subscriptionId, resourceGroupName, workspaceName } = WORKSPACE_ID.parse(input);
    return new WorkspaceId(subscriptionId, resourceGroupName, workspaceName);
  }

  toString(): string {
    return WORKSPACE_ID.format(this);
  }

  equals(other: WorkspaceId): boolean {
    return this.toString() === other.toString();
  }
}

export class NamespaceId {
  constructor(
    readonly subscriptionId: string,
    readonly resourceGroupName: string,
    readonly namespaceName: string
  ) {}

  static parse(input: string): NamespaceId {
    const { subscriptionId, resourceGroupName, namespaceName } = NAMESPACE_ID.parse(input);
    return new NamespaceId(subscriptionId, resourceGroupName, namespaceName);
  }

  toString(): string {
    return NAMESPACE_ID.format(this);
  }

  equals(other: NamespaceId): boolean {
    return this.toString() === other.toString();
  }

  authorizationRule(authorizationRuleName: string): AuthorizationRuleId {
    return new AuthorizationRuleId(this.subscriptionId, this.resourceGroupName, this.namespaceName, authorizationRuleName);
  }
}

export class AuthorizationRuleId {
  constructor(
    readonly subscriptionId: string,
    readonly resourceGroupName: string,
    readonly namespaceName: string,
    readonly authorizationRuleName: string
  ) {}

  static parse(input: string): AuthorizationRuleId {
    const { subscriptionId, resourceGroupName, namespaceName, authorizationRuleName } = AUTHORIZATION_RULE_ID.parse(input);
    return new AuthorizationRuleId(subscriptionId, resourceGroupName, namespaceName, authorizationRuleName);
  }

  toString(): string {
    return AUTHORIZATION_RULE_ID.format(this);
  }
}
