/** A resource as recorded in state after a successful create, update or import */
export interface IResource {
  id: string;
  type: 'Resource';
  resourceType: string;
  name: string;
  attributes: Record<string, unknown>;
  /** Attribute names masked when the state is displayed */
  sensitiveAttributes?: string[];
}

export type SchemaType = 'string' | 'number' | 'boolean' | 'list' | 'map';

export interface ISchemaDefinition {
  type: SchemaType;
  required?: boolean;
  optional?: boolean;
  computed?: boolean; // Set by the remote API; read-only unless also required or optional
  forceNew?: boolean; // If true, a change to this attribute forces replacement (Delete -> Create)
  sensitive?: boolean;
  default?: string | number | boolean;
  allowedValues?: readonly string[];
  elemType?: SchemaType;
  maxItems?: number;
  /** Nested block schema for `list` attributes holding objects */
  block?: ISchema;
}

export type ISchema = Record<string, ISchemaDefinition>;

export type TimeoutOperation = 'create' | 'update' | 'delete';

/** Per-operation timeouts in milliseconds */
export type IResourceTimeouts = Record<TimeoutOperation, number>;

/** The contract that ALL providers must implement */
export interface IProvider {
  /** Resource types handled by this provider (e.g., ['azure_relay_namespace']) */
  readonly resources: string[];

  /** Returns the schema for a specific resource type */
  getSchema(type: string): Promise<ISchema>;

  /** Validates inputs against the resource schema. Throws validation error if invalid. */
  validate(type: string, inputs: Record<string, unknown>): Promise<void>;

  create(type: string, inputs: Record<string, unknown>, timeouts?: Partial<IResourceTimeouts>): Promise<string>;
  read(id: string, type: string): Promise<Record<string, unknown> | null>;
  update(id: string, type: string, inputs: Record<string, unknown>, timeouts?: Partial<IResourceTimeouts>): Promise<void>;
  delete(id: string, type: string, timeouts?: Partial<IResourceTimeouts>): Promise<void>;
  importState(id: string, type: string): Promise<Record<string, unknown>>;
}

/**
 * Resource Handler Interface
 * Each resource type (e.g., azure_relay_namespace) implements this interface
 */
export interface IResourceHandler {
  /** Default timeouts, overridable per call */
  readonly timeouts: IResourceTimeouts;

  getSchema(): Promise<ISchema>;

  /**
   * Validate resource inputs before creation/update
   */
  validate(inputs: Record<string, unknown>): Promise<void>;

  /**
   * Create a new resource
   * @returns Canonical resource ID
   */
  create(inputs: Record<string, unknown>, timeouts?: Partial<IResourceTimeouts>): Promise<string>;

  /**
   * Read the current attributes of a resource
   * @returns null when the resource no longer exists
   */
  read(id: string): Promise<Record<string, unknown> | null>;

  update(id: string, inputs: Record<string, unknown>, timeouts?: Partial<IResourceTimeouts>): Promise<void>;

  /**
   * Delete a resource, resolving once the deletion is confirmed
   */
  delete(id: string, timeouts?: Partial<IResourceTimeouts>): Promise<void>;

  /**
   * Validate the ID format and read an existing resource for import
   */
  importState(id: string): Promise<Record<string, unknown>>;
}
