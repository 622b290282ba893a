import type { IResourceTimeouts, ISchema, ISchemaDefinition, SchemaType } from '@stratoform/contracts';
import { ValidationError } from '@stratoform/reconciler';

import { type Attributes, isRecord } from './attributes';

export const MINUTE = 60 * 1000;

export function resolveTimeouts(defaults: IResourceTimeouts, overrides: Partial<IResourceTimeouts> = {}): IResourceTimeouts {
  return {
    create: overrides.create ?? defaults.create,
    update: overrides.update ?? defaults.update,
    delete: overrides.delete ?? defaults.delete,
  };
}

function isSettable(definition: ISchemaDefinition): boolean {
  return definition.required === true || definition.optional === true || definition.computed !== true;
}

function isUnset(value: unknown): boolean {
  return value === undefined || value === null || value === '';
}

function matchesType(type: SchemaType, value: unknown): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number';
    case 'boolean':
      return typeof value === 'boolean';
    case 'list':
      return Array.isArray(value);
    case 'map':
      return isRecord(value);
  }
}

/**
 * Checks required attributes, primitive types, allowed values and list sizes.
 * Nested blocks are validated recursively with a dotted path (`identity.0.type`).
 */
export function validateAttributes(resourceType: string, schema: ISchema, inputs: Attributes, path = ''): void {
  for (const key of Object.keys(inputs)) {
    const definition = schema[key];
    if (!definition) throw new ValidationError(`${resourceType}: unsupported argument "${path}${key}"`, resourceType, `${path}${key}`);
    if (!isSettable(definition) && !isUnset(inputs[key])) throw new ValidationError(`${resourceType}: "${path}${key}" is computed and cannot be set`, resourceType, `${path}${key}`);
  }

  for (const [key, definition] of Object.entries(schema)) {
    const field = `${path}${key}`;
    const value = inputs[key];

    if (isUnset(value)) {
      if (definition.required) throw new ValidationError(`${resourceType} requires "${field}" attribute (${definition.type})`, resourceType, field);
      continue;
    }

    if (!matchesType(definition.type, value)) throw new ValidationError(`${resourceType}: expected "${field}" to be of type ${definition.type}`, resourceType, field);

    if (definition.allowedValues && typeof value === 'string' && !definition.allowedValues.includes(value)) {
      throw new ValidationError(`${resourceType}: expected "${field}" to be one of [${definition.allowedValues.join(', ')}], got ${value}`, resourceType, field);
    }

    if (Array.isArray(value)) {
      if (definition.maxItems !== undefined && value.length > definition.maxItems) {
        throw new ValidationError(`${resourceType}: "${field}" accepts at most ${definition.maxItems} item(s), got ${value.length}`, resourceType, field);
      }
      validateElements(resourceType, definition, value, field);
    }

    if (isRecord(value) && definition.elemType) {
      for (const [k, v] of Object.entries(value)) {
        if (!matchesType(definition.elemType, v)) throw new ValidationError(`${resourceType}: expected "${field}.${k}" to be of type ${definition.elemType}`, resourceType, field);
      }
    }
  }
}

function validateElements(resourceType: string, definition: ISchemaDefinition, items: unknown[], field: string): void {
  items.forEach((item, index) => {
    const { block, elemType } = definition;
    if (block) {
      if (!isRecord(item)) throw new ValidationError(`${resourceType}: expected "${field}.${index}" to be a block`, resourceType, field);
      validateAttributes(resourceType, block, item, `${field}.${index}.`);
      return;
    }
    if (elemType && !matchesType(elemType, item)) throw new ValidationError(`${resourceType}: expected "${field}.${index}" to be of type ${elemType}`, resourceType, field);
  });
}

/** Returns a copy of the inputs with schema defaults filled in, including inside configured blocks */
export function applyDefaults(schema: ISchema, inputs: Attributes): Attributes {
  const result: Attributes = { ...inputs };

  for (const [key, definition] of Object.entries(schema)) {
    const value = result[key];
    if (isUnset(value) && definition.default !== undefined) {
      result[key] = definition.default;
      continue;
    }

    const { block } = definition;
    if (block && Array.isArray(value)) result[key] = value.map((item: unknown) => (isRecord(item) ? applyDefaults(block, item) : item));
  }

  return result;
}

/** Attribute names whose values must not be printed */
export function sensitiveAttributes(schema: ISchema): string[] {
  return Object.entries(schema)
    .filter(([, definition]) => definition.sensitive)
    .map(([key]) => key);
}

function isComputedOnly(definition: ISchemaDefinition): boolean {
  return definition.computed === true && definition.required !== true && definition.optional !== true;
}

/**
 * Canonical form for change detection: empty values (including `false`) collapse to
 * undefined, strings compare without case or whitespace, object keys are sorted and
 * computed-only block attributes are dropped.
 */
function comparable(value: unknown, block?: ISchema): unknown {
  if (value === undefined || value === null || value === '' || value === false) return undefined;
  if (typeof value === 'string') return value.replace(/\s/g, '').toLowerCase();

  if (Array.isArray(value)) {
    const items = value.map((item: unknown) => comparable(item, block));
    return items.length > 0 ? items : undefined;
  }

  if (isRecord(value)) {
    const result: Attributes = {};
    for (const key of Object.keys(value).sort()) {
      const definition = block?.[key];
      if (definition && isComputedOnly(definition)) continue;
      const item = comparable(value[key], definition?.block);
      if (item !== undefined) result[key] = item;
    }
    return Object.keys(result).length > 0 ? result : undefined;
  }

  return value;
}

/**
 * Names the `forceNew` attributes whose configured value differs from `prior`.
 * Attributes missing from `prior` are not compared.
 */
export function replacementTriggers(schema: ISchema, prior: Attributes, inputs: Attributes): string[] {
  const desired = applyDefaults(schema, inputs);

  return Object.entries(schema)
    .filter(([key, definition]) => definition.forceNew === true && Object.hasOwn(prior, key))
    .filter(([key, definition]) => JSON.stringify(comparable(desired[key], definition.block)) !== JSON.stringify(comparable(prior[key], definition.block)))
    .map(([key]) => key);
}

/** Update is in place only: a change to a `forceNew` attribute has to go through delete and create */
export function assertUpdatableInPlace(resourceType: string, schema: ISchema, prior: Attributes, inputs: Attributes): void {
  const triggers = replacementTriggers(schema, prior, inputs);
  if (triggers.length === 0) return;

  const field = triggers[0];
  throw new ValidationError(`${resourceType}: "${field}" cannot be changed in place, the resource must be replaced`, resourceType, field);
}
