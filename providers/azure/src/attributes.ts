import { ValidationError } from '@stratoform/reconciler';

export type Attributes = Record<string, unknown>;

export function isRecord(value: unknown): value is Attributes {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getString(attributes: Attributes, key: string): string | undefined {
  const value = attributes[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export function requireString(attributes: Attributes, key: string, resourceType: string): string {
  const value = getString(attributes, key);
  if (value === undefined) throw new ValidationError(`${resourceType} requires "${key}" attribute (string)`, resourceType, key);
  return value;
}

export function getBoolean(attributes: Attributes, key: string): boolean | undefined {
  const value = attributes[key];
  return typeof value === 'boolean' ? value : undefined;
}

export function getStringList(attributes: Attributes, key: string): string[] {
  const value = attributes[key];
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string' && item !== '');
}

export function getStringMap(attributes: Attributes, key: string): Record<string, string> {
  const value = attributes[key];
  if (!isRecord(value)) return {};

  const result: Record<string, string> = {};
  for (const [k, v] of Object.entries(value)) {
    if (typeof v === 'string') result[k] = v;
  }
  return result;
}

/** A nested block is configured as a list holding at most one object */
export function getBlock(attributes: Attributes, key: string): Attributes | undefined {
  const value = attributes[key];
  const first: unknown = Array.isArray(value) ? value[0] : value;
  return isRecord(first) ? first : undefined;
}

/** Lower-cased and without spaces, so `West Europe` and `westeurope` compare equal */
export function normalizeLocation(location: string): string {
  return location.replace(/\s/g, '').toLowerCase();
}
