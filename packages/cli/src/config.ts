import type { IResourceTimeouts, TimeoutOperation } from '@stratoform/contracts';
import { ConfigurationError } from '@stratoform/reconciler';
import { type } from 'arktype';
import fs from 'node:fs/promises';

import { formatAddress, parseAddress } from './address';

export const DEFAULT_CONFIG_FILE = 'main.json';

const TIMEOUT_OPERATIONS: readonly TimeoutOperation[] = ['create', 'update', 'delete'];

const DURATION_PATTERN = /^(?:(\d+)h)?(?:(\d+)m)?(?:(\d+)s)?$/;

const TimeoutsConfig = type({
  'create?': 'string',
  'update?': 'string',
  'delete?': 'string',
});

const ResourceConfig = type({
  type: 'string',
  name: 'string',
  'attributes?': 'Record<string, unknown>',
  'timeouts?': TimeoutsConfig,
});

export const StratoformConfig = type({
  resources: ResourceConfig.array(),
});
export type StratoformConfig = typeof StratoformConfig.infer;

export interface ConfiguredResource {
  address: string;
  type: string;
  name: string;
  attributes: Record<string, unknown>;
  timeouts: Partial<IResourceTimeouts>;
}

/**
 * Parses durations such as `45m`, `90s`, `2h` or `1h30m` into milliseconds
 */
export function parseDuration(value: string, setting = 'timeout'): number {
  const trimmed = value.trim();
  const match = DURATION_PATTERN.exec(trimmed);
  if (!match || trimmed === '') throw new ConfigurationError(`Invalid duration "${value}" for ${setting}: expected a value like 45m or 1h30m`, setting);

  const [, hours = '0', minutes = '0', seconds = '0'] = match;
  const milliseconds = ((Number(hours) * 60 + Number(minutes)) * 60 + Number(seconds)) * 1000;
  if (milliseconds === 0) throw new ConfigurationError(`Invalid duration "${value}" for ${setting}: must be greater than zero`, setting);

  return milliseconds;
}

export function parseConfig(content: string, source: string): ConfiguredResource[] {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`${source} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`, 'config');
  }

  const config = StratoformConfig(raw);
  if (config instanceof type.errors) throw new ConfigurationError(`Invalid configuration in ${source}: ${config.summary}`, 'config');

  const seen = new Set<string>();
  return config.resources.map((resource) => {
    const address = formatAddress(parseAddress(`${resource.type}.${resource.name}`));
    if (seen.has(address)) throw new ConfigurationError(`Duplicate resource address ${address} in ${source}`, 'config');
    seen.add(address);

    const timeouts: Partial<IResourceTimeouts> = {};
    for (const operation of TIMEOUT_OPERATIONS) {
      const value = resource.timeouts?.[operation];
      if (value !== undefined) timeouts[operation] = parseDuration(value, `${address}.timeouts.${operation}`);
    }

    return { address, type: resource.type, name: resource.name, attributes: resource.attributes ?? {}, timeouts };
  });
}

export async function loadConfigFile(filePath: string): Promise<ConfiguredResource[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') throw new ConfigurationError(`${filePath} not found.`, 'config');
    throw error;
  }

  return parseConfig(content, filePath);
}
