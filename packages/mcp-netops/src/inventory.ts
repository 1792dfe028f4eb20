import { z } from 'zod';
import { readFileSync, existsSync } from 'node:fs';
import { parseCsv, type CsvRow } from './csv.js';
import { knownDeviceTypes } from './device-profiles.js';
import { ConfigurationError, InventoryError } from './errors.js';
import { DEFAULT_FILTER_SET, evaluate } from './filter-engine.js';
import { LibreNmsClient, type DiscoveryClient } from './discovery-client.js';
import { silentLogger, type Logger } from './logger.js';
import type { DiscoveryConfig } from './config.js';
import type { Credentials, DeviceRecord, DiscoveredDevice, FilterSet } from './types.js';

// LibreNMS os name -> device profile
export const DEFAULT_DEVICE_TYPE_MAP: Readonly<Record<string, string>> = Object.freeze({
  ios: 'cisco_ios',
  iosxe: 'cisco_ios',
  nxos: 'cisco_nxos',
  eos: 'arista_eos',
  arista_eos: 'arista_eos',
  junos: 'juniper_junos',
});

export interface StaticSource {
  kind: 'static';
  rows: readonly CsvRow[];
}

export interface DynamicSource {
  kind: 'dynamic';
  client: DiscoveryClient;
  credentials: Credentials;
  filters: FilterSet;
  // Applied before the user filters; pass [] to disable
  defaultFilters?: FilterSet;
  deviceTypeMap?: Readonly<Record<string, string>>;
}

export type InventorySource = StaticSource | DynamicSource;

export interface ResolveOptions {
  deviceTypes?: ReadonlySet<string>;
  logger?: Logger;
}

const inventoryRowSchema = z.object({
  host: z.string({ required_error: 'host is required' }).trim().min(1, 'host is required'),
  username: z.string().default(''),
  password: z.string().default(''),
  secret: z.string().optional(),
  device_type: z
    .string({ required_error: 'device_type is required' })
    .trim()
    .min(1, 'device_type is required'),
});

function makeRecord(fields: Credentials & { host: string; deviceType: string }): DeviceRecord {
  return Object.freeze({
    host: fields.host,
    username: fields.username,
    password: fields.password,
    secret: fields.secret || fields.password,
    deviceType: fields.deviceType,
  });
}

// First-seen wins
export function dedupeByHost(records: readonly DeviceRecord[]): DeviceRecord[] {
  const seen = new Set<string>();
  const result: DeviceRecord[] = [];
  for (const record of records) {
    if (seen.has(record.host)) continue;
    seen.add(record.host);
    result.push(record);
  }
  return result;
}

export function resolveStatic(rows: readonly CsvRow[], deviceTypes: ReadonlySet<string>): DeviceRecord[] {
  return rows.map((row, index) => {
    // +2: header line plus one-based numbering
    const line = index + 2;
    const parsed = inventoryRowSchema.safeParse(row);

    if (!parsed.success) {
      const reasons = parsed.error.errors.map(e => e.message).join(', ');
      throw new ConfigurationError(`Inventory row ${line}: ${reasons}`);
    }

    const { host, username, password, secret, device_type } = parsed.data;
    if (!deviceTypes.has(device_type)) {
      throw new ConfigurationError(`Inventory row ${line}: unknown device_type "${device_type}" for ${host}`);
    }

    return makeRecord({ host, username, password, secret: secret ?? '', deviceType: device_type });
  });
}

function firstAddress(device: DiscoveredDevice): string | undefined {
  for (const key of ['ip', 'hostname', 'sysName']) {
    const value = device[key];
    if (typeof value === 'string' && value.trim() !== '') {
      return value.trim();
    }
  }
  return undefined;
}

export async function resolveDynamic(source: DynamicSource, logger: Logger = silentLogger): Promise<DeviceRecord[]> {
  const candidates = await source.client.listDevices();
  const filters = [...(source.defaultFilters ?? DEFAULT_FILTER_SET), ...source.filters];
  const typeMap = source.deviceTypeMap ?? DEFAULT_DEVICE_TYPE_MAP;

  logger.debug(`discovery returned ${candidates.length} candidates`);

  const records: DeviceRecord[] = [];
  for (const candidate of candidates) {
    if (!evaluate(candidate, filters)) continue;

    const address = firstAddress(candidate);
    if (!address) {
      logger.debug(`skipping candidate without a usable address: ${JSON.stringify(candidate.device_id ?? null)}`);
      continue;
    }

    const os = String(candidate.os);
    const deviceType = Object.prototype.hasOwnProperty.call(typeMap, os) ? typeMap[os] : undefined;
    if (!deviceType) {
      logger.debug(`skipping ${address}: no device profile for os "${os}"`);
      continue;
    }

    records.push(makeRecord({ host: address, deviceType, ...source.credentials }));
  }
  return records;
}

export async function resolve(source: InventorySource, options: ResolveOptions = {}): Promise<DeviceRecord[]> {
  const records = source.kind === 'static'
    ? resolveStatic(source.rows, options.deviceTypes ?? knownDeviceTypes())
    : await resolveDynamic(source, options.logger);

  const devices = dedupeByHost(records);
  if (devices.length === 0) {
    throw new InventoryError('Inventory resolved to zero devices');
  }
  return devices;
}

// Read a CSV inventory file into a static source
export function loadStaticInventory(path: string): StaticSource {
  if (!existsSync(path)) {
    throw new ConfigurationError(`Inventory file not found: ${path}`);
  }
  return { kind: 'static', rows: parseCsv(readFileSync(path, 'utf-8')) };
}

export function dynamicSourceFromConfig(config: DiscoveryConfig, client?: DiscoveryClient): DynamicSource {
  return {
    kind: 'dynamic',
    client: client ?? new LibreNmsClient({
      host: config.host,
      port: config.port,
      protocol: config.protocol,
      apiKey: config.api_key,
      tlsVerify: config.tls_verify,
    }),
    credentials: {
      username: config.username,
      password: config.password,
      secret: config.secret,
    },
    filters: config.filters,
    defaultFilters: config.use_default_filter ? undefined : [],
    deviceTypeMap: config.device_type_map,
  };
}
