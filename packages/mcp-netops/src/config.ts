import { z } from 'zod';
import { readFileSync, existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { ConfigurationError } from './errors.js';
import { filterPredicateSchema } from './filter-engine.js';
import type { RunConfig } from './types.js';

export const DEFAULT_CONCURRENCY = 10;

// Zod schemas
const runConfigObjectSchema = z.object({
  concurrencyLimit: z.number().int().positive().default(DEFAULT_CONCURRENCY),
  quiet: z.boolean().default(false),
  verbose: z.boolean().default(false),
  preloadEnabled: z.boolean().default(true),
  outputDir: z.string().min(1).default('Output'),
  sessionDebug: z.boolean().default(false),
  saveAfterPush: z.boolean().default(true),
  port: z.number().int().min(1).max(65535).default(22),
  connectTimeoutMs: z.number().int().positive().default(30000),
  commandTimeoutMs: z.number().int().positive().default(60000),
});

const runConfigSchema = runConfigObjectSchema.refine(c => !(c.quiet && c.verbose), {
  message: 'quiet and verbose are mutually exclusive',
  path: ['quiet'],
});

export type RunConfigInput = z.input<typeof runConfigObjectSchema>;

const discoveryConfigSchema = z
  .object({
    host: z.string().min(1),
    api_key: z.string().min(1),
    protocol: z.enum(['http', 'https']).default('https'),
    port: z.number().int().min(1).max(65535).optional(),
    tls_verify: z.boolean().optional(),
    filters: z.array(filterPredicateSchema).default([]),
    username: z.string(),
    password: z.string(),
    secret: z.string().optional(),
    use_default_filter: z.boolean().default(true),
    device_type_map: z.record(z.string()).optional(),
  })
  .transform(c => ({
    ...c,
    port: c.port ?? (c.protocol === 'http' ? 80 : 443),
    tls_verify: c.tls_verify ?? c.protocol === 'https',
    secret: c.secret || c.password,
  }));

export type DiscoveryConfig = z.output<typeof discoveryConfigSchema>;

const serverConfigSchema = z.object({
  defaults: runConfigObjectSchema.partial().default({}),
  inventory: z.string().optional(),
  librenms: z.string().optional(),
});

export type ServerConfig = z.output<typeof serverConfigSchema>;

// Expand ~ in paths
export function expandPath(p: string): string {
  if (p.startsWith('~/')) {
    return join(homedir(), p.slice(2));
  }
  return p;
}

const DEFAULT_SERVER_CONFIG_PATH = '~/.netops/mcp-config.json';

function formatIssues(error: z.ZodError): string {
  return error.errors.map(e => `  ${e.path.join('.') || '(root)'}: ${e.message}`).join('\n');
}

function readJsonFile(path: string): unknown {
  if (!existsSync(path)) {
    throw new ConfigurationError(`Config file not found: ${path}`);
  }

  const raw = readFileSync(path, 'utf-8');
  try {
    return JSON.parse(raw);
  } catch {
    throw new ConfigurationError(`Invalid JSON in config file: ${path}`);
  }
}

function readEnvInt(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw === '') return undefined;
  return parseInt(raw, 10);
}

// Build a frozen RunConfig from explicit values, env overrides and defaults
export function buildRunConfig(input: RunConfigInput = {}, env: NodeJS.ProcessEnv = process.env): RunConfig {
  const result = runConfigSchema.safeParse({
    ...input,
    concurrencyLimit: input.concurrencyLimit ?? readEnvInt(env, 'NETOPS_THREADS'),
    outputDir: input.outputDir ?? (env.NETOPS_OUTPUT_DIR || undefined),
  });

  if (!result.success) {
    throw new ConfigurationError(`Run config validation failed:\n${formatIssues(result.error)}`);
  }

  return Object.freeze(result.data);
}

// Load the LibreNMS discovery config
export function loadDiscoveryConfig(configPath: string): DiscoveryConfig {
  const path = expandPath(configPath);
  const result = discoveryConfigSchema.safeParse(readJsonFile(path));

  if (!result.success) {
    throw new ConfigurationError(`Discovery config validation failed (${path}):\n${formatIssues(result.error)}`);
  }

  return result.data;
}

// Load the MCP server config; a missing default file means built-in defaults
export function loadServerConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const explicit = configPath || env.NETOPS_MCP_CONFIG;
  const path = expandPath(explicit || DEFAULT_SERVER_CONFIG_PATH);

  if (!explicit && !existsSync(path)) {
    return serverConfigSchema.parse({});
  }

  const result = serverConfigSchema.safeParse(readJsonFile(path));
  if (!result.success) {
    throw new ConfigurationError(`Server config validation failed:\n${formatIssues(result.error)}`);
  }

  const config = result.data;
  if (config.inventory) config.inventory = expandPath(config.inventory);
  if (config.librenms) config.librenms = expandPath(config.librenms);
  return config;
}
