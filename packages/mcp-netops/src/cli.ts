import { buildRunConfig, DEFAULT_CONCURRENCY, expandPath, loadDiscoveryConfig } from './config.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { dynamicSourceFromConfig, loadStaticInventory, type InventorySource } from './inventory.js';
import { ConsoleLogger, levelFromFlags, type LogWriter } from './logger.js';
import { runJob, type RunnerDeps, type RunRequest } from './runner.js';
import { NetopsMcpServer } from './server.js';

export const USAGE = `
mcp-netops - run command jobs across a fleet of network devices over SSH

Usage:
  mcp-netops (--yoink | --yeet) -j <jobfile> (-i <inventory.csv> | --librenms <config.json>) [options]
  mcp-netops --save-only (-i <inventory.csv> | --librenms <config.json>) [options]
  mcp-netops --mcp [config.json]

Modes:
  --yoink                Run show commands and collect their output
  --yeet                 Push the job file as one config batch, then save
  --save-only            Save the running config on every device

Options:
  -i, --inventory <csv>  Static inventory (host, username, password, secret, device_type)
  --librenms <json>      LibreNMS discovery config
  -j, --jobfile <file>   Commands, one per line
  -t, --threads <n>      Devices worked on at once (default ${DEFAULT_CONCURRENCY})
  -o, --output <dir>     Results directory (default Output)
  --no-preload           Re-read the job file for every run
  --debug-session        Record every session to <run>/session-debug
  -q, --quiet            Only log errors
  -v, --verbose          Log session state changes
  --mcp [config.json]    Start the MCP server on stdio
  -h, --help             Show this help

Environment:
  NETOPS_THREADS, NETOPS_OUTPUT_DIR, NETOPS_MCP_CONFIG
`;

export interface CliOptions {
  help: boolean;
  mcp: boolean;
  mcpConfig?: string;
  yoink: boolean;
  yeet: boolean;
  saveOnly: boolean;
  inventory?: string;
  librenms?: string;
  jobFile?: string;
  threads?: number;
  output?: string;
  preload: boolean;
  debugSession: boolean;
  quiet: boolean;
  verbose: boolean;
  // Non-fatal problems found while parsing
  warnings: string[];
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = {
    help: false,
    mcp: false,
    yoink: false,
    yeet: false,
    saveOnly: false,
    preload: true,
    debugSession: false,
    quiet: false,
    verbose: false,
    warnings: [],
  };

  let i = 0;
  const value = (flag: string): string => {
    const next = argv[i + 1];
    if (next === undefined || next.startsWith('-')) {
      throw new ConfigurationError(`Option ${flag} needs a value`);
    }
    i++;
    return next;
  };

  for (; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '--mcp': {
        options.mcp = true;
        const next = argv[i + 1];
        if (next !== undefined && !next.startsWith('-')) {
          options.mcpConfig = next;
          i++;
        }
        break;
      }
      case '--yoink':
        options.yoink = true;
        break;
      case '--yeet':
        options.yeet = true;
        break;
      case '--save-only':
        options.saveOnly = true;
        break;
      case '-i':
      case '--inventory':
        options.inventory = value(arg);
        break;
      case '--librenms':
        options.librenms = value(arg);
        break;
      case '-j':
      case '--jobfile':
        options.jobFile = value(arg);
        break;
      case '-t':
      case '--threads': {
        const raw = value(arg);
        const threads = Number(raw);
        if (Number.isInteger(threads) && threads > 0) {
          options.threads = threads;
        } else {
          options.warnings.push(`Invalid thread count "${raw}", using ${DEFAULT_CONCURRENCY}`);
          options.threads = DEFAULT_CONCURRENCY;
        }
        break;
      }
      case '-o':
      case '--output':
        options.output = value(arg);
        break;
      case '--no-preload':
        options.preload = false;
        break;
      case '--debug-session':
        options.debugSession = true;
        break;
      case '-q':
      case '--quiet':
        options.quiet = true;
        break;
      case '-v':
      case '--verbose':
        options.verbose = true;
        break;
      default:
        throw new ConfigurationError(`Unknown option: ${arg}`);
    }
  }

  return options;
}

function inventorySource(options: CliOptions): InventorySource {
  if (options.inventory && options.librenms) {
    throw new ConfigurationError('Choose either --inventory or --librenms, not both');
  }
  if (options.inventory) {
    return loadStaticInventory(expandPath(options.inventory));
  }
  if (options.librenms) {
    return dynamicSourceFromConfig(loadDiscoveryConfig(options.librenms));
  }
  throw new ConfigurationError('No inventory given: pass -i/--inventory <csv> or --librenms <config.json>');
}

// Mode and job file are checked before any inventory is read
export function buildRunRequest(options: CliOptions, env: NodeJS.ProcessEnv = process.env): RunRequest {
  const modes = [options.yoink, options.yeet, options.saveOnly].filter(Boolean).length;
  if (modes !== 1) {
    throw new ConfigurationError('Choose exactly one of --yoink, --yeet or --save-only');
  }
  if (!options.saveOnly && !options.jobFile) {
    throw new ConfigurationError('A job file is required for yoink and yeet (-j/--jobfile)');
  }

  const runConfig = buildRunConfig({
    concurrencyLimit: options.threads,
    outputDir: options.output ? expandPath(options.output) : undefined,
    preloadEnabled: options.preload,
    sessionDebug: options.debugSession,
    quiet: options.quiet,
    verbose: options.verbose,
  }, env);

  return {
    source: inventorySource(options),
    modeFlag: { yoink: options.yoink, yeet: options.yeet },
    saveOnly: options.saveOnly,
    jobFile: options.jobFile ? expandPath(options.jobFile) : undefined,
    runConfig,
  };
}

export interface CliDeps extends RunnerDeps {
  env?: NodeJS.ProcessEnv;
  // Usage text and fatal errors
  print?: LogWriter;
}

/**
 * Run the command line. Resolves to the process exit code, or null when the
 * MCP server was started and the process has to stay up.
 */
export async function main(argv: readonly string[], deps: CliDeps = {}): Promise<number | null> {
  const print = deps.print ?? ((line: string) => console.error(line));

  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (err) {
    print(`Error: ${errorMessage(err)}`);
    print(USAGE);
    return 2;
  }

  if (options.help) {
    print(USAGE);
    return 0;
  }

  if (options.mcp) {
    const server = new NetopsMcpServer(options.mcpConfig, deps);
    await server.start();
    return null;
  }

  const logger = deps.logger ?? new ConsoleLogger(levelFromFlags(options));
  for (const warning of options.warnings) {
    logger.warn(warning);
  }

  try {
    const report = await runJob(buildRunRequest(options, deps.env), { ...deps, logger });
    return report.exitCode;
  } catch (err) {
    if (err instanceof ConfigurationError) {
      print(`Error: ${err.message}`);
      return 2;
    }
    throw err;
  }
}
