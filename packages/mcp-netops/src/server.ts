import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { buildRunConfig, expandPath, loadDiscoveryConfig, loadServerConfig, type ServerConfig } from './config.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { dynamicSourceFromConfig, loadStaticInventory, type InventorySource } from './inventory.js';
import { JobFileCache } from './job-compiler.js';
import { ConsoleLogger, levelFromFlags, type Logger } from './logger.js';
import { RunTracker } from './run-tracker.js';
import { formatSummary, resolveTargets, runJob, type RunnerDeps, type RunRequest } from './runner.js';
import type { JobMode, RunReport } from './types.js';

const modeSchema = z.enum(['yoink', 'yeet', 'save_only']);

const inventoryArgs = {
  inventory: z.string().optional().describe('Static inventory CSV (host, username, password, secret, device_type)'),
  librenms: z.string().optional().describe('LibreNMS discovery config JSON'),
};

const runArgs = {
  mode: modeSchema.describe('yoink collects command output, yeet pushes a config batch, save_only saves the config'),
  commands: z.array(z.string()).optional().describe('Commands, one per entry (yoink and yeet)'),
  jobFile: z.string().optional().describe('Command file, one command per line (instead of commands)'),
  ...inventoryArgs,
  concurrencyLimit: z.number().int().positive().optional().describe('Devices worked on at once'),
};

interface RunArgs {
  mode: z.infer<typeof modeSchema>;
  commands?: string[];
  jobFile?: string;
  inventory?: string;
  librenms?: string;
  concurrencyLimit?: number;
}

function toJobMode(mode: RunArgs['mode']): JobMode {
  return mode === 'save_only' ? 'SAVE_ONLY' : mode === 'yeet' ? 'YEET' : 'YOINK';
}

export function formatReport(report: RunReport): string {
  const lines = report.outcomes.map(o =>
    o.status === 'SUCCESS'
      ? `${o.host.padEnd(20)} SUCCESS`
      : `${o.host.padEnd(20)} ${o.status.padEnd(15)} ${o.error}`
  );
  return [
    `Run finished: ${formatSummary(report.summary)}`,
    `Results: ${report.runDir}`,
    '',
    ...lines,
  ].join('\n');
}

export class NetopsMcpServer {
  private server: McpServer;
  private config: ServerConfig;
  private runTracker: RunTracker;
  private jobCache: JobFileCache;
  private deps: RunnerDeps;
  private logger: Logger;

  constructor(configPath?: string, deps: RunnerDeps = {}) {
    this.config = loadServerConfig(configPath);
    this.logger = deps.logger ?? new ConsoleLogger(levelFromFlags({
      quiet: this.config.defaults.quiet ?? false,
      verbose: this.config.defaults.verbose ?? false,
    }));
    this.deps = { ...deps, logger: this.logger };
    this.runTracker = new RunTracker();
    this.jobCache = new JobFileCache(this.config.defaults.preloadEnabled ?? true);

    this.server = new McpServer({
      name: 'mcp-netops',
      version: '0.1.0',
    });

    this.registerTools();
  }

  private inventorySource(args: { inventory?: string; librenms?: string }): InventorySource {
    if (args.inventory && args.librenms) {
      throw new ConfigurationError('Choose either inventory or librenms, not both');
    }

    const inventory = args.inventory ?? (args.librenms ? undefined : this.config.inventory);
    if (inventory) {
      return loadStaticInventory(expandPath(inventory));
    }

    const librenms = args.librenms ?? this.config.librenms;
    if (librenms) {
      return dynamicSourceFromConfig(loadDiscoveryConfig(librenms));
    }

    throw new ConfigurationError('No inventory configured: pass inventory or librenms, or set one in the server config');
  }

  private runRequest(args: RunArgs): RunRequest {
    const mode = toJobMode(args.mode);
    return {
      source: this.inventorySource(args),
      modeFlag: { yoink: mode === 'YOINK', yeet: mode === 'YEET' },
      saveOnly: mode === 'SAVE_ONLY',
      jobFile: args.jobFile ? expandPath(args.jobFile) : undefined,
      commands: args.commands,
      runConfig: buildRunConfig({
        ...this.config.defaults,
        ...(args.concurrencyLimit !== undefined ? { concurrencyLimit: args.concurrencyLimit } : {}),
      }),
    };
  }

  private registerTools(): void {
    this.registerInventoryTools();
    this.registerRunTools();
  }

  private registerInventoryTools(): void {
    // inventory_list
    this.server.tool(
      'inventory_list',
      'Resolve the device inventory (static CSV or LibreNMS discovery) and list the targets without connecting',
      inventoryArgs,
      async (args) => {
        try {
          const devices = await resolveTargets(this.inventorySource(args), this.deps);
          const lines = devices.map(d => `${d.host.padEnd(20)} ${d.deviceType}`);

          return {
            content: [{
              type: 'text',
              text: `${devices.length} device(s):\n${lines.join('\n')}`,
            }],
          };
        } catch (err) {
          return {
            content: [{ type: 'text', text: `Error: ${errorMessage(err)}` }],
            isError: true,
          };
        }
      }
    );
  }

  private registerRunTools(): void {
    // run_job
    this.server.tool(
      'run_job',
      'Run a job against every device in the inventory and wait for the summary',
      runArgs,
      async (args) => {
        try {
          const report = await runJob(this.runRequest(args), { ...this.deps, jobCache: this.jobCache });

          return {
            content: [{ type: 'text', text: formatReport(report) }],
          };
        } catch (err) {
          return {
            content: [{ type: 'text', text: `Run failed: ${errorMessage(err)}` }],
            isError: true,
          };
        }
      }
    );

    // run_start
    this.server.tool(
      'run_start',
      'Start a job in the background and return its run ID',
      runArgs,
      async (args) => {
        try {
          // Validate the request before going to the background
          const request = this.runRequest(args);
          const run = this.runTracker.start(
            toJobMode(args.mode),
            () => runJob(request, { ...this.deps, jobCache: this.jobCache })
          );

          return {
            content: [{ type: 'text', text: `Run started: ${run.id}` }],
          };
        } catch (err) {
          return {
            content: [{ type: 'text', text: `Failed to start run: ${errorMessage(err)}` }],
            isError: true,
          };
        }
      }
    );

    // run_status
    this.server.tool(
      'run_status',
      'Get the status of a background run',
      {
        runId: z.string().describe('Run ID to check'),
      },
      async ({ runId }) => {
        try {
          const run = this.runTracker.get(runId);
          const duration = run.endTime
            ? new Date(run.endTime).getTime() - new Date(run.startTime).getTime()
            : Date.now() - new Date(run.startTime).getTime();

          let text = `Run: ${run.id}\nMode: ${run.mode}\nStatus: ${run.status}\nDuration: ${Math.round(duration / 1000)}s`;
          if (run.report) text += `\n\n${formatReport(run.report)}`;
          if (run.error) text += `\nError: ${run.error}`;

          return {
            content: [{ type: 'text', text }],
          };
        } catch (err) {
          return {
            content: [{ type: 'text', text: `Error: ${errorMessage(err)}` }],
            isError: true,
          };
        }
      }
    );

    // run_list
    this.server.tool(
      'run_list',
      'List runs started in this session',
      {},
      async () => {
        const runs = this.runTracker.list();

        if (runs.length === 0) {
          return {
            content: [{ type: 'text', text: 'No runs found' }],
          };
        }

        const lines = runs.map(r => {
          const age = Math.round((Date.now() - new Date(r.startTime).getTime()) / 1000);
          const counts = r.report ? ` ${r.report.summary.SUCCESS}/${r.report.summary.total} ok` : '';
          return `[${r.id}] ${r.status.padEnd(9)} ${r.mode.padEnd(9)} ${age}s ago${counts}`;
        });

        return {
          content: [{ type: 'text', text: lines.join('\n') }],
        };
      }
    );
  }

  async start(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    this.logger.info('MCP server listening on stdio');

    process.on('SIGINT', () => this.shutdown());
    process.on('SIGTERM', () => this.shutdown());
  }

  private shutdown(): void {
    this.server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        this.logger.error(`Shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
      }
    );
  }
}
