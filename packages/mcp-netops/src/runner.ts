import { join } from 'node:path';
import { Dispatcher } from './dispatcher.js';
import { compile, JobFileCache, type ModeFlag } from './job-compiler.js';
import { resolve, type InventorySource } from './inventory.js';
import { ResultCollector } from './result-collector.js';
import { createSshSessionFactory, type SessionFactory } from './ssh-session.js';
import { silentLogger, type Logger } from './logger.js';
import type { DeviceRecord, JobSpec, RunConfig, RunReport, RunSummary } from './types.js';

export interface RunRequest {
  source: InventorySource;
  modeFlag: ModeFlag;
  saveOnly: boolean;
  // Command file path; takes precedence over inline commands
  jobFile?: string;
  commands?: string | readonly string[];
  runConfig: RunConfig;
}

export interface RunnerDeps {
  // Defaults to SSH sessions
  sessionFactory?: SessionFactory;
  logger?: Logger;
  jobCache?: JobFileCache;
  deviceTypes?: ReadonlySet<string>;
}

export function exitCodeFor(summary: RunSummary): number {
  return summary.SUCCESS === summary.total ? 0 : 1;
}

export function compileJob(request: RunRequest, cache: JobFileCache): JobSpec {
  if (request.jobFile !== undefined) {
    return cache.compile(request.jobFile, request.modeFlag, request.saveOnly);
  }
  return compile(request.commands ?? [], request.modeFlag, request.saveOnly);
}

export function formatSummary(summary: RunSummary): string {
  return [
    `${summary.SUCCESS}/${summary.total} succeeded`,
    `auth failures: ${summary.AUTH_FAILURE}`,
    `connect failures: ${summary.CONNECT_FAILURE}`,
    `exec failures: ${summary.EXEC_FAILURE}`,
  ].join(', ');
}

// Resolve targets without connecting to any of them
export function resolveTargets(source: InventorySource, deps: RunnerDeps = {}): Promise<DeviceRecord[]> {
  return resolve(source, { deviceTypes: deps.deviceTypes, logger: deps.logger });
}

// compile -> resolve -> dispatch -> collect. Configuration errors throw before any connection.
export async function runJob(request: RunRequest, deps: RunnerDeps = {}): Promise<RunReport> {
  const logger = deps.logger ?? silentLogger;
  const runConfig = request.runConfig;
  const started = Date.now();

  const jobSpec = compileJob(request, deps.jobCache ?? new JobFileCache(runConfig.preloadEnabled));
  const devices = await resolveTargets(request.source, deps);

  const collector = new ResultCollector({
    outputDir: runConfig.outputDir,
    startedAt: new Date(started),
    logger,
  });
  const sessionFactory = deps.sessionFactory ?? createSshSessionFactory({
    debugDir: runConfig.sessionDebug ? join(collector.runDir, 'session-debug') : undefined,
  });

  logger.info(
    `${jobSpec.mode.toLowerCase()}: ${devices.length} device(s), ${runConfig.concurrencyLimit} at a time`
  );

  const dispatcher = new Dispatcher({
    sessionFactory,
    logger,
    onOutcome: outcome => collector.record(outcome),
  });
  const outcomes = await dispatcher.run(devices, jobSpec, runConfig);

  const summary = collector.summary();
  const elapsedMs = Date.now() - started;
  await collector.writeSummary({
    mode: jobSpec.mode,
    commands: jobSpec.commands.length,
    concurrencyLimit: runConfig.concurrencyLimit,
    elapsedMs,
  });

  logger.info(`${formatSummary(summary)} in ${(elapsedMs / 1000).toFixed(1)}s`);
  logger.info(`results in ${collector.runDir}`);

  return {
    runDir: collector.runDir,
    outcomes,
    summary,
    exitCode: exitCodeFor(summary),
    elapsedMs,
  };
}
