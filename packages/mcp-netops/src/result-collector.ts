import { appendFileSync, existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { errorMessage } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import type { DeviceOutcome, RunLogEntry, RunSummary } from './types.js';

// Characters and names that are illegal or discouraged in filenames on common platforms
const ILLEGAL_FILENAME_PARTS = /[ <>:\\/|?*$"\x00-\x1f]|CON|PRN|AUX|NUL|COM|LPT|\.\./g;

export function sanitizeFilename(name: string): string {
  return name.replace(ILLEGAL_FILENAME_PARTS, '_');
}

// `${base}${extension}`, or with -2, -3, ... when taken; records the result as taken
export function uniqueName(taken: Set<string>, base: string, extension: string): string {
  let name = `${base}${extension}`;
  for (let n = 2; taken.has(name); n++) {
    name = `${base}-${n}${extension}`;
  }
  taken.add(name);
  return name;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

// Local time, YYYY-MM-DD_HH-mm-ss
export function runDirName(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

// Create a fresh run directory; a name an earlier run already holds gets -2, -3, ...
export function claimRunDir(outputDir: string, name: string): string {
  mkdirSync(outputDir, { recursive: true });
  for (let n = 1; ; n++) {
    const candidate = join(outputDir, n === 1 ? name : `${name}-${n}`);
    try {
      mkdirSync(candidate);
      return candidate;
    } catch (err) {
      if (!(err instanceof Error && 'code' in err && err.code === 'EEXIST')) {
        throw err;
      }
    }
  }
}

export function emptySummary(): RunSummary {
  return { SUCCESS: 0, AUTH_FAILURE: 0, CONNECT_FAILURE: 0, EXEC_FAILURE: 0, total: 0 };
}

export function renderArtifact(outcome: DeviceOutcome): string {
  const lines: string[] = [];

  if (outcome.status !== 'SUCCESS') {
    lines.push(`status: ${outcome.status}`, `error: ${outcome.error}`, '');
  }
  for (const { command, output } of outcome.perCommandOutput ?? []) {
    lines.push(`===== ${command} =====`, output, '');
  }
  if (outcome.transcript !== undefined) {
    lines.push(outcome.transcript, '');
  }

  return lines.join('\n');
}

export interface ResultCollectorOptions {
  outputDir: string;
  startedAt?: Date;
  logger?: Logger;
}

// Single accumulation point for outcomes arriving from concurrent workers
export class ResultCollector {
  readonly runDir: string;
  private logger: Logger;
  private counts: RunSummary = emptySummary();
  private outcomes: DeviceOutcome[] = [];
  private artifactNames: Set<string> = new Set();
  private artifacts: Map<string, string> = new Map();
  private writes: Promise<void> = Promise.resolve();
  private failedWrites = 0;

  constructor(options: ResultCollectorOptions) {
    this.logger = options.logger ?? silentLogger;

    const name = runDirName(options.startedAt ?? new Date());
    try {
      this.runDir = claimRunDir(options.outputDir, name);
    } catch (err) {
      // Writes into it fail and are counted per outcome
      this.runDir = join(options.outputDir, name);
      this.logger.warn(`Could not create run directory ${this.runDir}: ${errorMessage(err)}`);
    }
  }

  record(outcome: DeviceOutcome): void {
    this.outcomes.push(outcome);
    this.counts[outcome.status]++;
    this.counts.total++;

    this.writes = this.writes
      .then(() => this.persist(outcome))
      .catch((err: unknown) => {
        this.failedWrites++;
        this.logger.error(`Could not write results for ${outcome.host}: ${errorMessage(err)}`);
      });
  }

  // Resolves once every recorded outcome has been written
  async flush(): Promise<void> {
    await this.writes;
  }

  summary(): RunSummary {
    return { ...this.counts };
  }

  getOutcomes(): readonly DeviceOutcome[] {
    return this.outcomes;
  }

  // Artifact file name for a host, once written
  artifactFor(host: string): string | undefined {
    return this.artifacts.get(host);
  }

  get writeFailures(): number {
    return this.failedWrites;
  }

  async writeSummary(meta: Record<string, unknown> = {}): Promise<string> {
    await this.flush();
    this.ensureRunDir();
    const path = join(this.runDir, 'summary.json');
    writeFileSync(path, JSON.stringify({ ...meta, summary: this.summary() }, null, 2) + '\n');
    return path;
  }

  private ensureRunDir(): void {
    if (!existsSync(this.runDir)) {
      mkdirSync(this.runDir, { recursive: true });
    }
  }

  private uniqueArtifactName(outcome: DeviceOutcome): string {
    const base = `${sanitizeFilename(outcome.host)}.${outcome.mode.toLowerCase()}`;
    return uniqueName(this.artifactNames, base, '.txt');
  }

  private persist(outcome: DeviceOutcome): void {
    this.ensureRunDir();

    const artifact = this.uniqueArtifactName(outcome);
    writeFileSync(join(this.runDir, artifact), renderArtifact(outcome));
    this.artifacts.set(outcome.host, artifact);

    const entry: RunLogEntry = {
      ts: outcome.finishedAt,
      host: outcome.host,
      mode: outcome.mode,
      status: outcome.status,
      artifact,
      duration_ms: Date.parse(outcome.finishedAt) - Date.parse(outcome.startedAt),
    };
    if (outcome.perCommandOutput) {
      entry.commands = outcome.perCommandOutput.length;
    }
    if (outcome.status !== 'SUCCESS') {
      entry.error = outcome.error;
    }

    appendFileSync(join(this.runDir, 'run.jsonl'), JSON.stringify(entry) + '\n');
  }
}
