import { DeviceWorker } from './device-worker.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import type { SessionFactory } from './ssh-session.js';
import type { DeviceOutcome, DeviceRecord, FailureOutcome, JobSpec, RunConfig } from './types.js';

// Counting semaphore; waiters are admitted in arrival order
export class AdmissionGate {
  private available: number;
  private waiters: Array<() => void> = [];

  constructor(limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ConfigurationError(`Concurrency limit must be a positive integer, got ${limit}`);
    }
    this.available = limit;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  async acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return;
    }
    await new Promise<void>(resolve => this.waiters.push(resolve));
  }

  // Hands the slot straight to the next waiter, if any
  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.available++;
    }
  }

  async use<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}

export interface DispatcherOptions {
  sessionFactory: SessionFactory;
  logger?: Logger;
  // Called as each device finishes, in completion order
  onOutcome?: (outcome: DeviceOutcome) => void;
}

function workerFault(device: DeviceRecord, jobSpec: JobSpec, err: unknown): FailureOutcome {
  const now = new Date().toISOString();
  const failed: FailureOutcome = {
    host: device.host,
    mode: jobSpec.mode,
    status: 'EXEC_FAILURE',
    error: errorMessage(err),
    startedAt: now,
    finishedAt: now,
  };
  return Object.freeze(failed);
}

export class Dispatcher {
  private options: DispatcherOptions;
  private logger: Logger;
  private active = 0;
  private peak = 0;

  constructor(options: DispatcherOptions) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  // Highest number of workers running at once during the last run
  get peakActive(): number {
    return this.peak;
  }

  get activeWorkers(): number {
    return this.active;
  }

  // One outcome per device; failures never stop siblings and are not retried
  async run(devices: readonly DeviceRecord[], jobSpec: JobSpec, runConfig: RunConfig): Promise<DeviceOutcome[]> {
    const gate = new AdmissionGate(runConfig.concurrencyLimit);
    this.peak = 0;

    return Promise.all(
      devices.map(device => gate.use(() => this.runWorker(device, jobSpec, runConfig)))
    );
  }

  private async runWorker(device: DeviceRecord, jobSpec: JobSpec, runConfig: RunConfig): Promise<DeviceOutcome> {
    this.active++;
    this.peak = Math.max(this.peak, this.active);

    let outcome: DeviceOutcome | undefined;
    try {
      const logger = this.logger.child(device.host);
      logger.info(`starting ${jobSpec.mode.toLowerCase()}`);

      const worker = new DeviceWorker(device, jobSpec, {
        runConfig,
        sessionFactory: this.options.sessionFactory,
        logger,
      });
      outcome = await worker.run();

      if (outcome.status === 'SUCCESS') {
        logger.info('finished: SUCCESS');
      } else {
        logger.warn(`finished: ${outcome.status} (${outcome.error})`);
      }
    } catch (err) {
      // Workers settle device errors themselves; this keeps one outcome per device regardless
      if (!outcome) {
        outcome = workerFault(device, jobSpec, err);
      }
    } finally {
      this.active--;
    }

    this.options.onOutcome?.(outcome);
    return outcome;
  }
}
