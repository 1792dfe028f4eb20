import { AuthFailure, ExecFailure, errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import type { DeviceSession, SessionFactory } from './ssh-session.js';
import type {
  CommandCapture,
  DeviceOutcome,
  DeviceRecord,
  FailureOutcome,
  FailureStatus,
  JobSpec,
  RunConfig,
  SuccessOutcome,
  WorkerState,
} from './types.js';

export interface ExecutionResult {
  perCommandOutput?: readonly CommandCapture[];
  transcript?: string;
}

export interface ExecuteOptions {
  saveAfterPush: boolean;
  logger: Logger;
}

async function collect(commands: readonly string[], session: DeviceSession, logger: Logger): Promise<ExecutionResult> {
  const perCommandOutput: CommandCapture[] = [];

  for (const command of commands) {
    let output: string;
    try {
      output = await session.sendCommand(command);
    } catch (err) {
      // One failed command does not stop the rest
      logger.warn(`"${command}" failed: ${errorMessage(err)}`);
      output = `[command failed: ${errorMessage(err)}]`;
    }
    perCommandOutput.push(Object.freeze({ command, output }));
  }

  return { perCommandOutput: Object.freeze(perCommandOutput) };
}

async function push(
  commands: readonly string[],
  session: DeviceSession,
  options: ExecuteOptions
): Promise<ExecutionResult> {
  let transcript = '';
  let rejection: unknown;

  try {
    transcript = await session.sendConfigSet(commands);
  } catch (err) {
    rejection = err;
    transcript = err instanceof ExecFailure ? err.transcript : '';
  }

  // Save on every path, so a partly applied batch is not lost on reload
  if (options.saveAfterPush) {
    try {
      const saved = await session.saveConfig();
      if (saved) transcript = transcript ? `${transcript}\n${saved}` : saved;
    } catch (err) {
      const message = `Save after push failed: ${errorMessage(err)}`;
      if (rejection === undefined) {
        throw new ExecFailure(message, transcript);
      }
      options.logger.warn(message);
    }
  }

  if (rejection !== undefined) {
    throw new ExecFailure(errorMessage(rejection), transcript);
  }
  return { transcript };
}

async function saveOnly(session: DeviceSession): Promise<ExecutionResult> {
  await session.saveConfig();
  const command = session.showConfigCommand;
  const output = await session.sendCommand(command);
  return { perCommandOutput: Object.freeze([Object.freeze({ command, output })]) };
}

// Single dispatch over the job mode
export function execute(jobSpec: JobSpec, session: DeviceSession, options: ExecuteOptions): Promise<ExecutionResult> {
  switch (jobSpec.mode) {
    case 'YOINK':
      return collect(jobSpec.commands, session, options.logger);
    case 'YEET':
      return push(jobSpec.commands, session, options);
    case 'SAVE_ONLY':
      return saveOnly(session);
  }
}

export function failureStatus(state: WorkerState, err: unknown): FailureStatus {
  switch (state) {
    case 'PENDING':
    case 'CONNECTING':
      return err instanceof AuthFailure ? 'AUTH_FAILURE' : 'CONNECT_FAILURE';
    case 'AUTHENTICATING':
    case 'ELEVATING':
      return 'AUTH_FAILURE';
    default:
      return 'EXEC_FAILURE';
  }
}

export interface WorkerContext {
  runConfig: RunConfig;
  sessionFactory: SessionFactory;
  logger: Logger;
}

interface Failure {
  status: FailureStatus;
  error: string;
  transcript?: string;
}

// Drives one device from connect to disconnect; device errors become the outcome
export class DeviceWorker {
  private device: DeviceRecord;
  private jobSpec: JobSpec;
  private context: WorkerContext;
  private logger: Logger;
  private current: WorkerState = 'PENDING';

  constructor(device: DeviceRecord, jobSpec: JobSpec, context: WorkerContext) {
    this.device = device;
    this.jobSpec = jobSpec;
    this.context = context;
    this.logger = context.logger;
  }

  get state(): WorkerState {
    return this.current;
  }

  async run(): Promise<DeviceOutcome> {
    const startedAt = new Date().toISOString();
    let session: DeviceSession | undefined;
    let result: ExecutionResult = {};
    let failure: Failure | undefined;

    try {
      try {
        this.transition('CONNECTING');
        session = this.context.sessionFactory(this.device, this.context.runConfig, this.logger);
        await session.connect();

        this.transition('AUTHENTICATING');
        await session.authenticate();

        if (session.needsElevation()) {
          this.transition('ELEVATING');
          await session.elevate();
        }

        this.transition('EXECUTING');
        result = await execute(this.jobSpec, session, {
          saveAfterPush: this.context.runConfig.saveAfterPush,
          logger: this.logger,
        });
      } catch (err) {
        failure = {
          status: failureStatus(this.current, err),
          error: errorMessage(err),
          transcript: err instanceof ExecFailure && this.jobSpec.mode === 'YEET' ? err.transcript : undefined,
        };
        this.logger.debug(`${this.current} failed: ${failure.error}`);
      }
    } finally {
      if (session) {
        await this.release(session);
      }
    }

    const base = {
      host: this.device.host,
      mode: this.jobSpec.mode,
      startedAt,
      finishedAt: new Date().toISOString(),
    };

    if (failure) {
      this.transition('FAILED');
      const outcome: FailureOutcome = {
        ...base,
        status: failure.status,
        error: failure.error,
        ...(failure.transcript !== undefined ? { transcript: failure.transcript } : {}),
      };
      return Object.freeze(outcome);
    }

    this.transition('DONE');
    const outcome: SuccessOutcome = { ...base, status: 'SUCCESS', ...result };
    return Object.freeze(outcome);
  }

  // Disconnect on every path, even when logging the transition throws
  private async release(session: DeviceSession): Promise<void> {
    try {
      this.transition('DISCONNECTING');
    } finally {
      await session.disconnect().catch((err: unknown) => {
        this.logger.warn(`disconnect failed: ${errorMessage(err)}`);
      });
    }
  }

  private transition(next: WorkerState): void {
    this.logger.debug(`${this.current} -> ${next}`);
    this.current = next;
  }
}
