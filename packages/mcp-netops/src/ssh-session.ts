import { Client, type ClientChannel, type ConnectConfig } from 'ssh2';
import { join } from 'node:path';
import { CliDriver } from './cli-driver.js';
import { getProfile, type DeviceProfile } from './device-profiles.js';
import { AuthFailure, ConnectFailure } from './errors.js';
import { sanitizeFilename, uniqueName } from './result-collector.js';
import { SessionDebugLog, type SessionDebugSink } from './session-debug.js';
import type { Logger } from './logger.js';
import type { DeviceRecord, RunConfig } from './types.js';

// What a DeviceWorker needs from a device connection
export interface DeviceSession {
  // Command used to capture the persisted configuration
  readonly showConfigCommand: string;
  connect(): Promise<void>;
  authenticate(): Promise<void>;
  needsElevation(): boolean;
  elevate(): Promise<void>;
  sendCommand(command: string): Promise<string>;
  sendConfigSet(commands: readonly string[]): Promise<string>;
  saveConfig(): Promise<string>;
  disconnect(): Promise<void>;
}

export type SessionFactory = (device: DeviceRecord, runConfig: RunConfig, logger: Logger) => DeviceSession;

export interface SshSessionOptions {
  port: number;
  connectTimeoutMs: number;
  commandTimeoutMs: number;
  debug?: SessionDebugSink;
}

export class SshSession implements DeviceSession {
  private device: DeviceRecord;
  private profile: DeviceProfile;
  private options: SshSessionOptions;
  private client: Client | null = null;
  private driver: CliDriver | null = null;

  constructor(device: DeviceRecord, profile: DeviceProfile, options: SshSessionOptions) {
    this.device = device;
    this.profile = profile;
    this.options = options;
  }

  get showConfigCommand(): string {
    return this.profile.showConfigCommand;
  }

  async connect(): Promise<void> {
    const client = new Client();
    this.client = client;

    const connectConfig: ConnectConfig = {
      host: this.device.host,
      port: this.options.port,
      username: this.device.username,
      password: this.device.password,
      tryKeyboard: true,
      readyTimeout: this.options.connectTimeoutMs,
    };

    // Some platforms only offer keyboard-interactive; answer every prompt with the password
    client.on('keyboard-interactive', (_name, _instructions, _lang, prompts, finish) => {
      finish(prompts.map(() => this.device.password));
    });

    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        client.end();
        reject(new ConnectFailure(`Connection timeout to ${this.device.host}`));
      }, this.options.connectTimeoutMs);

      client.on('ready', () => {
        clearTimeout(timeout);
        resolve();
      });

      client.on('error', (err) => {
        clearTimeout(timeout);
        if (err.level === 'client-authentication') {
          reject(new AuthFailure(`SSH authentication failed for ${this.device.username}@${this.device.host}`));
        } else {
          reject(new ConnectFailure(`SSH connection error: ${err.message}`));
        }
      });

      client.connect(connectConfig);
    });
  }

  async authenticate(): Promise<void> {
    const client = this.client;
    if (!client) {
      throw new ConnectFailure('Not connected');
    }

    const channel = await new Promise<ClientChannel>((resolve, reject) => {
      client.shell({ term: 'vt100', cols: 511, rows: 24 }, (err, stream) => {
        if (err) {
          reject(new AuthFailure(`Shell request refused: ${err.message}`));
          return;
        }
        resolve(stream);
      });
    });

    this.driver = new CliDriver(channel, this.profile, {
      commandTimeoutMs: this.options.commandTimeoutMs,
      debug: this.options.debug,
    });
    await this.driver.login(this.device.username, this.device.password);
    await this.driver.setup();
  }

  needsElevation(): boolean {
    return Boolean(this.profile.enableCommand) && !this.cli().isPrivileged();
  }

  async elevate(): Promise<void> {
    await this.cli().elevate(this.device.secret);
  }

  sendCommand(command: string): Promise<string> {
    return this.cli().sendCommand(command);
  }

  sendConfigSet(commands: readonly string[]): Promise<string> {
    return this.cli().sendConfigSet(commands);
  }

  saveConfig(): Promise<string> {
    return this.cli().saveConfig();
  }

  async disconnect(): Promise<void> {
    this.driver?.close();
    this.driver = null;
    this.client?.end();
    this.client = null;
    await this.options.debug?.close();
  }

  private cli(): CliDriver {
    if (!this.driver) {
      throw new Error(`No shell session open to ${this.device.host}`);
    }
    return this.driver;
  }
}

export interface SshSessionFactoryOptions {
  // Directory for raw per-device session logs; unset disables them
  debugDir?: string;
}

export function createSshSessionFactory(options: SshSessionFactoryOptions = {}): SessionFactory {
  const debugLogNames = new Set<string>();

  return (device, runConfig, logger) => {
    const debug = options.debugDir
      ? new SessionDebugLog(
        join(options.debugDir, uniqueName(debugLogNames, sanitizeFilename(device.host), '.log')),
        logger
      )
      : undefined;
    if (debug) {
      logger.debug('session debug log enabled');
    }

    return new SshSession(device, getProfile(device.deviceType), {
      port: runConfig.port,
      connectTimeoutMs: runConfig.connectTimeoutMs,
      commandTimeoutMs: runConfig.commandTimeoutMs,
      debug,
    });
  };
}
