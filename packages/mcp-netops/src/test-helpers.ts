import { AuthFailure, ConnectFailure, ExecFailure } from './errors.js';
import type { Logger } from './logger.js';
import type { DeviceSession, SessionFactory } from './ssh-session.js';
import type { DeviceRecord } from './types.js';

// In-process stand-ins for device sessions used across the test suites

export interface FakeSessionScript {
  refuseConnect?: boolean;
  rejectLogin?: boolean;
  rejectSecret?: boolean;
  // Logged in below the privileged level
  unprivileged?: boolean;
  outputs?: Record<string, string>;
  failingCommands?: readonly string[];
  // Config lines the device refuses
  rejectLines?: readonly string[];
  failSave?: boolean;
  failDisconnect?: boolean;
  // Milliseconds each step waits before answering
  latencyMs?: number;
}

export interface ConcurrencyGauge {
  active: number;
  peak: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export class FakeSession implements DeviceSession {
  readonly showConfigCommand = 'show startup-config';
  readonly calls: string[] = [];
  private host: string;
  private script: FakeSessionScript;
  private gauge: ConcurrencyGauge | undefined;
  private connected = false;

  constructor(host: string, script: FakeSessionScript = {}, gauge?: ConcurrencyGauge) {
    this.host = host;
    this.script = script;
    this.gauge = gauge;
  }

  get isConnected(): boolean {
    return this.connected;
  }

  async connect(): Promise<void> {
    this.calls.push('connect');
    await this.wait();
    if (this.script.refuseConnect) {
      throw new ConnectFailure(`SSH connection error: connect ECONNREFUSED ${this.host}:22`);
    }
    this.connected = true;
    if (this.gauge) {
      this.gauge.active++;
      this.gauge.peak = Math.max(this.gauge.peak, this.gauge.active);
    }
  }

  async authenticate(): Promise<void> {
    this.calls.push('authenticate');
    await this.wait();
    if (this.script.rejectLogin) {
      throw new AuthFailure('Login rejected by device');
    }
  }

  needsElevation(): boolean {
    return this.script.unprivileged === true;
  }

  async elevate(): Promise<void> {
    this.calls.push('elevate');
    await this.wait();
    if (this.script.rejectSecret) {
      throw new AuthFailure('Privilege elevation failed (enable)');
    }
  }

  async sendCommand(command: string): Promise<string> {
    this.calls.push(`send:${command}`);
    await this.wait();
    if (this.script.failingCommands?.includes(command)) {
      throw new Error('Timed out after 50ms waiting for the device prompt');
    }
    if (command === this.showConfigCommand) {
      return this.script.outputs?.[command] ?? `hostname ${this.host}\n!\nend`;
    }
    return this.script.outputs?.[command] ?? `${command} output from ${this.host}`;
  }

  async sendConfigSet(commands: readonly string[]): Promise<string> {
    this.calls.push(`config:${commands.join('|')}`);
    await this.wait();

    let transcript = `${this.host}#configure terminal\n`;
    for (const line of commands) {
      transcript += `${this.host}(config)#${line}\n`;
      if (this.script.rejectLines?.includes(line)) {
        transcript += "% Invalid input detected at '^' marker.\n";
        throw new ExecFailure(`Device rejected "${line}": % Invalid input detected at '^' marker.`, transcript);
      }
    }
    return `${transcript}${this.host}(config)#end\n${this.host}#`;
  }

  async saveConfig(): Promise<string> {
    this.calls.push('save');
    await this.wait();
    if (this.script.failSave) {
      throw new ExecFailure('Save failed: % Error opening nvram:startup-config');
    }
    return 'Building configuration...\n[OK]';
  }

  async disconnect(): Promise<void> {
    this.calls.push('disconnect');
    if (this.connected && this.gauge) {
      this.gauge.active--;
    }
    this.connected = false;
    if (this.script.failDisconnect) {
      throw new Error('socket already closed');
    }
  }

  private async wait(): Promise<void> {
    if (this.script.latencyMs) {
      await sleep(this.script.latencyMs);
    }
  }
}

// Factory that hands out scripted sessions keyed by host and remembers them
export class FakeSessionFactory {
  readonly sessions: Map<string, FakeSession> = new Map();
  readonly gauge: ConcurrencyGauge = { active: 0, peak: 0 };
  private scripts: Record<string, FakeSessionScript>;
  private fallback: FakeSessionScript;

  constructor(scripts: Record<string, FakeSessionScript> = {}, fallback: FakeSessionScript = {}) {
    this.scripts = scripts;
    this.fallback = fallback;
  }

  readonly create: SessionFactory = (device: DeviceRecord) => {
    const script = Object.prototype.hasOwnProperty.call(this.scripts, device.host)
      ? this.scripts[device.host]
      : this.fallback;
    const session = new FakeSession(device.host, script, this.gauge);
    this.sessions.set(device.host, session);
    return session;
  };

  session(host: string): FakeSession {
    const session = this.sessions.get(host);
    if (!session) {
      throw new Error(`no session was created for ${host}`);
    }
    return session;
  }
}

export function device(host: string, deviceType = 'cisco_ios'): DeviceRecord {
  return Object.freeze({
    host,
    username: 'netops',
    password: 'test-password',
    secret: 'test-secret',
    deviceType,
  });
}

export interface RecordingLogger extends Logger {
  lines: string[];
}

// Collects "level [scope] message" lines
export function recordingLogger(scope = '', lines: string[] = []): RecordingLogger {
  const prefix = scope ? `[${scope}] ` : '';
  const write = (level: string) => (message: string) => {
    lines.push(`${level} ${prefix}${message}`);
  };
  return {
    lines,
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
    child: (child: string) => recordingLogger(scope ? `${scope}:${child}` : child, lines),
  };
}
