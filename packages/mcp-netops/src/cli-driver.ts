import type { Duplex } from 'node:stream';
import { AuthFailure, ExecFailure, errorMessage } from './errors.js';
import type { DeviceProfile } from './device-profiles.js';
import type { SessionDebugSink } from './session-debug.js';

export interface CliDriverOptions {
  commandTimeoutMs: number;
  debug?: SessionDebugSink;
}

interface PromptMatch {
  text: string;
  index: number;
}

interface Waiter {
  patterns: readonly RegExp[];
  resolve: (match: PromptMatch) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
}

// Save confirmations answered before giving up
const MAX_SAVE_CONFIRMS = 3;

function normalize(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

function lastLine(text: string): string {
  const lines = text.split('\n');
  return lines[lines.length - 1];
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Hostname part of a prompt line: "r1(config-if)#" -> "r1"
export function basePrompt(promptLine: string): string {
  return promptLine.trim().replace(/[>#%$]$/, '').replace(/\([^)]*\)$/, '');
}

// The learned prompt, in any privilege or config context, as the whole last line
export function promptPattern(base: string): RegExp {
  return new RegExp(`(?:^|\\n)${escapeRegExp(base)}(?:\\([^)\\n]*\\))?[>#%$]\\s*$`);
}

// Drop the echoed command and the trailing prompt
export function cleanResponse(text: string, command: string, prompt: RegExp): string {
  const lines = text.split('\n');
  if (lines.length > 0 && command.trim() !== '' && lines[0].trimEnd().endsWith(command.trim())) {
    lines.shift();
  }
  if (lines.length > 0 && prompt.test(lines[lines.length - 1])) {
    lines.pop();
  }
  return lines.join('\n').trimEnd();
}

// Prompt-driven conversation with a device CLI over an interactive shell stream
export class CliDriver {
  private stream: Duplex;
  private profile: DeviceProfile;
  private commandTimeoutMs: number;
  private debug: SessionDebugSink | undefined;
  private buffer = '';
  private closed = false;
  private waiter: Waiter | null = null;
  private currentPrompt = '';
  // Generic profile prompt until login has seen the real one
  private promptRegex: RegExp;

  constructor(stream: Duplex, profile: DeviceProfile, options: CliDriverOptions) {
    this.stream = stream;
    this.profile = profile;
    this.promptRegex = profile.prompt;
    this.commandTimeoutMs = options.commandTimeoutMs;
    this.debug = options.debug;

    stream.on('data', (chunk: Buffer | string) => {
      const text = chunk.toString();
      this.debug?.received(text);
      this.buffer += text;
      this.check();
    });

    stream.on('close', () => {
      this.closed = true;
      this.check();
    });

    stream.on('error', (err: Error) => {
      this.closed = true;
      this.fail(new Error(`Shell stream error: ${err.message}`));
    });
  }

  get prompt(): string {
    return this.currentPrompt;
  }

  // Answer in-band login prompts, if the device asks for them, then learn the prompt
  async login(username: string, password: string): Promise<void> {
    await this.answerLogin(username, password);

    const base = basePrompt(this.currentPrompt);
    if (base !== '') {
      this.promptRegex = promptPattern(base);
    }
  }

  private async answerLogin(username: string, password: string): Promise<void> {
    const { usernamePrompt, passwordPrompt, prompt } = this.profile;

    let match = await this.readUntil([usernamePrompt, passwordPrompt, prompt]);
    if (match.index === 2) return;

    if (match.index === 0) {
      this.write(username);
      match = await this.readUntil([passwordPrompt, prompt]);
      if (match.index === 1) return;
    }

    this.write(password, false);
    match = await this.readUntil([prompt, usernamePrompt, passwordPrompt]);
    if (match.index !== 0) {
      throw new AuthFailure('Login rejected by device');
    }
  }

  async setup(): Promise<void> {
    for (const command of this.profile.sessionSetup) {
      await this.sendCommand(command);
    }
  }

  isPrivileged(): boolean {
    const { privilegedPrompt } = this.profile;
    return privilegedPrompt ? privilegedPrompt.test(this.currentPrompt) : true;
  }

  async elevate(secret: string): Promise<void> {
    const { enableCommand, privilegedPrompt, passwordPrompt } = this.profile;
    const prompt = this.promptRegex;
    if (!enableCommand || !privilegedPrompt) return;

    this.write(enableCommand);
    let match = await this.readUntil([passwordPrompt, privilegedPrompt, prompt]);
    if (match.index === 0) {
      this.write(secret, false);
      match = await this.readUntil([passwordPrompt, privilegedPrompt, prompt]);
    }

    if (match.index !== 1) {
      if (match.index === 0) {
        // Still asking: abandon the prompt so the session can be closed cleanly
        this.write('', false);
      }
      throw new AuthFailure(`Privilege elevation failed (${enableCommand})`);
    }
  }

  async sendCommand(command: string): Promise<string> {
    this.write(command);
    const match = await this.readUntil([this.promptRegex]);
    return cleanResponse(match.text, command, this.promptRegex);
  }

  // Enter config context, apply the batch line by line, leave config context
  async sendConfigSet(commands: readonly string[]): Promise<string> {
    const transcript: string[] = [this.currentPrompt];

    const step = async (command: string): Promise<string> => {
      this.write(command);
      const match = await this.readUntil([this.promptRegex]);
      transcript.push(match.text);
      return match.text;
    };

    try {
      await step(this.profile.configEnter);

      for (const command of commands) {
        const response = await step(command);
        const rejection = this.findError(response);
        if (rejection) {
          await step(this.profile.configExit).catch((err: unknown) => {
            transcript.push(`\n[leaving configuration mode failed: ${errorMessage(err)}]`);
          });
          throw new ExecFailure(`Device rejected "${command}": ${rejection}`, transcript.join(''));
        }
      }

      const exitResponse = await step(this.profile.configExit);
      const exitRejection = this.findError(exitResponse);
      if (exitRejection) {
        throw new ExecFailure(`Device rejected "${this.profile.configExit}": ${exitRejection}`, transcript.join(''));
      }
    } catch (err) {
      if (err instanceof ExecFailure) throw err;
      throw new ExecFailure(errorMessage(err), transcript.join(''));
    }

    return transcript.join('');
  }

  async saveConfig(): Promise<string> {
    const { saveCommand, saveConfirm } = this.profile;
    const prompt = this.promptRegex;
    if (!saveCommand) return '';

    this.write(saveCommand);
    const patterns = saveConfirm ? [prompt, saveConfirm] : [prompt];
    let output = '';

    for (let answered = 0; ; answered++) {
      const match = await this.readUntil(patterns);
      output += match.text;
      if (match.index === 0) break;
      if (answered >= MAX_SAVE_CONFIRMS) {
        throw new ExecFailure(`Save did not complete after ${MAX_SAVE_CONFIRMS} confirmations`, output);
      }
      this.write('', false);
    }

    const response = cleanResponse(output, saveCommand, prompt);
    const rejection = this.findError(response);
    if (rejection) {
      throw new ExecFailure(`Save failed: ${rejection}`, output);
    }
    return response;
  }

  close(): void {
    this.fail(new Error('Session closed'));
    this.stream.end();
  }

  private findError(response: string): string | undefined {
    for (const pattern of this.profile.errorPatterns) {
      const match = pattern.exec(response);
      if (match) {
        const line = response.slice(match.index).split('\n')[0];
        return line.trim();
      }
    }
    return undefined;
  }

  private write(text: string, record = true): void {
    this.debug?.sent(record ? text : '********');
    this.stream.write(`${text}\n`);
  }

  private readUntil(patterns: readonly RegExp[]): Promise<PromptMatch> {
    if (this.waiter) {
      return Promise.reject(new Error('A read is already waiting on this session'));
    }

    const timeoutMs = this.commandTimeoutMs;
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        reject(new Error(`Timed out after ${timeoutMs}ms waiting for the device prompt`));
      }, timeoutMs);

      this.waiter = { patterns, resolve, reject, timer };
      this.check();
    });
  }

  private check(): void {
    const waiter = this.waiter;
    if (!waiter) return;

    const text = normalize(this.buffer);
    const index = waiter.patterns.findIndex(pattern => pattern.test(text));
    if (index >= 0) {
      clearTimeout(waiter.timer);
      this.waiter = null;
      this.buffer = '';
      this.currentPrompt = lastLine(text);
      waiter.resolve({ text, index });
      return;
    }

    if (this.closed) {
      this.fail(new Error('Session closed by device'));
    }
  }

  private fail(err: Error): void {
    const waiter = this.waiter;
    if (!waiter) return;
    clearTimeout(waiter.timer);
    this.waiter = null;
    waiter.reject(err);
  }
}
