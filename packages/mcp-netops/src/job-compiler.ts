import { readFileSync, existsSync } from 'node:fs';
import { ConfigurationError } from './errors.js';
import type { JobSpec } from './types.js';

export interface ModeFlag {
  yoink: boolean;
  yeet: boolean;
}

// One command per line, trailing whitespace trimmed, blank lines skipped
export function parseCommandLines(raw: string | readonly string[]): readonly string[] {
  const lines = typeof raw === 'string' ? raw.split(/\r?\n/) : raw;
  return Object.freeze(lines.map(line => line.trimEnd()).filter(line => line.trim() !== ''));
}

export function compile(
  rawCommands: string | readonly string[],
  modeFlag: ModeFlag,
  saveOnly: boolean
): JobSpec {
  if (saveOnly) {
    return Object.freeze({ mode: 'SAVE_ONLY', commands: Object.freeze([]) });
  }

  if (modeFlag.yoink === modeFlag.yeet) {
    throw new ConfigurationError(
      modeFlag.yoink
        ? 'Job mode is ambiguous: choose either yoink or yeet, not both'
        : 'No job mode selected: choose yoink, yeet or save-only'
    );
  }

  const mode = modeFlag.yoink ? 'YOINK' : 'YEET';
  const commands = parseCommandLines(rawCommands);
  if (commands.length === 0) {
    throw new ConfigurationError(`${mode} needs at least one command`);
  }

  return Object.freeze({ mode, commands });
}

// Parsed command files keyed by path; with preload off every lookup re-reads
export class JobFileCache {
  private entries: Map<string, readonly string[]> = new Map();
  private preload: boolean;
  private reads = 0;

  constructor(preload: boolean) {
    this.preload = preload;
  }

  lines(path: string): readonly string[] {
    if (this.preload) {
      const cached = this.entries.get(path);
      if (cached) return cached;
    }

    if (!existsSync(path)) {
      throw new ConfigurationError(`Job file not found: ${path}`);
    }

    this.reads++;
    const lines = parseCommandLines(readFileSync(path, 'utf-8'));
    if (this.preload) {
      this.entries.set(path, lines);
    }
    return lines;
  }

  compile(path: string | undefined, modeFlag: ModeFlag, saveOnly: boolean): JobSpec {
    if (saveOnly) return compile([], modeFlag, true);
    if (!path) {
      throw new ConfigurationError('A job file is required for yoink and yeet');
    }
    return compile(this.lines(path), modeFlag, false);
  }

  get readCount(): number {
    return this.reads;
  }
}
