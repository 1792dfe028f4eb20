// Device login record
export interface DeviceRecord {
  readonly host: string;
  readonly username: string;
  readonly password: string;
  readonly secret: string;
  readonly deviceType: string;
}

// Filter predicates
export type FilterQualifier = 'EQUALS' | 'MATCHES_PATTERN';
export type MatchPolicy = 'ANY' | 'ALL';

export interface FilterPredicate {
  readonly field: string;
  readonly qualifier: FilterQualifier;
  readonly values: readonly string[];
  readonly inverted: boolean;
  readonly matchPolicy: MatchPolicy;
}

export type FilterSet = readonly FilterPredicate[];

// Job modes
export type JobMode = 'YOINK' | 'YEET' | 'SAVE_ONLY';

export interface JobSpec {
  readonly mode: JobMode;
  readonly commands: readonly string[];
}

// Run configuration
export interface RunConfig {
  readonly concurrencyLimit: number;
  readonly quiet: boolean;
  readonly verbose: boolean;
  readonly preloadEnabled: boolean;
  readonly outputDir: string;
  readonly sessionDebug: boolean;
  readonly saveAfterPush: boolean;
  readonly port: number;
  readonly connectTimeoutMs: number;
  readonly commandTimeoutMs: number;
}

// Device outcome
export type FailureStatus = 'AUTH_FAILURE' | 'CONNECT_FAILURE' | 'EXEC_FAILURE';
export type OutcomeStatus = 'SUCCESS' | FailureStatus;

export interface CommandCapture {
  readonly command: string;
  readonly output: string;
}

interface OutcomeBase {
  readonly host: string;
  readonly mode: JobMode;
  readonly perCommandOutput?: readonly CommandCapture[];
  readonly transcript?: string;
  readonly startedAt: string;
  readonly finishedAt: string;
}

export interface SuccessOutcome extends OutcomeBase {
  readonly status: 'SUCCESS';
}

export interface FailureOutcome extends OutcomeBase {
  readonly status: FailureStatus;
  readonly error: string;
}

export type DeviceOutcome = SuccessOutcome | FailureOutcome;

// Worker states
export type WorkerState =
  | 'PENDING'
  | 'CONNECTING'
  | 'AUTHENTICATING'
  | 'ELEVATING'
  | 'EXECUTING'
  | 'DISCONNECTING'
  | 'DONE'
  | 'FAILED';

// Run summary counts
export type RunSummary = Record<OutcomeStatus, number> & { total: number };

export interface RunReport {
  runDir: string;
  outcomes: DeviceOutcome[];
  summary: RunSummary;
  exitCode: number;
  elapsedMs: number;
}

// Run audit log entry
export interface RunLogEntry {
  ts: string;
  host: string;
  mode: JobMode;
  status: OutcomeStatus;
  artifact: string;
  duration_ms: number;
  commands?: number;
  error?: string;
}

// LibreNMS device descriptor, fields read by name (os, ip, hostname, sysName)
export type DiscoveredDevice = Record<string, unknown>;

export interface Credentials {
  username: string;
  password: string;
  secret: string;
}

// Background run started through the MCP server
export type TrackedRunStatus = 'running' | 'completed' | 'failed';

export interface TrackedRun {
  id: string;
  mode: JobMode;
  status: TrackedRunStatus;
  startTime: string;
  endTime?: string;
  report?: RunReport;
  error?: string;
}
