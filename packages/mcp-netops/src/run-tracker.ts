import { errorMessage } from './errors.js';
import type { JobMode, RunReport, TrackedRun } from './types.js';

export class RunTracker {
  private runs: Map<string, TrackedRun> = new Map();
  private settled: Map<string, Promise<void>> = new Map();

  // Generate unique run ID
  private generateId(): string {
    return `run_${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 6)}`;
  }

  // Start a run in the background
  start(mode: JobMode, task: () => Promise<RunReport>): TrackedRun {
    const run: TrackedRun = {
      id: this.generateId(),
      mode,
      status: 'running',
      startTime: new Date().toISOString(),
    };
    this.runs.set(run.id, run);

    const done = task().then(
      (report) => {
        run.status = 'completed';
        run.report = report;
      },
      (err: unknown) => {
        run.status = 'failed';
        run.error = errorMessage(err);
      }
    ).finally(() => {
      run.endTime = new Date().toISOString();
      this.settled.delete(run.id);
    });
    this.settled.set(run.id, done);

    return run;
  }

  // Get run by ID
  get(runId: string): TrackedRun {
    const run = this.runs.get(runId);
    if (!run) {
      throw new Error(`Run not found: ${runId}`);
    }
    return run;
  }

  // Resolves once the run has finished, successfully or not
  async wait(runId: string): Promise<TrackedRun> {
    const run = this.get(runId);
    await this.settled.get(runId);
    return run;
  }

  // Runs still in flight
  get activeCount(): number {
    return this.settled.size;
  }

  // List all runs, newest first
  list(): TrackedRun[] {
    return Array.from(this.runs.values()).sort((a, b) =>
      new Date(b.startTime).getTime() - new Date(a.startTime).getTime()
    );
  }
}
