import { Clock, MAX_TIMER_DELAY_MS, TimerHandle, systemClock } from '../clock';
import { JobLockManager } from './job-lock-manager';
import { Trigger, describeTrigger, nextCronFire, validateTrigger } from './triggers';

export type EntryState = 'idle' | 'missed' | 'firing';

export interface JobDefinition {
  id: string;
  trigger: Trigger;
  run: () => Promise<unknown>;
  /** Fire once as soon as the scheduler starts (warm-up run) */
  fireOnStart?: boolean;
  /** Fire after every completion of this job id; the job's own trigger is then not armed */
  runAfter?: string;
}

export interface ScheduleEntry {
  id: string;
  trigger: Trigger;
  state: EntryState;
  lastFiredAt?: number;
  lastCompletedAt?: number;
  /** A trigger arrived while the job was firing */
  missed: boolean;
  nextFireAt?: number;
  runs: number;
  failures: number;
}

export interface SchedulerOptions {
  clock?: Clock;
  /** Completion of these jobs fires every missed entry; defaults to all job ids */
  catchUpOn?: readonly string[];
  locks?: JobLockManager;
}

interface Registration {
  definition: JobDefinition;
  entry: ScheduleEntry;
}

/**
 * Runs recurring jobs off one timer armed for the earliest next fire across all entries.
 *
 * Runs are detached: the timer never waits on a job. A trigger that lands while its job is
 * still running only flags the entry as missed; missed entries are fired as soon as a job
 * listed in `catchUpOn` completes. `stop()` is immediate and leaves in-flight runs alone.
 */
export class SchedulerOrchestrator {
  private readonly clock: Clock;
  private readonly locks: JobLockManager;
  private readonly catchUpOn: ReadonlySet<string>;
  private readonly registrations: Registration[];
  private readonly running = new Set<Promise<void>>();
  private timer: TimerHandle | undefined;
  private started = false;
  private stopped = false;

  constructor(jobs: readonly JobDefinition[], options: SchedulerOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.locks = options.locks ?? new JobLockManager();

    const ids = new Set<string>();
    for (const job of jobs) {
      if (ids.has(job.id)) {
        throw new Error(`Duplicate job id: ${job.id}`);
      }
      ids.add(job.id);
      if (job.runAfter === undefined) {
        validateTrigger(job.trigger);
      }
    }
    for (const job of jobs) {
      if (job.runAfter !== undefined && !ids.has(job.runAfter)) {
        throw new Error(`Job ${job.id} runs after unknown job ${job.runAfter}`);
      }
    }

    this.catchUpOn = new Set(options.catchUpOn ?? ids);
    this.registrations = jobs.map(definition => ({
      definition,
      entry: {
        id: definition.id,
        trigger: definition.trigger,
        state: 'idle',
        missed: false,
        runs: 0,
        failures: 0
      }
    }));
  }

  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    const now = this.clock.now();

    for (const { definition, entry } of this.registrations) {
      if (definition.runAfter !== undefined) {
        console.log(`[Scheduler] ${entry.id}: runs after ${definition.runAfter}`);
        continue;
      }
      entry.nextFireAt = entry.trigger.kind === 'cron'
        ? nextCronFire(entry.trigger, now)
        : now + entry.trigger.initialDelayMs;
      console.log(`[Scheduler] ${entry.id}: ${describeTrigger(entry.trigger)}, first fire at ${new Date(entry.nextFireAt).toISOString()}`);
    }

    for (const registration of this.registrations) {
      if (registration.definition.fireOnStart) {
        this.fire(registration, 'warm-up');
      }
    }

    this.arm();
  }

  stop(): void {
    this.stopped = true;
    this.timer?.cancel();
    this.timer = undefined;
    console.log(`[Scheduler] Stopped (${this.running.size} run(s) still in flight)`);
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  snapshot(): ScheduleEntry[] {
    return this.registrations.map(({ entry }) => ({ ...entry }));
  }

  /**
   * Resolves once every run started so far has settled.
   */
  async whenIdle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running]);
    }
  }

  private arm(): void {
    this.timer?.cancel();
    this.timer = undefined;
    if (this.stopped) {
      return;
    }

    let earliest = Number.POSITIVE_INFINITY;
    for (const { entry } of this.registrations) {
      if (entry.nextFireAt !== undefined) {
        earliest = Math.min(earliest, entry.nextFireAt);
      }
    }
    if (earliest === Number.POSITIVE_INFINITY) {
      return;
    }

    // Long waits are cut into capped steps; an early wake finds nothing due and re-arms
    const delay = Math.min(Math.max(0, earliest - this.clock.now()), MAX_TIMER_DELAY_MS);
    this.timer = this.clock.setTimer(() => this.onTimer(), delay);
  }

  private onTimer(): void {
    this.timer = undefined;
    if (this.stopped) {
      return;
    }

    const now = this.clock.now();
    for (const registration of this.registrations) {
      const { nextFireAt } = registration.entry;
      if (nextFireAt !== undefined && nextFireAt <= now) {
        this.fire(registration, 'schedule');
      }
    }
    this.arm();
  }

  private fire(registration: Registration, reason: string): void {
    if (this.stopped) {
      return;
    }

    const { definition, entry } = registration;
    const now = this.clock.now();

    if (entry.state === 'firing') {
      entry.missed = true;
      entry.nextFireAt = this.followingFire(registration, now);
      console.log(`[Scheduler] ${entry.id}: still running, ${reason} fire marked as missed`);
      return;
    }

    entry.state = 'firing';
    entry.missed = false;
    entry.lastFiredAt = now;
    entry.runs++;
    entry.nextFireAt = this.followingFire(registration, now);
    console.log(`[Scheduler] ${entry.id}: firing (${reason}, run #${entry.runs})`);

    const run: Promise<void> = this.locks
      .processWithLock(entry.id, definition.run)
      .then(
        lock => {
          if (!lock.acquired) {
            console.warn(`[Scheduler] ${entry.id}: skipped, ${lock.reason}`);
          }
          return true;
        },
        (error: unknown) => {
          console.error(`[Scheduler] ${entry.id}: run failed:`, error instanceof Error ? error.message : error);
          return false;
        }
      )
      .then(succeeded => this.complete(registration, succeeded))
      .catch((error: unknown) => {
        console.error(`[Scheduler] ${entry.id}: completion handling failed:`, error);
      })
      .finally(() => {
        this.running.delete(run);
      });

    this.running.add(run);
  }

  private complete(registration: Registration, succeeded: boolean): void {
    const { definition, entry } = registration;
    const now = this.clock.now();

    entry.lastCompletedAt = now;
    if (!succeeded) {
      entry.failures++;
    }
    entry.state = entry.missed ? 'missed' : 'idle';

    if (this.stopped) {
      return;
    }

    if (entry.trigger.kind === 'fixed-delay' && definition.runAfter === undefined) {
      entry.nextFireAt = now + entry.trigger.intervalMs;
    }

    for (const follower of this.registrations) {
      if (follower.definition.runAfter === entry.id) {
        this.fire(follower, `after ${entry.id}`);
      }
    }

    if (this.catchUpOn.has(entry.id)) {
      for (const other of this.registrations) {
        if (other.entry.state === 'missed') {
          this.fire(other, 'catch-up');
        }
      }
    }

    this.arm();
  }

  /**
   * Cron entries advance past `now`; fixed-delay entries wait for completion to re-arm.
   */
  private followingFire(registration: Registration, now: number): number | undefined {
    const { definition, entry } = registration;
    if (definition.runAfter !== undefined || entry.trigger.kind === 'fixed-delay') {
      return undefined;
    }
    return nextCronFire(entry.trigger, now);
  }
}
