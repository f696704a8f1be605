import { parseExpression } from 'cron-parser';

export interface CronTrigger {
  kind: 'cron';
  /** One or more crontab lines; the earliest upcoming one wins */
  expression: string | readonly string[];
  timezone: string;
}

export interface FixedDelayTrigger {
  kind: 'fixed-delay';
  /** Measured from the end of the previous run, not its start */
  intervalMs: number;
  initialDelayMs: number;
}

export type Trigger = CronTrigger | FixedDelayTrigger;

export class InvalidTriggerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidTriggerError';
  }
}

function expressionsOf(trigger: CronTrigger): readonly string[] {
  return typeof trigger.expression === 'string' ? [trigger.expression] : trigger.expression;
}

/**
 * Throws InvalidTriggerError for an unparsable cron line or a non-positive interval.
 */
export function validateTrigger(trigger: Trigger): void {
  if (trigger.kind === 'fixed-delay') {
    if (!(trigger.intervalMs > 0)) {
      throw new InvalidTriggerError(`Fixed-delay interval must be positive, got ${trigger.intervalMs}`);
    }
    if (!(trigger.initialDelayMs >= 0)) {
      throw new InvalidTriggerError(`Initial delay must not be negative, got ${trigger.initialDelayMs}`);
    }
    return;
  }

  const expressions = expressionsOf(trigger);
  if (expressions.length === 0) {
    throw new InvalidTriggerError('Cron trigger needs at least one expression');
  }
  for (const expression of expressions) {
    try {
      parseExpression(expression, { tz: trigger.timezone });
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InvalidTriggerError(`Invalid cron expression "${expression}": ${reason}`);
    }
  }
}

/**
 * First cron fire strictly after `afterMs`.
 */
export function nextCronFire(trigger: CronTrigger, afterMs: number): number {
  let earliest = Number.POSITIVE_INFINITY;
  for (const expression of expressionsOf(trigger)) {
    const interval = parseExpression(expression, { currentDate: new Date(afterMs), tz: trigger.timezone });
    earliest = Math.min(earliest, interval.next().getTime());
  }
  return earliest;
}

export function describeTrigger(trigger: Trigger): string {
  if (trigger.kind === 'cron') {
    return `cron ${expressionsOf(trigger).join(', ')} (${trigger.timezone})`;
  }
  return `every ${trigger.intervalMs / 1000}s after completion`;
}
