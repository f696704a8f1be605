#!/usr/bin/env node
import './env';

import chalk from 'chalk';
import { configPathFromEnv, PROJECT_ROOT } from './env';
import { ConfigError, loadConfig } from './lib/config/load-config';
import { MailroomConfig } from './lib/config/schema';
import { buildJobSchedule, createJobs, JobOverrides, MailroomJobs } from './lib/jobs/create-jobs';
import { closeQuietly, formatReport, JobReport } from './lib/jobs/types';
import { MailboxConnectionError } from './lib/mailbox/types';
import { SchedulerOrchestrator } from './lib/scheduler/scheduler-orchestrator';
import { InvalidTriggerError } from './lib/scheduler/triggers';

export const USAGE = `
Usage:
  mailroom translate                  one translate run over the configured folders
  mailroom summarize                  one summarize run over the configured folders
  mailroom schedule                   run both jobs on their schedules until interrupted
  mailroom sample [folder] [limit]    translate at most [limit] unread messages of one folder
`;

export type CliCommand =
  | { name: 'translate' }
  | { name: 'summarize' }
  | { name: 'schedule' }
  | { name: 'sample'; folder: string; limit: number };

export const DEFAULT_SAMPLE_FOLDER = 'INBOX';
export const DEFAULT_SAMPLE_LIMIT = 1;

/**
 * Parse `argv` (without the node binary and script path). Returns undefined for unknown input.
 */
export function parseArgs(argv: readonly string[]): CliCommand | undefined {
  const [name, ...rest] = argv;

  switch (name) {
    case 'translate':
    case 'summarize':
    case 'schedule':
      return rest.length === 0 ? { name } : undefined;

    case 'sample': {
      const folder = rest[0] ?? DEFAULT_SAMPLE_FOLDER;
      const limit = rest[1] === undefined ? DEFAULT_SAMPLE_LIMIT : Number(rest[1]);
      if (!Number.isInteger(limit) || limit < 1 || rest.length > 2) {
        return undefined;
      }
      return { name, folder, limit };
    }

    default:
      return undefined;
  }
}

function printReport(label: string, report: JobReport): void {
  const colour = report.failed > 0 ? chalk.yellow : chalk.green;
  console.log(colour(`${label}: ${formatReport(report)}`));
}

/**
 * Run one command to completion. Resolves with the process exit code; `schedule`
 * only resolves after SIGINT/SIGTERM.
 */
export async function runCommand(
  command: CliCommand,
  config: MailroomConfig,
  overrides: JobOverrides = {}
): Promise<number> {
  const jobs = createJobs(config, { baseDir: PROJECT_ROOT, ...overrides });

  try {
    switch (command.name) {
      case 'translate':
        printReport('translate', await jobs.translate.run());
        return 0;

      case 'summarize':
        printReport('summarize', await jobs.summarize.run());
        return 0;

      case 'sample':
        console.log(chalk.blue(`Sampling up to ${command.limit} message(s) from ${command.folder}`));
        printReport('sample', await jobs.translate.run({ folder: command.folder, limit: command.limit }));
        return 0;

      case 'schedule':
        return await runSchedule(config, jobs, overrides);
    }
  } catch (error: unknown) {
    if (error instanceof MailboxConnectionError) {
      console.error(chalk.red(`Mailbox unavailable: ${error.message}`));
      return 1;
    }
    throw error;
  }
}

async function runSchedule(
  config: MailroomConfig,
  jobs: MailroomJobs,
  overrides: JobOverrides
): Promise<number> {
  // Fail at startup, not on the first trigger, when the mailbox is unreachable
  const probe = jobs.openMailbox();
  await probe.connect();
  await closeQuietly(probe);

  const scheduler = new SchedulerOrchestrator(buildJobSchedule(config, jobs), { clock: overrides.clock });
  scheduler.start();
  console.log(chalk.green('Scheduler started. Press Ctrl+C to exit.'));

  return new Promise<number>(resolve => {
    const shutdown = (signal: string) => {
      console.log(`Received ${signal}, stopping scheduler...`);
      scheduler.stop();
      resolve(0);
    };
    process.once('SIGTERM', () => shutdown('SIGTERM'));
    process.once('SIGINT', () => shutdown('SIGINT'));
  });
}

async function main(): Promise<void> {
  const command = parseArgs(process.argv.slice(2));
  if (!command) {
    console.log(USAGE);
    process.exit(1);
  }

  let config: MailroomConfig;
  try {
    config = loadConfig(configPathFromEnv());
  } catch (error: unknown) {
    if (error instanceof ConfigError) {
      console.error(chalk.red(error.message));
      process.exit(1);
    }
    throw error;
  }

  let exitCode: number;
  try {
    exitCode = await runCommand(command, config);
  } catch (error: unknown) {
    if (error instanceof InvalidTriggerError) {
      console.error(chalk.red(error.message));
      process.exit(1);
    }
    throw error;
  }
  process.exit(exitCode);
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error(chalk.red('mailroom failed:'), err);
    process.exit(1);
  });
}
