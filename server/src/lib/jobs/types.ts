import { MailboxClient } from '../mailbox/types';

export interface JobReport {
  /** Messages picked up by the scan */
  processed: number;
  /** Messages written back (translations, or summary digests) */
  appended: number;
  /** Picked up but intentionally not processed: empty body, already linked */
  skipped: number;
  /** Per-message failures; the run carried on past each one */
  failed: number;
}

export type MailboxFactory = () => MailboxClient;

export function emptyReport(): JobReport {
  return { processed: 0, appended: 0, skipped: 0, failed: 0 };
}

export function formatReport(report: JobReport): string {
  return `processed=${report.processed} appended=${report.appended} skipped=${report.skipped} failed=${report.failed}`;
}

export async function closeQuietly(mailbox: MailboxClient): Promise<void> {
  try {
    await mailbox.close();
  } catch (error: unknown) {
    console.warn('[Mailbox] Error while closing connection:', errorMessage(error));
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
