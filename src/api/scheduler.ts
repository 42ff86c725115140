/**
 * Cron-based chain audit.
 * Re-verifies the whole ledger on a configurable schedule and logs the first
 * broken link, if any.
 */

import * as cron from 'node-cron';
import { ChainVerification } from '../chain/types';
import { RegistrationLedger } from '../ledger/registrationLedger';

export interface ChainAuditConfig {
  cron: string;       // e.g. '*/15 * * * *'
  timezone: string;   // e.g. 'UTC'
}

export class ChainAuditScheduler {
  private job: cron.ScheduledTask | null = null;
  private running = false;
  lastResult: ChainVerification | null = null;

  constructor(
    private ledger: RegistrationLedger,
    private config: ChainAuditConfig,
  ) {
    if (!cron.validate(config.cron)) {
      throw new Error(`Invalid chain audit cron expression: "${config.cron}"`);
    }
  }

  start(): void {
    this.job = cron.schedule(this.config.cron, () => {
      this.runAudit().catch(err => {
        console.error('Scheduler: chain audit failed:', err);
      });
    }, { timezone: this.config.timezone });

    console.log(`Scheduler: chain audit "${this.config.cron}" (${this.config.timezone})`);
  }

  stop(): void {
    this.job?.stop();
    this.job = null;
  }

  /** One audit pass. Skipped (returns null) while a previous pass is still running. */
  async runAudit(): Promise<ChainVerification | null> {
    if (this.running) {
      console.log('Scheduler: skip audit, previous pass still running');
      return null;
    }
    this.running = true;
    try {
      const result = await this.ledger.verifyChain();
      this.lastResult = result;
      if (result.valid) {
        console.log(`Scheduler: chain intact, ${result.length} entries`);
      } else {
        console.error(`Scheduler: chain broken at entry ${result.brokenAt} (${result.reason})`);
      }
      return result;
    } finally {
      this.running = false;
    }
  }
}
