/**
 * Compares recorded app versions against the catalog and downloads
 * whatever is out of date, one app at a time
 */

import type { LedgerEntry, ReconcileResult } from '../types/ledger.js';
import type { CatalogClient } from '../splunkbase/client.js';
import { readLedger, updateLedger } from '../state/ledger.js';
import { errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';

export interface ReconcilerOptions {
  client: CatalogClient;
  ledgerPath?: string;
  logger: Logger;
}

export function appLabel(entry: Pick<LedgerEntry, 'name' | 'uid'>, version: string): string {
  return `${entry.name}_${entry.uid}_${version}`;
}

export class Reconciler {
  private readonly client: CatalogClient;
  private readonly ledgerPath?: string;
  private readonly logger: Logger;

  constructor(options: ReconcilerOptions) {
    this.client = options.client;
    this.ledgerPath = options.ledgerPath;
    this.logger = options.logger;
  }

  async reconcile(): Promise<ReconcileResult> {
    const downloaded: string[] = [];
    const skipped: string[] = [];

    if (!this.client.isAuthenticated()) {
      this.logger.error('Not authenticated. Call authenticate() first.');
      return { downloaded, skipped };
    }
    if (!this.ledgerPath) {
      this.logger.error('No apps file configured');
      return { downloaded, skipped };
    }

    let entries: LedgerEntry[];
    try {
      entries = await readLedger(this.ledgerPath);
    } catch (err) {
      this.logger.error(errorMessage(err));
      return { downloaded, skipped };
    }

    this.logger.info(`Checking updates for ${entries.length} apps...`);

    for (const entry of entries) {
      const current = entry.version;
      const latest = await this.client.getLatestVersion(entry.uid);

      if (!latest) {
        this.logger.warn(`Could not retrieve latest version for ${entry.uid}`);
        skipped.push(appLabel(entry, current));
        continue;
      }

      if (latest === current) {
        this.logger.info(`App ${entry.uid} is up to date (version ${current})`);
        skipped.push(appLabel(entry, current));
        continue;
      }

      this.logger.info(`Update available for ${entry.uid}: ${current} → ${latest}`);
      const updatedTime = await this.client.downloadPackage(entry.name, entry.uid, latest);

      if (updatedTime) {
        // A failed ledger write is logged by updateLedger and does not stop the run
        await updateLedger(this.ledgerPath, entry.uid, latest, updatedTime, this.logger);
        downloaded.push(appLabel(entry, latest));
      } else {
        skipped.push(appLabel(entry, latest));
      }
    }

    return { downloaded, skipped };
  }
}
