/**
 * Types for the apps ledger and reconciliation results
 */

export interface LedgerEntry {
  name: string;
  uid: string;
  version: string;
  updated_time?: string;
}

export interface ReconcileResult {
  downloaded: string[];
  skipped: string[];
}
