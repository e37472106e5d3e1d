// Main entry point
export { normalizeEmail, extractUniqueEmails, isValidEmail } from './core/email-normalizer';
export { extractEmailsFromCsv, findEmailColumn, emailColumnCandidates } from './core/csv-reader';
export type { CsvEmailExtraction } from './core/csv-reader';
export * from './core/errors';
export * from './core/reconciliation';
export * from './core/retry-policy';
export * from './core/inventory-cache';
export { SmartleadAdapter, SMARTLEAD_BASE_URL, decodeListPayload, payloadToList } from './channels/smartlead-adapter';
export type { SmartleadAdapterOptions } from './channels/smartlead-adapter';
export * from './channels/smartlead-types';
export { BatchApplier } from './engine/batch-applier';
export type { CampaignAccountWriter, BatchApplierOptions, RunOptions } from './engine/batch-applier';
export * from './engine/run-state';
export * from './engine/run-store';
export { SyncService, createSyncService } from './engine/sync-service';
export type { SyncPreview, SyncServiceOptions } from './engine/sync-service';
export { loadConfig, DEFAULTS } from './config';
export type { SyncConfig } from './config';
