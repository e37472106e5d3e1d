#!/usr/bin/env ts-node
// Attach the sender accounts listed in a CSV to a Smartlead campaign
// Usage:
//   npx ts-node src/scripts/sync-accounts.ts --file senders.csv --campaign-id 1234 [--dry-run]
//   npx ts-node src/scripts/sync-accounts.ts --file senders.csv --campaign-id 1234 --email-column "Sender Email"
//   npx ts-node src/scripts/sync-accounts.ts --resume <run-id>

import * as fs from 'fs';
import * as path from 'path';
import { createClient } from '@supabase/supabase-js';
import { loadConfig } from '../config';
import { InventoryCacheStore } from '../core/inventory-cache';
import { createSyncService, SyncPreview } from '../engine/sync-service';
import { BatchRunState, progressFraction } from '../engine/run-state';
import { MemoryRunStore, RunStateStore, SupabaseRunStore } from '../engine/run-store';
import { describeError, getArg, hasFlag, parsePositiveInt } from './cli-args';

const SAMPLE_SIZE = 10;

function printPreview(preview: SyncPreview): void {
  const { extraction, reconciliation } = preview;

  console.log('\n=== Preview ===');
  console.log(`  CSV rows:               ${extraction.totalRows} (column "${extraction.column}")`);
  console.log(`  Unique valid emails:    ${extraction.emails.length}`);
  console.log(`  Invalid values:         ${extraction.invalidValues.length}`);
  console.log(`  Inventory accounts:     ${preview.inventorySize}`);
  console.log(`  Already in campaign:    ${preview.campaignAccountCount}`);
  console.log(`  Matched:                ${reconciliation.totalRequested}`);
  console.log(`  To add:                 ${reconciliation.totalToAdd}`);
  console.log(`  Already attached:       ${reconciliation.totalAlreadyExists}`);
  console.log(`  Not found in inventory: ${reconciliation.notFound.length}`);

  if (reconciliation.notFound.length > 0) {
    console.log(`\n  Not found (first ${Math.min(SAMPLE_SIZE, reconciliation.notFound.length)}):`);
    for (const email of reconciliation.notFound.slice(0, SAMPLE_SIZE)) {
      console.log(`    - ${email}`);
    }
  }

  if (reconciliation.conflicts.length > 0) {
    console.log('\n  ⚠️  Emails shared by several accounts (the last account listed is used):');
    for (const conflict of reconciliation.conflicts.slice(0, SAMPLE_SIZE)) {
      console.log(`    - ${conflict.email}: ${conflict.accountIds.join(', ')}`);
    }
  }
}

function printProgress(state: BatchRunState): void {
  const pct = Math.round(progressFraction(state) * 100);
  console.log(
    `[Sync] ${state.completedBatches}/${state.totalBatches} batches (${pct}%), ` +
    `${state.accountsAdded} added, ${state.errors.length} errors`
  );
}

function createStore(supabaseUrl: string, supabaseKey: string): RunStateStore {
  if (supabaseUrl && supabaseKey) {
    return new SupabaseRunStore(createClient(supabaseUrl, supabaseKey));
  }
  console.warn('[Sync] SUPABASE_URL / SUPABASE_SERVICE_ROLE_KEY not set: run state is kept in memory only');
  return new MemoryRunStore();
}

async function main() {
  const args = process.argv.slice(2);
  const filePath = getArg(args, '--file', '-f');
  const campaignId = parsePositiveInt(getArg(args, '--campaign-id', '-c'), '--campaign-id');
  const emailColumn = getArg(args, '--email-column');
  const resumeRunId = getArg(args, '--resume');
  const isDryRun = hasFlag(args, '--dry-run');

  const config = loadConfig();
  const batchSize = parsePositiveInt(getArg(args, '--batch-size'), '--batch-size') ?? config.batchSize;

  if (!resumeRunId && (!filePath || !campaignId)) {
    console.error('Usage: sync-accounts --file <csv-path> --campaign-id <id> [--email-column <name>] [--batch-size <n>] [--dry-run]');
    console.error('       sync-accounts --resume <run-id>');
    process.exit(1);
  }

  console.log('========================================');
  console.log('Campaign Sender Sync');
  console.log('========================================');
  console.log(`Mode: ${isDryRun ? 'DRY RUN (no writes)' : 'LIVE'}`);

  const store = createStore(config.supabaseUrl, config.supabaseKey);
  const service = createSyncService(config.apiKey, config, { cache: new InventoryCacheStore(), store });

  let state: BatchRunState | null;

  if (resumeRunId) {
    state = await store.load(resumeRunId);
    if (!state) {
      console.error(`Run ${resumeRunId} not found`);
      process.exit(1);
    }
    console.log(`Resuming run ${state.runId} at batch ${state.completedBatches + 1}/${state.totalBatches}`);
  } else if (filePath && campaignId) {
    const resolved = path.resolve(filePath);
    if (!fs.existsSync(resolved)) {
      console.error(`File not found: ${resolved}`);
      process.exit(1);
    }

    const content = fs.readFileSync(resolved, 'utf-8');
    const preview = await service.preview(campaignId, content, emailColumn);
    printPreview(preview);

    if (isDryRun) {
      console.log('\nDry run complete. No changes made.');
      return;
    }

    state = service.startRun(campaignId, preview.reconciliation, batchSize);
    await store.save(state);
  } else {
    return;
  }

  let stopping = false;
  process.once('SIGINT', () => {
    stopping = true;
    console.log('\n[Sync] Stopping after the current batch...');
  });

  const final = await service.applyAll(state, {
    onProgress: printProgress,
    shouldStop: () => stopping,
  });

  console.log('\n=== Results ===');
  console.log(`  Run ID:          ${final.runId}`);
  console.log(`  Status:          ${final.status}`);
  console.log(`  Batches:         ${final.completedBatches}/${final.totalBatches}`);
  console.log(`  Accounts added:  ${final.accountsAdded}`);
  console.log(`  Errors:          ${final.errors.length}`);
  for (const error of final.errors) {
    console.log(`    - ${error}`);
  }

  if (final.status !== 'complete') {
    console.log(`\nResume with: sync-accounts --resume ${final.runId}`);
  }

  if (final.errors.length > 0) {
    process.exitCode = 1;
  }
}

main().catch(err => {
  console.error(`Fatal error: ${describeError(err)}`);
  process.exit(1);
});
