#!/usr/bin/env ts-node
// List the campaigns visible to SMARTLEAD_API_KEY
// Usage:
//   npx ts-node src/scripts/list-campaigns.ts [--client-id <id>]

import { loadConfig } from '../config';
import { CAMPAIGN_STATUS_LABELS } from '../channels/smartlead-types';
import { createSyncService } from '../engine/sync-service';
import { describeError, getArg, parsePositiveInt } from './cli-args';

async function main() {
  const args = process.argv.slice(2);
  const clientId = parsePositiveInt(getArg(args, '--client-id'), '--client-id');

  const config = loadConfig();
  const service = createSyncService(config.apiKey, config);
  const campaigns = await service.listCampaigns({ clientId, includeTags: true });

  if (campaigns.length === 0) {
    console.log('No campaigns found.');
    return;
  }

  console.log(`\n${campaigns.length} campaigns:\n`);
  for (const campaign of campaigns) {
    const status = CAMPAIGN_STATUS_LABELS[campaign.status] ?? campaign.status;
    console.log(`  ${String(campaign.id).padEnd(10)} ${status.padEnd(10)} ${campaign.name}`);
  }
}

main().catch(err => {
  console.error(`Fatal error: ${describeError(err)}`);
  process.exit(1);
});
