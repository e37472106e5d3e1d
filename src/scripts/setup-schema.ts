// Schema setup script - creates the run-state table in Supabase
import 'dotenv/config';
import { createClient } from '@supabase/supabase-js';

const SQL = `
-- Apply runs (one row per run, full state as jsonb)
CREATE TABLE IF NOT EXISTS sync_runs (
  run_id text PRIMARY KEY,
  campaign_id bigint NOT NULL,
  status text NOT NULL DEFAULT 'not_started',
  state jsonb NOT NULL,
  created_at timestamptz DEFAULT now(),
  updated_at timestamptz DEFAULT now()
);

CREATE INDEX IF NOT EXISTS sync_runs_campaign_status ON sync_runs(campaign_id, status);
`;

async function main() {
  const supabaseUrl = process.env.SUPABASE_URL || '';
  const supabaseKey = process.env.SUPABASE_SERVICE_ROLE_KEY || '';
  if (!supabaseUrl || !supabaseKey) {
    console.error('Error: SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY required');
    process.exit(1);
  }

  const supabase = createClient(supabaseUrl, supabaseKey, {
    db: { schema: 'public' },
  });

  // Statements go through an `exec_sql` RPC defined on the project
  const statements = SQL.split(';').map(s => s.trim()).filter(s => s.length > 0);

  let failed = 0;
  for (const stmt of statements) {
    console.log(`Executing: ${stmt.substring(0, 60)}...`);
    const { error } = await supabase.rpc('exec_sql', { sql_text: stmt + ';' });
    if (error) {
      failed++;
      console.error(`  Error: ${error.message}`);
    } else {
      console.log('  ✓ Done');
    }
  }

  if (failed > 0) {
    process.exitCode = 1;
  }
}

main().catch(err => {
  console.error('Fatal error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
