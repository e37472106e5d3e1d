// Run State Stores
// Where batch progress lives between steps

import { SupabaseClient } from '@supabase/supabase-js';
import { BatchRunState, parseRunState } from './run-state';

export interface RunStateStore {
  load(runId: string): Promise<BatchRunState | null>;
  save(state: BatchRunState): Promise<void>;
  remove(runId: string): Promise<void>;
}

export class MemoryRunStore implements RunStateStore {
  private runs: Map<string, string> = new Map();

  async load(runId: string): Promise<BatchRunState | null> {
    const raw = this.runs.get(runId);
    return raw ? parseRunState(JSON.parse(raw)) : null;
  }

  async save(state: BatchRunState): Promise<void> {
    // Stored as JSON so callers never share a live object with the store
    this.runs.set(state.runId, JSON.stringify(state));
  }

  async remove(runId: string): Promise<void> {
    this.runs.delete(runId);
  }
}

/**
 * Persists run state in the `sync_runs` table (see src/scripts/setup-schema.ts).
 */
export class SupabaseRunStore implements RunStateStore {
  constructor(private supabase: SupabaseClient, private table: string = 'sync_runs') {}

  async load(runId: string): Promise<BatchRunState | null> {
    const { data, error } = await this.supabase
      .from(this.table)
      .select('state')
      .eq('run_id', runId)
      .maybeSingle();

    if (error) {
      throw new Error(`Failed to load run ${runId}: ${error.message}`);
    }
    if (!data) return null;

    const state = parseRunState(data.state);
    if (!state) {
      console.warn(`[RunStore] Stored state for run ${runId} is malformed`);
    }
    return state;
  }

  async save(state: BatchRunState): Promise<void> {
    const { error } = await this.supabase
      .from(this.table)
      .upsert({
        run_id: state.runId,
        campaign_id: state.campaignId,
        status: state.status,
        state,
        updated_at: state.updatedAt,
      }, { onConflict: 'run_id' });

    if (error) {
      throw new Error(`Failed to save run ${state.runId}: ${error.message}`);
    }
  }

  async remove(runId: string): Promise<void> {
    const { error } = await this.supabase
      .from(this.table)
      .delete()
      .eq('run_id', runId);

    if (error) {
      throw new Error(`Failed to remove run ${runId}: ${error.message}`);
    }
  }
}
