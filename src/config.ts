// Runtime configuration from the environment (.env via dotenv)
import 'dotenv/config';
import { SMARTLEAD_BASE_URL } from './channels/smartlead-adapter';

export interface SyncConfig {
  apiKey: string;
  baseUrl: string;
  batchSize: number;
  pageSize: number;
  requestTimeoutMs: number;
  maxRetries: number;
  batchPauseMs: number;
  supabaseUrl: string;
  supabaseKey: string;
  port: number;
}

export const DEFAULTS = {
  batchSize: 50,
  pageSize: 100,
  requestTimeoutSeconds: 30,
  maxRetries: 3,
  batchPauseMs: 500,
  port: 8080,
};

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number = 1): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < min) {
    console.warn(`[Config] Invalid ${name}=${raw}, using default ${fallback}`);
    return fallback;
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SyncConfig {
  return {
    apiKey: (env.SMARTLEAD_API_KEY || '').trim(),
    baseUrl: env.SMARTLEAD_BASE_URL || SMARTLEAD_BASE_URL,
    batchSize: readInt(env, 'BATCH_SIZE', DEFAULTS.batchSize),
    pageSize: readInt(env, 'PAGE_SIZE', DEFAULTS.pageSize),
    requestTimeoutMs: readInt(env, 'REQUEST_TIMEOUT', DEFAULTS.requestTimeoutSeconds) * 1000,
    maxRetries: readInt(env, 'MAX_RETRIES', DEFAULTS.maxRetries),
    batchPauseMs: readInt(env, 'BATCH_PAUSE_MS', DEFAULTS.batchPauseMs, 0),
    supabaseUrl: env.SUPABASE_URL || '',
    supabaseKey: env.SUPABASE_SERVICE_ROLE_KEY || '',
    port: readInt(env, 'PORT', DEFAULTS.port),
  };
}
