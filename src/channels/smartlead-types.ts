// Smartlead Types
// Shapes of the Smartlead API responses this project reads

export interface SmartleadCampaign {
  id: number;
  name: string;
  status: string;        // DRAFTED | ACTIVE | PAUSED | STOPPED | COMPLETED
  [key: string]: unknown;
}

export interface SmartleadEmailAccount {
  id: number;
  username?: string;
  from_email?: string;
  email?: string;
  [key: string]: unknown;
}

export interface AddAccountsResult {
  success: boolean;
  processedCount: number;
  message?: string;
}

export interface CampaignFilter {
  clientId?: number;
  includeTags?: boolean;
}

/**
 * List endpoints answer either with a bare array or with `{ data: [...] }`.
 * Decoded once at the client boundary.
 */
export type ListPayload =
  | { kind: 'list'; items: unknown[] }
  | { kind: 'envelope'; data: unknown }
  | { kind: 'scalar'; value: unknown };

export const CAMPAIGN_STATUS_LABELS: Record<string, string> = {
  ACTIVE: 'Active',
  PAUSED: 'Paused',
  DRAFTED: 'Draft',
  STOPPED: 'Stopped',
  COMPLETED: 'Completed',
};
