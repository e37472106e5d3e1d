// API Adapter Base
// Shared plumbing for remote platform adapters

import { Sleep, sleep as realSleep } from '../core/retry-policy';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export abstract class BaseApiAdapter {
  abstract readonly name: string;
  protected readonly sleep: Sleep;

  constructor(sleep: Sleep = realSleep) {
    this.sleep = sleep;
  }

  // Self-imposed pause between calls
  protected async delay(ms: number): Promise<void> {
    if (ms <= 0) return;
    await this.sleep(ms);
  }

  protected log(message: string): void {
    console.log(`[${this.name}] ${message}`);
  }

  protected warn(message: string): void {
    console.warn(`[${this.name}] ${message}`);
  }

  protected debug(message: string): void {
    console.debug(`[${this.name}] ${message}`);
  }
}
