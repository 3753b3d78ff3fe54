/**
 * In-memory state for rate-limit and spending windows.
 *
 * Every method is synchronous, so a prune-then-compare or reset-then-add
 * sequence on a key always completes before another request's code runs.
 */

import { InternalError } from './errors.js';
import { SUBJECT_FIELDS } from './types.js';
import type { EvaluationRequest } from './types.js';

/** Amounts are accumulated in micro-units */
export const AMOUNT_SCALE = 1_000_000;

export function toUnits(amount: number): number {
  return Math.round(amount * AMOUNT_SCALE);
}

export function fromUnits(units: number): number {
  return units / AMOUNT_SCALE;
}

/**
 * Subject of a request: its first present attribute, or `anonymous`
 */
export function subjectKey(request: Pick<EvaluationRequest, 'agent_id' | 'wallet_address' | 'ip_address'>): string {
  for (const field of SUBJECT_FIELDS) {
    const value = request[field];
    if (value !== undefined) {
      return `${field}=${value}`;
    }
  }
  return 'anonymous';
}

export function stateKey(ruleId: string, subject: string): string {
  return `${ruleId}|${subject}`;
}

export interface RateWindowState {
  kind: 'rate';
  /** Commit instants in epoch milliseconds, oldest first */
  timestamps: number[];
}

export interface SpendingWindowState {
  kind: 'spending';
  accumulatedUnits: number;
  windowStart: number;
}

export type WindowState = RateWindowState | SpendingWindowState;

export interface RateWindowView {
  /** Commits still inside the window */
  count: number;
  /** Oldest commit still inside the window */
  oldest?: number;
}

export class StateStore {
  private readonly entries = new Map<string, WindowState>();

  get size(): number {
    return this.entries.size;
  }

  private rateEntry(key: string): RateWindowState | undefined {
    const entry = this.entries.get(key);
    if (entry === undefined || entry.kind === 'rate') {
      return entry;
    }
    throw new InternalError('STATE_CORRUPTED', `State for ${key} holds a ${entry.kind} window, expected rate`);
  }

  private spendingEntry(key: string): SpendingWindowState | undefined {
    const entry = this.entries.get(key);
    if (entry === undefined || entry.kind === 'spending') {
      return entry;
    }
    throw new InternalError('STATE_CORRUPTED', `State for ${key} holds a ${entry.kind} window, expected spending`);
  }

  /**
   * Count commits inside `(now - windowMs, ...]`. Read-only.
   */
  peekRate(key: string, windowMs: number, now: number): RateWindowView {
    const entry = this.rateEntry(key);
    if (!entry) {
      return { count: 0 };
    }
    const cutoff = now - windowMs;
    const inside = entry.timestamps.filter((timestamp) => timestamp > cutoff);
    return { count: inside.length, oldest: inside.length > 0 ? Math.min(...inside) : undefined };
  }

  /**
   * Prune commits at or before `now - windowMs`, then record `now`
   */
  recordRequest(key: string, windowMs: number, now: number): void {
    const entry = this.rateEntry(key);
    if (!entry) {
      this.entries.set(key, { kind: 'rate', timestamps: [now] });
      return;
    }
    const cutoff = now - windowMs;
    entry.timestamps = entry.timestamps.filter((timestamp) => timestamp > cutoff);
    entry.timestamps.push(now);
  }

  /**
   * Amount spent in the current window, in micro-units. An expired window
   * counts as 0 but is left in place until the next commit.
   */
  peekSpending(key: string, windowMs: number, now: number): number {
    const entry = this.spendingEntry(key);
    if (!entry || now - entry.windowStart > windowMs) {
      return 0;
    }
    return entry.accumulatedUnits;
  }

  /**
   * Reset an expired window to start at `now`, then add `units`
   */
  recordSpending(key: string, units: number, windowMs: number, now: number): void {
    const entry = this.spendingEntry(key);
    if (!entry) {
      this.entries.set(key, { kind: 'spending', accumulatedUnits: units, windowStart: now });
      return;
    }
    if (now - entry.windowStart > windowMs) {
      entry.accumulatedUnits = 0;
      entry.windowStart = now;
    }
    entry.accumulatedUnits += units;
  }

  /**
   * Deep copy of every entry, for diagnostics and tests
   */
  snapshot(): Map<string, WindowState> {
    return new Map([...this.entries].map(([key, entry]): [string, WindowState] => [key, structuredClone(entry)]));
  }
}
