/**
 * Shared utility functions
 */
import { randomBytes } from 'crypto';

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Generate a unique scan run ID
 */
export function generateRunId(prefix = 'SCAN'): string {
  const timestamp = Date.now();
  const random = randomBytes(4).toString('hex').toUpperCase();
  return `${prefix}-${timestamp}-${random}`;
}

/**
 * Format timestamp to ISO string
 */
export function formatTimestamp(date: Date = new Date()): string {
  return date.toISOString();
}

/**
 * Parse ISO timestamp
 */
export function parseTimestamp(timestamp: string): Date {
  return new Date(timestamp);
}

/**
 * Whole days elapsed between creation and now, truncated. Creation instants
 * after `now` count as zero days.
 */
export function calculateAgeDays(createdAt: Date, now: Date): number {
  const elapsed = now.getTime() - createdAt.getTime();
  return Math.max(0, Math.floor(elapsed / MS_PER_DAY));
}

/**
 * Monthly storage cost for a snapshot, unrounded
 */
export function estimateMonthlyCost(sizeGiB: number, costPerGbMonth: number): number {
  return sizeGiB * costPerGbMonth;
}

/**
 * Round a dollar amount to cents
 */
export function roundCurrency(amount: number): number {
  return Math.round((amount + Number.EPSILON) * 100) / 100;
}

/**
 * Sum dollar amounts in whole cents so the total does not depend on order
 */
export function sumCurrency(amounts: Iterable<number>): number {
  let cents = 0;
  for (const amount of amounts) {
    cents += Math.round(amount * 100);
  }
  return cents / 100;
}

/**
 * Epoch seconds `days` after the given instant, for DynamoDB TTL attributes
 */
export function ttlAfterDays(days: number, from: Date = new Date()): number {
  return Math.floor((from.getTime() + days * MS_PER_DAY) / 1000);
}

/**
 * Message of an unknown thrown value
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
