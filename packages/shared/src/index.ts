/**
 * Shared formatting utilities for channel reconciliation
 */

import { format, parseISO } from 'date-fns';

/**
 * Format currency value (report revenue is in USD)
 */
export function formatCurrency(amount: number, currency: string = 'USD'): string {
  return new Intl.NumberFormat('en-US', {
    style: 'currency',
    currency,
  }).format(amount);
}

/**
 * Format an ISO date (yyyy-MM-dd) for console summaries, e.g. "Jan 31, 2025"
 */
export function formatDate(isoDate: string): string {
  return format(parseISO(isoDate), 'MMM d, yyyy');
}

/**
 * Format a whole-number count with thousands separators
 */
export function formatCount(value: number): string {
  return new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 }).format(value);
}

/**
 * Human-readable duration for elapsed run times
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  return `${(ms / 1000).toFixed(2)}s`;
}
