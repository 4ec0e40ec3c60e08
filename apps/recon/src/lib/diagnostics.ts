/**
 * Per-run diagnostics
 *
 * Every recoverable problem (skipped row, dropped record) becomes one
 * Diagnostic. The run returns a summary alongside its report.
 */

import type { Channel } from '@channel-recon/catalog';

export const DIAGNOSTIC_KINDS = [
  'missing_identifier',
  'malformed_row',
  'excluded_row',
  'unmapped_identifier',
  'invalid_quantity',
  'untracked_metric',
  'unreadable_file',
] as const;
export type DiagnosticKind = (typeof DIAGNOSTIC_KINDS)[number];

export interface Diagnostic {
  kind: DiagnosticKind;
  channel: Channel;
  file: string;
  /** 1-based line in the source file, 0 for the file as a whole */
  line: number;
  message: string;
  identifier?: string;
}

export interface DiagnosticsSummary {
  total: number;
  byKind: Record<DiagnosticKind, number>;
  byChannel: Partial<Record<Channel, Partial<Record<DiagnosticKind, number>>>>;
  /** First few diagnostics of each kind, in the order they were reported */
  samples: Diagnostic[];
}

const DEFAULT_SAMPLES_PER_KIND = 5;

export function emptyKindCounts(): Record<DiagnosticKind, number> {
  return {
    missing_identifier: 0,
    malformed_row: 0,
    excluded_row: 0,
    unmapped_identifier: 0,
    invalid_quantity: 0,
    untracked_metric: 0,
    unreadable_file: 0,
  };
}

/**
 * Summarize diagnostics by kind and by channel
 */
export function summarizeDiagnostics(
  diagnostics: readonly Diagnostic[],
  samplesPerKind: number = DEFAULT_SAMPLES_PER_KIND
): DiagnosticsSummary {
  const byKind = emptyKindCounts();
  const byChannel: DiagnosticsSummary['byChannel'] = {};
  const samples: Diagnostic[] = [];

  for (const diagnostic of diagnostics) {
    byKind[diagnostic.kind]++;

    const channelCounts = byChannel[diagnostic.channel] ?? {};
    channelCounts[diagnostic.kind] = (channelCounts[diagnostic.kind] ?? 0) + 1;
    byChannel[diagnostic.channel] = channelCounts;

    if (byKind[diagnostic.kind] <= samplesPerKind) {
      samples.push(diagnostic);
    }
  }

  return { total: diagnostics.length, byKind, byChannel, samples };
}
