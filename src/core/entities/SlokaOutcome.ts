import { ParsedResult } from './DictionaryEntry';

export type FailureReason = 'generation-error' | 'invalid-json' | 'schema-mismatch';

export type SlokaOutcome =
  | { status: 'parsed'; sloka: string; result: ParsedResult }
  | { status: 'empty'; sloka: string; result: ParsedResult }
  | { status: 'failed'; sloka: string; result: ParsedResult; reason: FailureReason; detail: string };

export interface EnrichmentReport {
  total: number;
  parsed: number;
  empty: number;
  failed: number;
  entries: number;
  failures: Array<{ sloka: string; reason: FailureReason; detail: string }>;
}

export function summarize(outcomes: SlokaOutcome[]): EnrichmentReport {
  const report: EnrichmentReport = {
    total: outcomes.length,
    parsed: 0,
    empty: 0,
    failed: 0,
    entries: 0,
    failures: [],
  };
  for (const outcome of outcomes) {
    report.entries += outcome.result.entries.length;
    if (outcome.status === 'failed') {
      report.failed++;
      report.failures.push({ sloka: outcome.sloka, reason: outcome.reason, detail: outcome.detail });
    } else if (outcome.status === 'empty') {
      report.empty++;
    } else {
      report.parsed++;
    }
  }
  return report;
}
