import { formatPercent } from '../utils/format';
import type { DatasetValidationEntry } from './validateDataset';

export type CoverageBucket = 'full' | 'high' | 'medium' | 'low';

export interface CoverageSummary {
  total: number;
  valid: number;
  invalid: number;
  /** Records that reached the coverage stage. */
  measured: number;
  buckets: Record<CoverageBucket, { count: number; fraction: number }>;
}

const BUCKET_LABELS: Record<CoverageBucket, string> = {
  full: '100%',
  high: '90-100%',
  medium: '80-90%',
  low: '<80%',
};

function bucketFor(rate: number): CoverageBucket {
  if (rate >= 1) return 'full';
  if (rate >= 0.9) return 'high';
  if (rate >= 0.8) return 'medium';
  return 'low';
}

export function summarizeCoverage(entries: readonly DatasetValidationEntry[]): CoverageSummary {
  const counts: Record<CoverageBucket, number> = { full: 0, high: 0, medium: 0, low: 0 };
  let measured = 0;
  let valid = 0;

  for (const { result } of entries) {
    if (result.is_valid) {
      valid++;
    }
    const coverage = result.details.target_coverage;
    if (coverage) {
      measured++;
      counts[bucketFor(coverage.coverage_rate)]++;
    }
  }

  const bucket = (key: CoverageBucket) => ({
    count: counts[key],
    fraction: measured === 0 ? 0 : counts[key] / measured,
  });

  return {
    total: entries.length,
    valid,
    invalid: entries.length - valid,
    measured,
    buckets: {
      full: bucket('full'),
      high: bucket('high'),
      medium: bucket('medium'),
      low: bucket('low'),
    },
  };
}

export function renderCoverageSummary(summary: CoverageSummary): string {
  const lines = [
    `Records: ${summary.total} (valid ${summary.valid}, invalid ${summary.invalid})`,
    `Coverage (${summary.measured} measured):`,
  ];
  const keys: CoverageBucket[] = ['full', 'high', 'medium', 'low'];
  for (const key of keys) {
    const { count, fraction } = summary.buckets[key];
    lines.push(`  ${BUCKET_LABELS[key]}: ${count} (${formatPercent(fraction)})`);
  }
  return lines.join('\n');
}
