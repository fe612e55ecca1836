import { formatScore } from '../utils/format';
import type { ValidationDetails, ValidationResult } from './types';

const RULE = '='.repeat(50);

const DETAIL_SECTIONS: ReadonlyArray<keyof ValidationDetails> = [
  'target_coverage',
  'satellite_assignment',
  'link_quality',
  'observation_quality',
  'health',
  'cluster_merge',
];

function metricEntries(
  section: Readonly<Record<string, number | null>>
): Array<[string, number | null]> {
  return Object.entries(section);
}

function formatMetric(value: number | null): string {
  return value === null ? 'n/a' : formatScore(value);
}

export function renderReport(result: ValidationResult): string {
  const lines = [
    RULE,
    'Satellite Cluster Validation Report',
    RULE,
    `Status: ${result.is_valid ? '✅ PASSED' : '❌ FAILED'}`,
    '',
  ];

  if (result.errors.length > 0) {
    lines.push('❌ Errors:', ...result.errors.map((error) => `  - ${error}`), '');
  }

  if (result.warnings.length > 0) {
    lines.push('⚠️ Warnings:', ...result.warnings.map((warning) => `  - ${warning}`), '');
  }

  const sections = DETAIL_SECTIONS.flatMap((key) => {
    const section = result.details[key];
    return section ? [{ key, section }] : [];
  });
  if (sections.length > 0) {
    lines.push('📊 Details:');
    for (const { key, section } of sections) {
      lines.push(`  ${key}:`);
      for (const [metric, value] of metricEntries(section)) {
        lines.push(`    ${metric}: ${formatMetric(value)}`);
      }
    }
    lines.push('');
  }

  lines.push(RULE);
  return lines.join('\n');
}
