import { describe, it, expect } from '@jest/globals';
import { renderReport } from '../src/validation/report';
import type { ValidationResult } from '../src/validation/types';

const RULE = '='.repeat(50);

describe('renderReport', () => {
  it('renders a bare passing result', () => {
    const result: ValidationResult = {
      is_valid: true,
      errors: [],
      warnings: [],
      details: {},
      cluster_metrics: [],
    };

    expect(renderReport(result).split('\n')).toEqual([
      RULE,
      'Satellite Cluster Validation Report',
      RULE,
      'Status: ✅ PASSED',
      '',
      RULE,
    ]);
  });

  it('lists errors, warnings and detail metrics in section order', () => {
    const result: ValidationResult = {
      is_valid: false,
      errors: ['missing targets: [3]'],
      warnings: ['unused satellites: [104]'],
      details: {
        link_quality: { overall_avg_strength: null, cluster_count: 0 },
        target_coverage: { input_targets: 3, output_targets: 2, coverage_rate: 2 / 3 },
      },
      cluster_metrics: [],
    };

    expect(renderReport(result).split('\n')).toEqual([
      RULE,
      'Satellite Cluster Validation Report',
      RULE,
      'Status: ❌ FAILED',
      '',
      '❌ Errors:',
      '  - missing targets: [3]',
      '',
      '⚠️ Warnings:',
      '  - unused satellites: [104]',
      '',
      '📊 Details:',
      '  target_coverage:',
      '    input_targets: 3',
      '    output_targets: 2',
      '    coverage_rate: 0.667',
      '  link_quality:',
      '    overall_avg_strength: n/a',
      '    cluster_count: 0',
      '',
      RULE,
    ]);
  });
});
