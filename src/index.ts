#!/usr/bin/env node
import 'dotenv/config';
import * as fs from 'fs';
import { parseDatasetText, datasetFormatFromPath } from './dataset/parseDataset';
import { renderCoverageSummary, summarizeCoverage } from './dataset/coverageSummary';
import { validateDataset } from './dataset/validateDataset';
import { ClusterValidator } from './validation/engine';
import { renderReport } from './validation/report';
import { candidateOutputJsonSchema, parseScenarioText } from './validation/schemas';
import { defaultLogger, withoutInfo } from './utils/logger';

const USAGE = [
  'Usage:',
  '  cluster-validate validate <scenario.json> <output.json>',
  '  cluster-validate dataset <records.json|records.jsonl>',
  '  cluster-validate schema',
];

function readJsonFile(filePath: string): unknown {
  return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
}

async function main(): Promise<void> {
  const [command, ...args] = process.argv.slice(2);

  switch (command) {
    case 'validate': {
      const [scenarioPath, outputPath] = args;
      if (!scenarioPath || !outputPath) {
        console.error(USAGE.join('\n'));
        process.exit(1);
      }
      const scenario = parseScenarioText(fs.readFileSync(scenarioPath, 'utf-8'));
      const result = new ClusterValidator().validate(readJsonFile(outputPath), scenario);
      console.log(renderReport(result));
      process.exit(result.is_valid ? 0 : 1);
      break;
    }
    case 'dataset': {
      const [datasetPath] = args;
      if (!datasetPath) {
        console.error(USAGE.join('\n'));
        process.exit(1);
      }
      const t0 = Date.now();
      const records = parseDatasetText(
        fs.readFileSync(datasetPath, 'utf-8'),
        datasetFormatFromPath(datasetPath)
      );
      // Invalid records are printed below.
      const entries = validateDataset(records, { logger: withoutInfo(defaultLogger) });
      for (const entry of entries.filter((e) => !e.result.is_valid)) {
        console.log(`[${entry.id}] ${entry.result.errors.join('; ')}`);
      }
      console.log(renderCoverageSummary(summarizeCoverage(entries)));
      console.log(`Validated ${entries.length} records in ${Date.now() - t0}ms`);
      break;
    }
    case 'schema':
      console.log(JSON.stringify(candidateOutputJsonSchema(), null, 2));
      break;
    default:
      console.error(USAGE.join('\n'));
      process.exit(1);
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error('Fatal error:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
}

export { ClusterValidator, validateClustering } from './validation/engine';
export type { ValidatorOptions } from './validation/engine';
export { renderReport } from './validation/report';
export { parseCandidateText } from './validation/candidateParser';
export { QUALITY_THRESHOLDS, STRATEGY_POLICIES } from './validation/config';
export * from './validation/schemas';
export * from './validation/types';
export * from './validation/errors';
export * from './dataset/parseDataset';
export * from './dataset/validateDataset';
export * from './dataset/coverageSummary';
export type { Logger } from './utils/logger';
export { defaultLogger, silentLogger, withoutInfo } from './utils/logger';
