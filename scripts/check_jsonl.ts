import * as fs from 'fs';
import { checkJsonLines } from '../src/dataset/parseDataset';

const logger = {
  error: (msg: string, ctx?: Record<string, unknown>) => console.error(`[CheckJsonl] ${msg}`, ctx || ''),
  info: (msg: string, ctx?: Record<string, unknown>) => console.info(`[CheckJsonl] ${msg}`, ctx || ''),
};

function main() {
  const filePath = process.argv[2];
  if (!filePath) {
    logger.error('Usage: npm run check:jsonl <file.jsonl>');
    process.exit(1);
  }
  if (!fs.existsSync(filePath)) {
    logger.error(`File not found: ${filePath}`);
    process.exit(1);
  }

  logger.info(`Checking ${filePath}...`);
  const { valid, errorLines } = checkJsonLines(fs.readFileSync(filePath, 'utf-8'));

  if (valid) {
    logger.info('✓ PASSED: every line is valid JSON');
    return;
  }
  logger.error(`❌ FAILED: ${errorLines.length} malformed line(s)`, { lines: errorLines });
  process.exit(1);
}

main();
