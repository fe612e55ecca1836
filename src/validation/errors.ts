import type { z } from 'zod';

export function formatIssues(issues: readonly z.ZodIssue[]): string {
  return issues
    .map((issue) => `- ${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('\n');
}

export class ScenarioParseError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly z.ZodIssue[] = []
  ) {
    super(issues.length > 0 ? `${message}\n${formatIssues(issues)}` : message);
    this.name = 'ScenarioParseError';
  }
}

export class CandidateParseError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'CandidateParseError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class DatasetFormatError extends Error {
  constructor(
    message: string,
    public readonly line: number | null = null
  ) {
    super(line === null ? message : `line ${line}: ${message}`);
    this.name = 'DatasetFormatError';
  }
}
