import type { ZodError } from 'zod';

export class ConfigValidationError extends Error {
  readonly issues: string[];

  constructor(label: string, error: ZodError) {
    const issues = error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    });
    super(`Config validation failed for ${label}:\n${issues.map((line) => `- ${line}`).join('\n')}`);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

/** Raised when only part of the l3cores/l3size/nodesize triple is set. */
export class CpuMapConfigError extends Error {
  constructor() {
    super('Must set all of l3cores, l3size, nodesize to generate an srun CPU affinity map');
    this.name = 'CpuMapConfigError';
  }
}
