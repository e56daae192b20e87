import { writeFile } from 'node:fs/promises';

import type { JobConfig } from './core/configSchema.js';
import { renderSubmissionScript } from './core/renderScript.js';

export interface GenerateSubmissionScriptOptions {
  /** Written with overwrite semantics when set. */
  scriptPath?: string;
}

export interface GenerationResult {
  script: string;
  scriptPath?: string;
}

export async function generateSubmissionScript(
  config: JobConfig,
  options: GenerateSubmissionScriptOptions = {}
): Promise<GenerationResult> {
  const { scriptPath } = options;
  const script = renderSubmissionScript(
    config.header,
    config.python,
    config.srun,
    config.singularity
  );

  if (scriptPath) {
    await writeFile(scriptPath, script, 'utf8');
  }

  return {
    script,
    scriptPath
  };
}
