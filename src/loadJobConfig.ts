import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { parse as parseYaml } from 'yaml';

import { parseJobConfig, type JobConfig } from './core/configSchema.js';

export async function loadJobConfig(configPath: string): Promise<JobConfig> {
  const raw = await readFile(configPath, 'utf8');
  const extension = path.extname(configPath).toLowerCase();
  const document: unknown =
    extension === '.yaml' || extension === '.yml' ? parseYaml(raw) : JSON.parse(raw);
  return parseJobConfig(document);
}
