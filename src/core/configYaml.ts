import { stringify } from 'yaml';

import type { JobConfig } from './configSchema.js';
import { renderTemplate } from './environment.js';
import { defaultTemplates } from './templates.js';

export function renderConfigYaml(config: JobConfig): string {
  return renderTemplate(defaultTemplates.config, {
    config_yaml: stringify(config)
  });
}
