import {
  OPTIONAL_DIRECTIVE_DEFAULTS,
  flagDirectives,
  optionalDirectives,
  type SlurmHeader
} from './configSchema.js';
import { renderTemplate } from './environment.js';
import { defaultTemplates } from './templates.js';

export function directiveName(field: string): string {
  return field.replace(/_/g, '-');
}

export function formatWallTime(time: readonly [number, number, number]): string {
  return time.map((part) => String(part).padStart(2, '0')).join(':');
}

export function normalizeJobDirectory(jobDirectory: string): string {
  return jobDirectory.endsWith('/') ? jobDirectory.slice(0, -1) : jobDirectory;
}

/** Joins `name` onto the job directory; an empty directory leaves `name` bare. */
export function inJobDirectory(jobDirectory: string, name: string): string {
  if (jobDirectory === '') {
    return name;
  }
  return `${normalizeJobDirectory(jobDirectory)}/${name}`;
}

export function headerDirectives(header: SlurmHeader): string[] {
  const directives: string[] = [];

  for (const option of optionalDirectives) {
    const value = header[option];
    if (value !== OPTIONAL_DIRECTIVE_DEFAULTS[option]) {
      directives.push(`--${directiveName(option)}=${value}`);
    }
  }

  for (const flag of flagDirectives) {
    if (header[flag]) {
      directives.push(`--${directiveName(flag)}`);
    }
  }

  return directives;
}

export function renderHeader(header: SlurmHeader): string {
  return renderTemplate(defaultTemplates.header, {
    bash_path: header.bash_path,
    account: header.account,
    partition: header.partition,
    qos: header.qos,
    job_name: header.job_name,
    output: inJobDirectory(header.job_directory, header.output),
    error: inJobDirectory(header.job_directory, header.error),
    nodes: header.nodes,
    ntasks_per_node: header.ntasks_per_node,
    time: formatWallTime(header.time),
    directives: headerDirectives(header)
  });
}
