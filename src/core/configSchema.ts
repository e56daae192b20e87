import { z, type ZodTypeAny } from 'zod';

import { ConfigValidationError } from './errors.js';

/**
 * Values the optional `#SBATCH` directives take when the user leaves them alone.
 * The header renders a directive only when its value differs from this table.
 */
export const OPTIONAL_DIRECTIVE_DEFAULTS = {
  switches: -1,
  distribution: '',
  hint: '',
  mail_user: '',
  mail_type: ''
} as const;

export const optionalDirectives = [
  'switches',
  'distribution',
  'hint',
  'mail_user',
  'mail_type'
] as const satisfies ReadonlyArray<keyof typeof OPTIONAL_DIRECTIVE_DEFAULTS>;

export const flagDirectives = ['exclusive', 'requeue'] as const;

const count = z.coerce.number().int();

export const slurmHeaderSchema = z.object({
  account: z.string(),
  partition: z.string().default('standard'),
  qos: z.string().default('standard'),
  job_name: z.string(),
  output: z.string().default('slurm-%x-%j.out'),
  error: z.string().default('slurm-%x-%j.out'),
  nodes: count,
  ntasks_per_node: count,
  time: z.tuple([count, count, count]),
  switches: count.default(OPTIONAL_DIRECTIVE_DEFAULTS.switches),
  distribution: z.string().default(OPTIONAL_DIRECTIVE_DEFAULTS.distribution),
  hint: z.string().default(OPTIONAL_DIRECTIVE_DEFAULTS.hint),
  mail_user: z.string().default(OPTIONAL_DIRECTIVE_DEFAULTS.mail_user),
  mail_type: z.string().default(OPTIONAL_DIRECTIVE_DEFAULTS.mail_type),
  exclusive: z.boolean().default(false),
  requeue: z.boolean().default(false),
  bash_path: z.string().default('!/bin/bash'),
  job_directory: z.string().default('')
});

export const pythonCallSchema = z.object({
  path: z.string().default('python'),
  args: z.string().default(''),
  script_name: z.string(),
  script_dir: z.string(),
  script_args: z.string().default('')
});

export const srunCallSchema = z.object({
  l3cores: count.default(-1),
  l3size: count.default(-1),
  nodesize: count.default(-1),
  args: z.string().default(''),
  xthi: z.boolean().default(false)
});

export const singularityCallSchema = z.object({
  container: z.string(),
  directory: z.string().default(''),
  args: z.string().default(''),
  bind_from: z.string().default(''),
  bind_to: z.string().default(''),
  home: z.string().default(''),
  setup_file: z.string().default('')
});

export const jobConfigSchema = z.object({
  header: slurmHeaderSchema,
  python: pythonCallSchema,
  srun: srunCallSchema.default({}),
  singularity: singularityCallSchema
});

export type SlurmHeader = Readonly<z.output<typeof slurmHeaderSchema>>;
export type SlurmHeaderInput = z.input<typeof slurmHeaderSchema>;
export type PythonCall = Readonly<z.output<typeof pythonCallSchema>>;
export type PythonCallInput = z.input<typeof pythonCallSchema>;
export type SrunCall = Readonly<z.output<typeof srunCallSchema>>;
export type SrunCallInput = z.input<typeof srunCallSchema>;
export type SingularityCall = Readonly<z.output<typeof singularityCallSchema>>;
export type SingularityCallInput = z.input<typeof singularityCallSchema>;

export interface JobConfig {
  readonly header: SlurmHeader;
  readonly python: PythonCall;
  readonly srun: SrunCall;
  readonly singularity: SingularityCall;
}

function parseFrozen<S extends ZodTypeAny>(schema: S, value: unknown, label: string): Readonly<z.output<S>> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigValidationError(label, result.error);
  }
  return Object.freeze(result.data);
}

export function createSlurmHeader(input: SlurmHeaderInput): SlurmHeader {
  return parseFrozen(slurmHeaderSchema, input, 'header');
}

export function createPythonCall(input: PythonCallInput): PythonCall {
  return parseFrozen(pythonCallSchema, input, 'python');
}

export function createSrunCall(input: SrunCallInput = {}): SrunCall {
  return parseFrozen(srunCallSchema, input, 'srun');
}

export function createSingularityCall(input: SingularityCallInput): SingularityCall {
  return parseFrozen(singularityCallSchema, input, 'singularity');
}

export function parseJobConfig(raw: unknown): JobConfig {
  const parsed = parseFrozen(jobConfigSchema, raw, 'job config');
  return Object.freeze({
    header: Object.freeze(parsed.header),
    python: Object.freeze(parsed.python),
    srun: Object.freeze(parsed.srun),
    singularity: Object.freeze(parsed.singularity)
  });
}
