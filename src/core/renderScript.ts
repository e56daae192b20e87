import type { PythonCall, SingularityCall, SlurmHeader, SrunCall } from './configSchema.js';
import { inJobDirectory, renderHeader } from './header.js';
import { renderTemplate } from './environment.js';
import { singularityArgs } from './singularity.js';
import { renderSrun } from './srun.js';
import { defaultTemplates } from './templates.js';

/**
 * Resolves an `--output`/`--error` pattern to the path the running job sees:
 * `%x` and `%j` become references to the scheduler's job name and id.
 */
export function resolveLogFile(header: SlurmHeader, pattern: string): string {
  return inJobDirectory(header.job_directory, pattern)
    .replaceAll('%x', '${SLURM_JOB_NAME}')
    .replaceAll('%j', '${SLURM_JOB_ID}');
}

export function renderSubmissionScript(
  header: SlurmHeader,
  python: PythonCall,
  srun: SrunCall,
  singularity: SingularityCall
): string {
  const outputFile = resolveLogFile(header, header.output);
  const errorFile = resolveLogFile(header, header.error);

  const body = renderTemplate(defaultTemplates.script, {
    job_dir: inJobDirectory(header.job_directory, '${JOBCODE}'),
    python,
    singularity,
    singularity_args: singularityArgs(singularity),
    srun_block: renderSrun(srun),
    run_xthi: srun.xthi ? 1 : 0,
    output_file: outputFile,
    error_file: errorFile,
    separate_error_file: errorFile !== outputFile
  });

  return `${renderHeader(header)}${body}`;
}
