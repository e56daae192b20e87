export {
  generateSubmissionScript,
  type GenerateSubmissionScriptOptions,
  type GenerationResult
} from './generateSubmissionScript.js';
export { loadJobConfig } from './loadJobConfig.js';
export { renderSubmissionScript, resolveLogFile } from './core/renderScript.js';
export {
  renderHeader,
  headerDirectives,
  formatWallTime,
  normalizeJobDirectory
} from './core/header.js';
export { renderSrun, cpuMapCommand, type CpuMapVariables } from './core/srun.js';
export { singularityArgs } from './core/singularity.js';
export { renderConfigYaml } from './core/configYaml.js';
export { ConfigValidationError, CpuMapConfigError } from './core/errors.js';
export {
  OPTIONAL_DIRECTIVE_DEFAULTS,
  createSlurmHeader,
  createPythonCall,
  createSrunCall,
  createSingularityCall,
  parseJobConfig,
  type JobConfig,
  type SlurmHeader,
  type SlurmHeaderInput,
  type PythonCall,
  type PythonCallInput,
  type SrunCall,
  type SrunCallInput,
  type SingularityCall,
  type SingularityCallInput
} from './core/configSchema.js';
