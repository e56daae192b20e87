import type { SrunCall } from './configSchema.js';
import { CpuMapConfigError } from './errors.js';
import { renderTemplate } from './environment.js';
import { defaultTemplates } from './templates.js';

export interface CpuMapVariables {
  l3cores?: string;
  l3size?: string;
  nodesize?: string;
}

/**
 * Shell command substitution printing the cores to bind: the first `l3cores`
 * of every `l3size` block across the node. It is evaluated by the job script,
 * so it reads the script's own variables rather than configured numbers.
 */
export function cpuMapCommand({
  l3cores = '${L3CORES}',
  l3size = '${L3SIZE}',
  nodesize = '${NODESIZE}'
}: CpuMapVariables = {}): string {
  return `$(python3 -c "print(','.join(map(str,filter(lambda i: (i%${l3size})<${l3cores}, range(${nodesize})))))")`;
}

export function hasCpuMap(srun: SrunCall): boolean {
  const values = [srun.l3cores, srun.l3size, srun.nodesize];
  if (!values.some((value) => value > 0)) {
    return false;
  }
  if (!values.every((value) => value > 0)) {
    throw new CpuMapConfigError();
  }
  return true;
}

export function srunArgs(srun: SrunCall): string {
  if (!hasCpuMap(srun)) {
    return srun.args;
  }
  const bind = '--cpu-bind=map_cpu:${CPU_MAP}';
  return srun.args ? `${srun.args} ${bind}` : bind;
}

export function renderSrun(srun: SrunCall): string {
  const cpuMap = hasCpuMap(srun)
    ? {
        l3cores: srun.l3cores,
        l3size: srun.l3size,
        nodesize: srun.nodesize,
        command: cpuMapCommand()
      }
    : null;

  return renderTemplate(defaultTemplates.srun, {
    cpu_map: cpuMap,
    args: srunArgs(srun)
  });
}
