import type { SingularityCall } from './configSchema.js';

function appendArgument(args: string, next: string): string {
  if (args !== '' && !args.endsWith(' ')) {
    return `${args} ${next}`;
  }
  return `${args}${next}`;
}

/** Arguments for `singularity run`, in the order home, bind, extra args. */
export function singularityArgs(singularity: SingularityCall): string {
  let args = '';
  if (singularity.home !== '') {
    args = `--home ${singularity.home}`;
  }
  if (singularity.bind_from !== '') {
    args = appendArgument(args, `--bind ${singularity.bind_from}`);
  }
  if (singularity.bind_to !== '') {
    args += `:${singularity.bind_to}`;
  }
  if (singularity.args !== '') {
    args = appendArgument(args, singularity.args);
  }
  return args;
}
