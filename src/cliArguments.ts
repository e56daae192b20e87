export interface CliArguments {
  configPath: string;
  outputPath: string;
  dumpConfigPath: string;
  help: boolean;
}

export function parseArguments(argv: string[]): CliArguments {
  const args: CliArguments = { configPath: '', outputPath: '', dumpConfigPath: '', help: false };

  for (let i = 0; i < argv.length; i += 1) {
    const current = argv[i];
    switch (current) {
      case '--config':
      case '-c':
        args.configPath = argv[++i] ?? '';
        break;
      case '--out':
      case '-o':
        args.outputPath = argv[++i] ?? '';
        break;
      case '--dump-config':
        args.dumpConfigPath = argv[++i] ?? '';
        break;
      case '--help':
      case '-h':
        args.help = true;
        return args;
      default:
        if (current.startsWith('-')) {
          throw new Error(`Unknown option: ${current}`);
        }
        throw new Error(`Unexpected argument: ${current}`);
    }
  }

  if (!args.configPath) {
    throw new Error('Missing required --config <path> argument.');
  }

  return args;
}

export const usage = `
SLURM submission script generator

Usage:
  slurm-script --config <job.json|job.yaml> [--out <script.sh>] [--dump-config <resolved.yaml>]

Options:
  -c, --config     Path to a JSON or YAML job config (required)
  -o, --out        Write the script here instead of printing it
  --dump-config    Write the resolved config, defaults included, as YAML
  -h, --help       Show this help message
`.trim();
