#!/usr/bin/env node
import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';

import { parseArguments, usage } from './cliArguments.js';
import { renderConfigYaml } from './core/configYaml.js';
import { generateSubmissionScript } from './generateSubmissionScript.js';
import { loadJobConfig } from './loadJobConfig.js';

async function main() {
  try {
    const args = parseArguments(process.argv.slice(2));
    if (args.help) {
      console.log(usage);
      return;
    }

    const config = await loadJobConfig(path.resolve(process.cwd(), args.configPath));
    const scriptPath = args.outputPath ? path.resolve(process.cwd(), args.outputPath) : undefined;

    const result = await generateSubmissionScript(config, { scriptPath });

    let dumpedConfigPath: string | undefined;
    if (args.dumpConfigPath) {
      dumpedConfigPath = path.resolve(process.cwd(), args.dumpConfigPath);
      await writeFile(dumpedConfigPath, renderConfigYaml(config), 'utf8');
    }

    if (!result.scriptPath) {
      process.stdout.write(result.script);
      return;
    }

    console.log(
      [
        'Generated artifacts:',
        `- Script: ${path.relative(process.cwd(), result.scriptPath)}`,
        dumpedConfigPath ? `- Config: ${path.relative(process.cwd(), dumpedConfigPath)}` : null
      ]
        .filter(Boolean)
        .join('\n')
    );
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}

void main();
