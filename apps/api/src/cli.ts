/**
 * Builds stack_data.json from the n8n workflow export and the Supabase catalog.
 *
 * Usage:
 *   tsx src/cli.ts [merge] [--workflows=PATH] [--catalog=PATH] [--out=PATH]
 *   tsx src/cli.ts catalog --tables=PATH [--functions=PATH] [--dependencies=PATH] [--out=PATH]
 *
 * Paths default to DATA_DIR (or the working directory); see .env.example.
 */

import './env';
import path from 'path';
import { loadConfig } from './config';
import { runCatalogBuild, runMerge } from './merge';

type Command = 'merge' | 'catalog';

interface CliOptions {
  command: Command;
  flags: Map<string, string>;
}

const parseArgs = (argv: string[]): CliOptions => {
  const positional = argv.filter(arg => !arg.startsWith('--'));
  const command = positional[0] ?? 'merge';
  if (command !== 'merge' && command !== 'catalog') {
    throw new Error(`Unknown command "${command}". Expected "merge" or "catalog".`);
  }

  const flags = new Map<string, string>();
  for (const arg of argv.filter(a => a.startsWith('--'))) {
    const [key, ...rest] = arg.slice(2).split('=');
    flags.set(key, rest.join('='));
  }
  return { command, flags };
};

const main = async () => {
  const { command, flags } = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  const flag = (name: string) => flags.get(name) || undefined;

  if (command === 'catalog') {
    const tablesPath = flag('tables');
    if (!tablesPath) throw new Error('catalog requires --tables=PATH');
    await runCatalogBuild({
      tablesPath,
      functionsPath: flag('functions'),
      dependenciesPath: flag('dependencies'),
      outputPath: flag('out') ?? path.join(config.dataDir, 'supabase_data.json')
    });
    return;
  }

  const workflowsPath = flag('workflows');
  const catalogPath = flag('catalog');
  await runMerge({
    workflowPaths: workflowsPath ? [workflowsPath] : config.workflowPaths,
    catalogPaths: catalogPath ? [catalogPath] : config.catalogPaths,
    outputPath: flag('out') ?? config.outputPath
  });
};

main().catch(err => {
  console.error(`ERROR: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
});
