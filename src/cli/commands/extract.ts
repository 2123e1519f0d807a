/**
 * extract command - Write a codebase's fact model to JSON
 */

import { Command } from 'commander';
import path from 'node:path';
import { FactIndexer } from '../../indexer/index.js';
import { saveFacts } from '../../indexer/storage/index.js';
import { loadConfig, loadConfigOrDefault } from '../../config/loader.js';

interface ExtractCommandOptions {
  config?: string;
  output: string;
  include?: string[];
  exclude?: string[];
}

export const extractCommand = new Command('extract')
  .description('Extract structural facts for later analysis')
  .argument('[directory]', 'Directory to extract from', '.')
  .option('-c, --config <path>', 'Path to config file')
  .option('-o, --output <path>', 'Path to the facts file', 'code_health_facts.json')
  .option('--include <patterns...>', 'Glob patterns to include')
  .option('--exclude <patterns...>', 'Glob patterns to exclude')
  .action(async (directory: string, options: ExtractCommandOptions) => {
    const rootDirectory = path.resolve(directory);

    console.log(`Extracting facts from ${rootDirectory}...\n`);

    try {
      const config = options.config
        ? await loadConfig(options.config)
        : await loadConfigOrDefault(rootDirectory);

      const indexer = new FactIndexer({
        rootDirectory,
        include: options.include ?? config.include,
        exclude: options.exclude ?? config.exclude,
        parserOptions: { utility: config.analysis.utility },
      });
      const facts = await indexer.extract();

      const outputPath = path.resolve(rootDirectory, options.output);
      await saveFacts(outputPath, facts);

      const structCount = facts.packages.reduce((sum, p) => sum + p.structs.length, 0);
      const funcCount = facts.packages.reduce((sum, p) => sum + p.functions.length, 0);

      console.log('Extraction complete!\n');
      console.log(`  Module:     ${facts.modulePath}`);
      console.log(`  Packages:   ${facts.packages.length}`);
      console.log(`  Structs:    ${structCount}`);
      console.log(`  Functions:  ${funcCount}`);
      console.log(`  Skipped:    ${facts.skippedDirectories.length}`);
      console.log(`  Facts:      ${outputPath}`);
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
