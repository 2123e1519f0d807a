/**
 * analyze command - Compute metrics and findings for a codebase
 */

import { Command, Option } from 'commander';
import path from 'node:path';
import { FactIndexer } from '../../indexer/index.js';
import { loadFacts } from '../../indexer/storage/index.js';
import { loadConfig, loadConfigOrDefault } from '../../config/loader.js';
import { analyzeProject } from '../../analyzer/index.js';
import { writeJsonReport, formatSummary } from '../../reporter/index.js';
import type { ProjectFacts } from '../../types/facts.js';
import type { Config } from '../../config/schema.js';

interface AnalyzeCommandOptions {
  config?: string;
  facts?: string;
  format?: 'json' | 'text' | 'both';
  output?: string;
  include?: string[];
  exclude?: string[];
  verbose: boolean;
}

async function collectFacts(
  rootDirectory: string,
  config: Config,
  options: AnalyzeCommandOptions,
  signal: AbortSignal
): Promise<ProjectFacts> {
  if (options.facts) {
    return loadFacts(path.resolve(options.facts), config.analysis.utility);
  }

  const indexer = new FactIndexer({
    rootDirectory,
    include: options.include ?? config.include,
    exclude: options.exclude ?? config.exclude,
    parserOptions: { utility: config.analysis.utility },
  });
  return indexer.extract({ signal });
}

export const analyzeCommand = new Command('analyze')
  .description('Analyze cohesion, complexity and coupling and report findings')
  .argument('[directory]', 'Directory to analyze', '.')
  .option('-c, --config <path>', 'Path to config file')
  .option('-f, --facts <path>', 'Analyze a stored fact model instead of parsing sources')
  .addOption(new Option('--format <format>', 'Report format').choices(['json', 'text', 'both']))
  .option('-o, --output <path>', 'Path to the JSON report')
  .option('--include <patterns...>', 'Glob patterns to include')
  .option('--exclude <patterns...>', 'Glob patterns to exclude')
  .option('--verbose', 'Show per-package metrics', false)
  .action(async (directory: string, options: AnalyzeCommandOptions) => {
    const startTime = Date.now();
    const rootDirectory = path.resolve(directory);
    const controller = new AbortController();
    const onInterrupt = (): void => controller.abort(new Error('Interrupted'));
    process.once('SIGINT', onInterrupt);

    try {
      const config = options.config
        ? await loadConfig(options.config)
        : await loadConfigOrDefault(rootDirectory);
      const format = options.format ?? config.report.format;

      console.log(`Analyzing ${options.facts ? path.resolve(options.facts) : rootDirectory}...\n`);

      const facts = await collectFacts(rootDirectory, config, options, controller.signal);
      const report = analyzeProject(facts, config.analysis, { signal: controller.signal });

      if (format === 'json' || format === 'both') {
        const outputPath = path.resolve(rootDirectory, options.output ?? config.report.output);
        const written = await writeJsonReport(report, outputPath);
        console.log(`Report written to ${written}`);
      }

      if (format === 'text' || format === 'both') {
        for (const line of formatSummary(report, { verbose: options.verbose })) {
          console.log(line);
        }
      }

      if (options.verbose) {
        console.log(`\nDuration: ${Date.now() - startTime}ms`);
      }
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    } finally {
      process.off('SIGINT', onInterrupt);
    }
  });
