/**
 * Fact extraction: walk a project and build its fact model
 */

import fs from 'node:fs';
import path from 'node:path';
import fg from 'fast-glob';

import type { FileFacts, FunctionFacts, PackageFacts, ProjectFacts, StructFacts } from '../types/facts.js';
import { TypeScriptParser, type FactParser, type ParserOptions } from './parsers/index.js';
import { ImportResolver } from './import-resolver.js';
import { isInternalImport } from '../analyzer/complexity.js';
import { AnalysisAbortedError } from '../analyzer/errors.js';

export interface IndexerConfig {
  rootDirectory: string;
  include: string[];
  exclude: string[];
  parserOptions?: ParserOptions;
}

export interface ExtractOptions {
  /** Checked before each directory; an aborted signal fails the extraction. */
  signal?: AbortSignal;
}

interface PackageDraft {
  path: string;
  absolutePath: string;
  files: string[];
}

class DirectorySkipped extends Error {}

/**
 * Project-relative path with forward slashes, '' for the root itself
 */
export function toProjectPath(rootDir: string, target: string): string {
  return path.relative(rootDir, target).split(path.sep).join('/');
}

/**
 * The project's module path: the root package.json name, falling back to the
 * root directory's base name
 */
export async function readModulePath(rootDir: string): Promise<string> {
  const fallback = path.basename(rootDir);
  let raw: string;
  try {
    raw = await fs.promises.readFile(path.join(rootDir, 'package.json'), 'utf-8');
  } catch {
    return fallback;
  }

  try {
    const pkg: unknown = JSON.parse(raw);
    if (typeof pkg === 'object' && pkg !== null && 'name' in pkg && typeof pkg.name === 'string' && pkg.name) {
      return pkg.name;
    }
  } catch (error) {
    console.warn(`Ignoring unreadable package.json: ${error instanceof Error ? error.message : String(error)}`);
  }
  return fallback;
}

export class FactIndexer {
  private config: IndexerConfig;
  private parser: FactParser;

  constructor(config: IndexerConfig) {
    this.config = config;
    this.parser = new TypeScriptParser(config.parserOptions);
  }

  async extract(options: ExtractOptions = {}): Promise<ProjectFacts> {
    const rootDir = path.resolve(this.config.rootDirectory);
    await this.assertDirectory(rootDir);

    const modulePath = await readModulePath(rootDir);
    const resolver = new ImportResolver({ rootDir, modulePath });

    // Find all matching files
    const files = await fg(this.config.include, {
      cwd: rootDir,
      ignore: this.config.exclude,
      absolute: true,
      onlyFiles: true,
    });

    const packages: PackageFacts[] = [];
    const skippedDirectories: string[] = [];

    for (const draft of this.groupByDirectory(rootDir, files)) {
      if (options.signal?.aborted) {
        throw new AnalysisAbortedError(packages.length, options.signal.reason);
      }
      try {
        packages.push(await this.extractPackage(draft, rootDir, modulePath, resolver));
      } catch (error) {
        if (!(error instanceof DirectorySkipped)) throw error;
        console.warn(`Skipping ${draft.path || '.'}: ${error.message}`);
        skippedDirectories.push(draft.path);
      }
    }

    return {
      rootDirectory: rootDir,
      modulePath,
      packages: this.dropUnanalyzedImports(packages, modulePath),
      skippedDirectories,
    };
  }

  /**
   * In-project imports of directories that were excluded, skipped or hold no
   * source files name no analyzed package; remove them
   */
  private dropUnanalyzedImports(packages: PackageFacts[], modulePath: string): PackageFacts[] {
    const analyzed = new Set(packages.map(p => p.importPath));
    const keep = (importPath: string): boolean =>
      !isInternalImport(importPath, modulePath) || analyzed.has(importPath);

    return packages.map(pkg => ({
      ...pkg,
      imports: pkg.imports.filter(keep),
      functions: pkg.functions.map(fn => ({
        ...fn,
        importedPackagesUsed: fn.importedPackagesUsed.filter(keep),
      })),
    }));
  }

  private async assertDirectory(rootDir: string): Promise<void> {
    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(rootDir);
    } catch {
      throw new Error(`Target path does not exist: ${rootDir}`);
    }
    if (!stat.isDirectory()) {
      throw new Error(`Target path is not a directory: ${rootDir}`);
    }
  }

  /**
   * One draft per directory holding parseable files, sorted by path
   */
  private groupByDirectory(rootDir: string, files: string[]): PackageDraft[] {
    const drafts = new Map<string, PackageDraft>();

    for (const file of files) {
      if (!this.parser.canParse(file)) continue;
      const absolutePath = path.dirname(file);
      const projectPath = toProjectPath(rootDir, absolutePath);
      let draft = drafts.get(projectPath);
      if (!draft) {
        draft = { path: projectPath, absolutePath, files: [] };
        drafts.set(projectPath, draft);
      }
      draft.files.push(file);
    }

    const sorted = [...drafts.values()].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
    for (const draft of sorted) {
      draft.files.sort();
    }
    return sorted;
  }

  private async extractPackage(
    draft: PackageDraft,
    rootDir: string,
    modulePath: string,
    resolver: ImportResolver
  ): Promise<PackageFacts> {
    const structs: StructFacts[] = [];
    const functions: FunctionFacts[] = [];
    const imports = new Set<string>();
    const fileFacts: FileFacts[] = [];

    for (const file of draft.files) {
      const relativePath = toProjectPath(rootDir, file);

      let content: string;
      try {
        content = await fs.promises.readFile(file, 'utf-8');
      } catch (error) {
        throw new DirectorySkipped(`${relativePath}: ${error instanceof Error ? error.message : String(error)}`);
      }

      const parsed = this.parser.parseFile(relativePath, content, {
        resolveImport: source => resolver.resolve(source, file).importPath,
      });

      for (const problem of parsed.errors) {
        const location = problem.line !== undefined ? `${relativePath}:${problem.line}` : relativePath;
        if (problem.severity === 'error') {
          throw new DirectorySkipped(`${location}: ${problem.message}`);
        }
        console.warn(`${location}: ${problem.message}`);
      }

      structs.push(...parsed.structs);
      functions.push(...parsed.functions);
      for (const importPath of parsed.imports) {
        imports.add(importPath);
      }
      fileFacts.push({ filePath: relativePath, lineCount: parsed.lineCount });
    }

    const importPath = resolver.packageImportPath(draft.absolutePath) ?? modulePath;
    const name = draft.path
      ? path.posix.basename(draft.path)
      : modulePath.split('/').pop() ?? modulePath;

    return {
      name,
      path: draft.path,
      importPath,
      structs,
      functions,
      imports: [...imports].sort(),
      files: fileFacts,
    };
  }
}

export { ImportResolver, extractPackageName, type ResolvedImport } from './import-resolver.js';
export { TypeScriptParser, FactParser, type ParsedFile, type ParserOptions } from './parsers/index.js';
