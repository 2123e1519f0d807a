/**
 * Resolve TypeScript/JavaScript import specifiers to package import paths.
 *
 * A package is a directory of source files. In-project imports resolve to
 * `modulePath` or `modulePath/<relative directory>`; everything else resolves
 * to the external package name (`zod`, `@scope/pkg`, `node:fs`). Relative
 * imports of assets, missing files or files outside the root resolve to null.
 */

import path from 'node:path';
import fs from 'node:fs';

export interface ImportResolverOptions {
  rootDir: string;
  modulePath: string;
  tsConfigPath?: string;
}

export interface ResolvedImport {
  source: string;
  importPath: string | null;
  isInternal: boolean;
  isBuiltIn: boolean;
}

/**
 * Node.js built-in modules
 */
const NODE_BUILTINS = new Set([
  'assert', 'async_hooks', 'buffer', 'child_process', 'cluster', 'console',
  'constants', 'crypto', 'dgram', 'diagnostics_channel', 'dns', 'domain',
  'events', 'fs', 'http', 'http2', 'https', 'inspector', 'module', 'net',
  'os', 'path', 'perf_hooks', 'process', 'punycode', 'querystring', 'readline',
  'repl', 'stream', 'string_decoder', 'sys', 'timers', 'tls', 'trace_events',
  'tty', 'url', 'util', 'v8', 'vm', 'wasi', 'worker_threads', 'zlib',
]);

const SOURCE_EXTENSIONS = ['.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs'];

/**
 * ESM-style TypeScript imports name the emitted file: './a.js' means './a.ts'
 */
const EMITTED_TO_SOURCE: Record<string, string[]> = {
  '.js': ['.ts', '.tsx'],
  '.jsx': ['.tsx'],
  '.mjs': ['.mts'],
  '.cjs': ['.cts'],
};

/**
 * TypeScript path aliases from tsconfig
 */
interface PathAliases {
  [pattern: string]: string[];
}

function isRelative(source: string): boolean {
  return source.startsWith('.') || source.startsWith('/');
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

export class ImportResolver {
  private rootDir: string;
  private modulePath: string;
  private pathAliases: PathAliases = {};
  private baseUrl: string | null = null;
  private existsCache = new Map<string, boolean>();

  constructor(options: ImportResolverOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.modulePath = options.modulePath;

    const tsConfigPath = options.tsConfigPath ?? path.join(this.rootDir, 'tsconfig.json');
    this.loadTsConfig(tsConfigPath);
  }

  private loadTsConfig(tsConfigPath: string): void {
    if (!fs.existsSync(tsConfigPath)) return;

    let config: unknown;
    try {
      config = JSON.parse(fs.readFileSync(tsConfigPath, 'utf-8'));
    } catch {
      // tsconfig with comments or trailing commas: aliases are not resolved
      return;
    }

    if (typeof config !== 'object' || config === null || !('compilerOptions' in config)) return;
    const compilerOptions = config.compilerOptions;
    if (typeof compilerOptions !== 'object' || compilerOptions === null) return;

    if ('baseUrl' in compilerOptions && typeof compilerOptions.baseUrl === 'string') {
      this.baseUrl = path.resolve(path.dirname(tsConfigPath), compilerOptions.baseUrl);
    }

    if ('paths' in compilerOptions && typeof compilerOptions.paths === 'object' && compilerOptions.paths !== null) {
      for (const [pattern, targets] of Object.entries(compilerOptions.paths)) {
        if (isStringArray(targets)) {
          this.pathAliases[pattern] = targets;
        }
      }
    }
  }

  /**
   * Resolve one import specifier as seen from `fromFile`
   */
  resolve(source: string, fromFile: string): ResolvedImport {
    if (this.isBuiltIn(source)) {
      return {
        source,
        importPath: source.startsWith('node:') ? source : `node:${source}`,
        isInternal: false,
        isBuiltIn: true,
      };
    }

    const resolvedFile = this.resolveFile(source, fromFile);
    if (resolvedFile) {
      const importPath = this.packageImportPath(path.dirname(resolvedFile));
      if (importPath !== null) {
        return { source, importPath, isInternal: true, isBuiltIn: false };
      }
    }

    if (isRelative(source)) {
      return { source, importPath: null, isInternal: false, isBuiltIn: false };
    }

    // Self-reference through the project's own package name
    if (source === this.modulePath || source.startsWith(`${this.modulePath}/`)) {
      return { source, importPath: source, isInternal: true, isBuiltIn: false };
    }

    return {
      source,
      importPath: extractPackageName(source),
      isInternal: false,
      isBuiltIn: false,
    };
  }

  /**
   * Import path of the package rooted at an absolute directory, or null when
   * the directory lies outside the project
   */
  packageImportPath(directory: string): string | null {
    const relative = path.relative(this.rootDir, directory).split(path.sep).join('/');
    if (relative.startsWith('..') || path.isAbsolute(relative)) {
      return null;
    }
    return relative ? `${this.modulePath}/${relative}` : this.modulePath;
  }

  private isBuiltIn(source: string): boolean {
    if (source.startsWith('node:')) {
      return true;
    }
    return NODE_BUILTINS.has(source.split('/')[0] ?? source);
  }

  private resolveFile(source: string, fromFile: string): string | null {
    if (isRelative(source)) {
      return this.resolveCandidate(path.resolve(path.dirname(fromFile), source));
    }

    const aliasResolved = this.resolveAlias(source);
    if (aliasResolved) {
      return aliasResolved;
    }

    if (this.baseUrl) {
      return this.resolveCandidate(path.resolve(this.baseUrl, source));
    }

    return null;
  }

  /**
   * Find the source file an absolute specifier refers to: the file itself
   * when it is source, the file with a source extension, its TypeScript
   * source, or a directory index
   */
  private resolveCandidate(candidate: string): string | null {
    const ext = path.extname(candidate);
    const sourceExts = EMITTED_TO_SOURCE[ext];
    if (sourceExts) {
      const stem = candidate.slice(0, -ext.length);
      for (const sourceExt of sourceExts) {
        if (this.fileExists(stem + sourceExt)) {
          return stem + sourceExt;
        }
      }
    }

    if (SOURCE_EXTENSIONS.includes(ext) && this.fileExists(candidate)) {
      return candidate;
    }

    for (const sourceExt of SOURCE_EXTENSIONS) {
      if (this.fileExists(candidate + sourceExt)) {
        return candidate + sourceExt;
      }
      const indexPath = path.join(candidate, `index${sourceExt}`);
      if (this.fileExists(indexPath)) {
        return indexPath;
      }
    }

    return null;
  }

  private resolveAlias(source: string): string | null {
    for (const [pattern, targets] of Object.entries(this.pathAliases)) {
      const match = source.match(this.patternToRegex(pattern));
      if (!match) continue;

      const captured = match[1] ?? '';
      for (const target of targets) {
        const baseDir = this.baseUrl ?? this.rootDir;
        const resolved = this.resolveCandidate(path.resolve(baseDir, target.replace('*', captured)));
        if (resolved) {
          return resolved;
        }
      }
    }

    return null;
  }

  /**
   * Convert a tsconfig path pattern to regex
   */
  private patternToRegex(pattern: string): RegExp {
    const escaped = pattern.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    const withWildcard = escaped.replace('\\*', '(.*)');
    return new RegExp(`^${withWildcard}$`);
  }

  private fileExists(filePath: string): boolean {
    const cached = this.existsCache.get(filePath);
    if (cached !== undefined) return cached;

    let exists = false;
    try {
      exists = fs.statSync(filePath).isFile();
    } catch {
      exists = false;
    }
    this.existsCache.set(filePath, exists);
    return exists;
  }
}

/**
 * Extract package name from an import source
 */
export function extractPackageName(source: string): string {
  const parts = source.split('/');
  // Scoped packages (@org/package)
  if (source.startsWith('@') && parts.length >= 2) {
    return parts.slice(0, 2).join('/');
  }
  return parts[0] ?? source;
}
