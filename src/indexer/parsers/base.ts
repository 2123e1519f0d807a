/**
 * Abstract base class for fact parsers
 */

import type { UtilityHeuristic } from '../../config/schema.js';
import { utilityHeuristicSchema } from '../../config/schema.js';
import type { FunctionFacts, StructFacts } from '../../types/facts.js';

export interface ParsedFile {
  filePath: string;
  lineCount: number;
  structs: StructFacts[];
  functions: FunctionFacts[];
  imports: string[];
  errors: ParseError[];
}

export interface ParseError {
  message: string;
  line?: number;
  severity: 'error' | 'warning';
}

export interface ParseContext {
  /**
   * Map an import specifier, as written in the file, to a package import path,
   * or null for imports that name no package (assets, missing files)
   */
  resolveImport(source: string): string | null;
}

export interface ParserOptions {
  utility?: UtilityHeuristic;
  maxFileSize?: number;
}

export abstract class FactParser {
  protected options: Required<ParserOptions>;

  constructor(options: ParserOptions = {}) {
    this.options = {
      utility: options.utility ?? utilityHeuristicSchema.parse({}),
      maxFileSize: options.maxFileSize ?? 1024 * 1024, // 1MB
    };
  }

  /**
   * Check if this parser can handle the given file
   */
  canParse(filePath: string): boolean {
    const ext = filePath.split('.').pop()?.toLowerCase() ?? '';
    return this.extensions.includes(ext);
  }

  /**
   * Parse a file and extract its structural facts
   */
  abstract parseFile(filePath: string, content: string, context: ParseContext): ParsedFile;

  /**
   * Get file extensions this parser handles
   */
  abstract get extensions(): string[];

  protected isFileTooLarge(content: string): boolean {
    return Buffer.byteLength(content, 'utf8') > this.options.maxFileSize;
  }

  protected countLines(content: string): number {
    return content.split('\n').length;
  }

  /**
   * Result for a file whose contents are not analyzed
   */
  protected buildSkippedFile(filePath: string, content: string, ...errors: ParseError[]): ParsedFile {
    return {
      filePath,
      lineCount: this.countLines(content),
      structs: [],
      functions: [],
      imports: [],
      errors,
    };
  }

  /**
   * Create a FILE_TOO_LARGE warning
   */
  protected createFileTooLargeWarning(content: string): ParseError {
    const size = Buffer.byteLength(content, 'utf8');
    return {
      message: `File size (${formatBytes(size)}) exceeds limit (${formatBytes(this.options.maxFileSize)})`,
      severity: 'warning',
    };
  }
}

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}
