/**
 * JSON report writer
 */

import fs from 'node:fs';
import path from 'node:path';
import type { AnalysisReport } from '../types/metrics.js';

export function serializeReport(report: AnalysisReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}

/**
 * Write the report as pretty-printed JSON, creating parent directories.
 * Returns the absolute path written.
 */
export async function writeJsonReport(report: AnalysisReport, outputPath: string): Promise<string> {
  const absolutePath = path.resolve(outputPath);
  await fs.promises.mkdir(path.dirname(absolutePath), { recursive: true });
  await fs.promises.writeFile(absolutePath, serializeReport(report), 'utf-8');
  return absolutePath;
}
