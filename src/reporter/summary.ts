/**
 * Console summary of an analysis report
 */

import type { AnalysisReport, Finding, PackageResult } from '../types/metrics.js';

export interface SummaryOptions {
  /** Add one line of metrics per package */
  verbose?: boolean;
}

function formatPackageLine(pkg: PackageResult): string {
  const label = pkg.path || '.';
  const cycle = pkg.inCycle ? ' cycle' : '';
  return `  ${label}: Ca=${pkg.afferent} Ce=${pkg.efferent} I=${pkg.instability.toFixed(2)} `
    + `depth=${pkg.dependencyDepth}${cycle} loc=${pkg.totalLoc} funcs=${pkg.funcCount} structs=${pkg.structs.length}`;
}

function formatFinding(finding: Finding): string[] {
  return [
    `  [${finding.severity}] ${finding.kind}: ${finding.targetName}`,
    `      ${finding.message}`,
  ];
}

export function formatSummary(report: AnalysisReport, options: SummaryOptions = {}): string[] {
  const structCount = report.packages.reduce((sum, p) => sum + p.structs.length, 0);
  const funcCount = report.packages.reduce((sum, p) => sum + p.funcCount, 0);
  const critical = report.findings.filter(f => f.severity === 'Critical').length;
  const warnings = report.findings.length - critical;

  const lines = [
    'Code Health Summary',
    '',
    `  Packages:   ${report.packages.length}`,
    `  Structs:    ${structCount}`,
    `  Functions:  ${funcCount}`,
    `  Total LOC:  ${report.totalLoc}`,
    `  Skipped:    ${report.skippedDirectories.length}`,
  ];

  if (options.verbose && report.packages.length > 0) {
    lines.push('', 'Packages:');
    for (const pkg of report.packages) {
      lines.push(formatPackageLine(pkg));
    }
  }

  lines.push('', `Findings: ${report.findings.length} (${critical} critical, ${warnings} warning)`);
  for (const finding of report.findings) {
    lines.push(...formatFinding(finding));
  }

  return lines;
}
