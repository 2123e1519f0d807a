/**
 * Cyclomatic complexity, size and function-level coupling
 */

import type { DecisionPoints, FunctionFacts, PackageFacts } from '../types/facts.js';
import type { ComplexityResult } from '../types/metrics.js';

/**
 * 1 + every if, loop, switch, matching case clause, select case and
 * logical AND/OR operator. A function without a body scores 1.
 */
export function cyclomaticComplexity(points: DecisionPoints, hasBody = true): number {
  if (!hasBody) return 1;
  return 1
    + points.ifStatements
    + points.loops
    + points.switches
    + points.caseClauses
    + points.selectCases
    + points.logicalOperators;
}

export function instability(afferent: number, efferent: number): number {
  const total = afferent + efferent;
  return total > 0 ? efferent / total : 0;
}

/**
 * Whether an import path belongs to the project: the module path itself or
 * anything under `modulePath/`.
 */
export function isInternalImport(importPath: string, modulePath: string): boolean {
  return importPath === modulePath || importPath.startsWith(`${modulePath}/`);
}

export function categorizeDependencies(
  dependencies: string[],
  modulePath: string
): { internal: string[]; external: string[] } {
  const internal: string[] = [];
  const external: string[] = [];
  for (const dep of dependencies) {
    if (isInternalImport(dep, modulePath)) {
      internal.push(dep);
    } else {
      external.push(dep);
    }
  }
  return { internal, external };
}

/**
 * Count, for every function, how many other functions of the same package
 * call it. Resolution is by exact qualified-name match.
 */
export function calculateAfferentCounts(functions: FunctionFacts[]): Map<string, number> {
  const callers = new Map<string, Set<string>>();
  for (const fn of functions) {
    callers.set(fn.qualifiedName, new Set());
  }

  for (const caller of functions) {
    for (const callee of caller.callees) {
      if (callee === caller.qualifiedName) continue;
      callers.get(callee)?.add(caller.qualifiedName);
    }
  }

  const counts = new Map<string, number>();
  for (const [name, set] of callers) {
    counts.set(name, set.size);
  }
  return counts;
}

export function calculateComplexity(pkg: PackageFacts, modulePath: string): ComplexityResult[] {
  const afferentCounts = calculateAfferentCounts(pkg.functions);

  return pkg.functions.map(fn => {
    const dependencies = [...new Set(fn.importedPackagesUsed)].sort();
    const { internal, external } = categorizeDependencies(dependencies, modulePath);
    const efferent = dependencies.length;
    const afferent = afferentCounts.get(fn.qualifiedName) ?? 0;

    return {
      funcName: fn.qualifiedName,
      filePath: fn.filePath,
      complexity: cyclomaticComplexity(fn.decisionPoints, fn.hasBody),
      loc: fn.hasBody ? Math.max(0, fn.bodyLineCount) : 0,
      dependencies,
      internalDeps: internal,
      externalDeps: external,
      efferent,
      afferent,
      instability: instability(afferent, efferent),
    };
  });
}
