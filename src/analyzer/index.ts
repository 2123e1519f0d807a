/**
 * Analysis pipeline: facts in, metrics and findings out
 */

import type { PackageFacts, ProjectFacts } from '../types/facts.js';
import type { AnalysisReport, CouplingResult, PackageResult, StructResult } from '../types/metrics.js';
import type { AnalysisSettings } from '../config/schema.js';
import { calculateLcom4 } from './cohesion.js';
import { calculateComplexity } from './complexity.js';
import { calculateCoupling } from './coupling.js';
import { analyzeMethodClustering } from './method-clustering.js';
import { analyzeFieldClustering } from './field-clustering.js';
import { performDiagnostics } from './diagnostics.js';
import { AnalysisAbortedError } from './errors.js';

export interface AnalyzeOptions {
  /** Checked before each package; an aborted signal fails the whole run. */
  signal?: AbortSignal;
}

const NO_COUPLING: Omit<CouplingResult, 'packageName'> = {
  afferent: 0,
  efferent: 0,
  instability: 0,
  dependencyDepth: 0,
  inCycle: false,
};

export function analyzeStructs(pkg: PackageFacts, settings: AnalysisSettings): StructResult[] {
  return pkg.structs.map(struct => ({
    ...calculateLcom4(struct),
    methodClusters: analyzeMethodClustering(struct, settings.clustering),
    fieldClusters: analyzeFieldClustering(struct, settings.fieldClustering),
  }));
}

export function analyzePackage(
  pkg: PackageFacts,
  modulePath: string,
  coupling: CouplingResult | undefined,
  settings: AnalysisSettings
): PackageResult {
  const structs = analyzeStructs(pkg, settings);
  const functions = calculateComplexity(pkg, modulePath);
  const totalLoc = pkg.files.reduce((sum, f) => sum + f.lineCount, 0);
  const funcLoc = functions.reduce((sum, f) => sum + f.loc, 0);
  const metrics = coupling ?? NO_COUPLING;

  return {
    name: pkg.name,
    path: pkg.path,
    importPath: pkg.importPath,
    afferent: metrics.afferent,
    efferent: metrics.efferent,
    instability: metrics.instability,
    dependencyDepth: metrics.dependencyDepth,
    inCycle: metrics.inCycle,
    structs,
    functions,
    totalLoc,
    avgFuncLoc: functions.length > 0 ? funcLoc / functions.length : 0,
    funcCount: functions.length,
    fileCount: pkg.files.length,
  };
}

/**
 * Analyze a complete fact model.
 *
 * Coupling needs the whole import graph, so it runs before any package is
 * reported; diagnostics need every package's results, so they run last.
 */
export function analyzeProject(
  facts: ProjectFacts,
  settings: AnalysisSettings,
  options: AnalyzeOptions = {}
): AnalysisReport {
  const coupling = calculateCoupling(facts.packages, facts.modulePath);
  const packages: PackageResult[] = [];

  for (const pkg of facts.packages) {
    if (options.signal?.aborted) {
      throw new AnalysisAbortedError(packages.length, options.signal.reason);
    }
    packages.push(analyzePackage(pkg, facts.modulePath, coupling.get(pkg.importPath), settings));
  }

  return {
    findings: performDiagnostics(packages, settings.diagnostics),
    packages,
    totalLoc: packages.reduce((sum, p) => sum + p.totalLoc, 0),
    skippedDirectories: [...facts.skippedDirectories],
  };
}

export { calculateLcom4 } from './cohesion.js';
export {
  calculateComplexity,
  calculateAfferentCounts,
  cyclomaticComplexity,
  instability,
  isInternalImport,
  categorizeDependencies,
} from './complexity.js';
export {
  buildDependencyGraph,
  calculateCoupling,
  calculateDependencyDepth,
  findCyclicPackages,
} from './coupling.js';
export {
  analyzeMethodClustering,
  buildPrivateCallGraph,
  minimumClusterSize,
  suggestResponsibility,
} from './method-clustering.js';
export {
  analyzeFieldClustering,
  buildUsageMatrix,
  centerColumns,
  covarianceMatrix,
  powerIteration,
  topEigenvalues,
  explainedVarianceRatios,
  estimateClusterCount,
  generateRecommendation,
} from './field-clustering.js';
export {
  performDiagnostics,
  detectGodObjects,
  detectUnstableFoundations,
  detectComplexFunctions,
  detectAmbiguousStructs,
  detectMethodIslands,
  detectFieldClusters,
} from './diagnostics.js';
export { UnionFind } from './union-find.js';
export { isUtilityMethod, isLowerCaseName, splitCamelCase, bareName } from './heuristics.js';
export { InvariantViolationError, AnalysisAbortedError } from './errors.js';
