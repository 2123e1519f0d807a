/**
 * Cross-metric diagnostics: a fixed rule set evaluated over every package's
 * results once the run is complete.
 */

import type { DiagnosticsThresholds } from '../config/schema.js';
import type { Finding, PackageResult, StructResult } from '../types/metrics.js';

type Rule = (packages: PackageResult[], thresholds: DiagnosticsThresholds) => Finding[];

function structTarget(pkg: PackageResult, struct: StructResult): string {
  return `${pkg.name}.${struct.structName}`;
}

function structAnchor(pkg: PackageResult, struct: StructResult): string {
  return `#struct-${pkg.path}-${struct.structName}`;
}

/**
 * Low cohesion (LCOM4) in a package many others depend on
 */
export const detectGodObjects: Rule = (packages, t) => {
  const findings: Finding[] = [];

  for (const pkg of packages) {
    if (pkg.afferent < t.godObjectAfferent) continue;

    for (const struct of pkg.structs) {
      if (struct.lcom4Score < t.godObjectLcom4) continue;
      findings.push({
        kind: 'God Object',
        targetName: structTarget(pkg, struct),
        severity: 'Critical',
        message: `Class '${struct.structName}' has excessive responsibilities (LCOM4=${struct.lcom4Score}) `
          + `and is heavily depended upon (Ca=${pkg.afferent}). Consider splitting into smaller, focused classes.`,
        evidence: {
          lcom4_score: struct.lcom4Score,
          afferent: pkg.afferent,
          package: pkg.name,
          file_path: struct.filePath,
        },
        relatedPath: structAnchor(pkg, struct),
      });
    }
  }

  return findings;
};

/**
 * Heavily depended-upon package that itself depends on many others
 */
export const detectUnstableFoundations: Rule = (packages, t) => {
  const findings: Finding[] = [];

  for (const pkg of packages) {
    if (pkg.afferent < t.unstableAfferent || pkg.instability < t.unstableInstability) continue;
    findings.push({
      kind: 'Unstable Foundation',
      targetName: pkg.name,
      severity: 'Critical',
      message: `Package '${pkg.name}' is heavily depended upon (Ca=${pkg.afferent}) `
        + `but highly unstable (I=${pkg.instability.toFixed(2)}). This creates a fragile foundation. `
        + `Consider stabilizing this package by reducing dependencies.`,
      evidence: {
        afferent: pkg.afferent,
        efferent: pkg.efferent,
        instability: pkg.instability,
        package: pkg.name,
      },
      relatedPath: `#package-${pkg.path}`,
    });
  }

  return findings;
};

export const detectComplexFunctions: Rule = (packages, t) => {
  const findings: Finding[] = [];

  for (const pkg of packages) {
    for (const fn of pkg.functions) {
      if (fn.complexity < t.complexFunction) continue;
      findings.push({
        kind: 'Overly Complex Function',
        targetName: `${pkg.name}.${fn.funcName}`,
        severity: 'Warning',
        message: `Function '${fn.funcName}' is too complex (Complexity=${fn.complexity}). `
          + `High complexity makes code hard to test and maintain. Consider refactoring into smaller functions.`,
        evidence: {
          complexity: fn.complexity,
          function: fn.funcName,
          package: pkg.name,
          file_path: fn.filePath,
        },
        relatedPath: `#function-${pkg.path}-${fn.funcName}`,
      });
    }
  }

  return findings;
};

/**
 * Low cohesion combined with at least one complex method of the same class
 */
export const detectAmbiguousStructs: Rule = (packages, t) => {
  const findings: Finding[] = [];

  for (const pkg of packages) {
    for (const struct of pkg.structs) {
      if (struct.lcom4Score < t.ambiguousLcom4) continue;

      const prefix = `${struct.structName}.`;
      const complexMethods = pkg.functions
        .filter(fn => fn.funcName.length > prefix.length && fn.funcName.startsWith(prefix))
        .filter(fn => fn.complexity >= t.ambiguousMethodComplexity)
        .map(fn => fn.funcName)
        .sort();

      if (complexMethods.length === 0) continue;

      findings.push({
        kind: 'Ambiguous Struct',
        targetName: structTarget(pkg, struct),
        severity: 'Warning',
        message: `Class '${struct.structName}' has unclear responsibilities (LCOM4=${struct.lcom4Score}) `
          + `and contains complex logic. This suggests mixed concerns. Consider refactoring.`,
        evidence: {
          lcom4_score: struct.lcom4Score,
          complex_methods: complexMethods,
          package: pkg.name,
          file_path: struct.filePath,
        },
        relatedPath: structAnchor(pkg, struct),
      });
    }
  }

  return findings;
};

export const detectMethodIslands: Rule = (packages) => {
  const findings: Finding[] = [];

  for (const pkg of packages) {
    for (const struct of pkg.structs) {
      const mc = struct.methodClusters;
      if (!mc || !mc.hasMultipleIslands) continue;

      const count = mc.clusters.length;
      const summary = mc.clusters
        .map(c => `Cluster ${c.id} (${c.size} methods): ${c.responsibilityHint}`)
        .join('; ');

      findings.push({
        kind: 'Split Responsibility (Method Islands)',
        targetName: structTarget(pkg, struct),
        severity: 'Warning',
        message: `Class '${struct.structName}' has ${count} isolated groups of private methods, `
          + `suggesting ${count} distinct responsibilities. `
          + `Private methods that don't call each other likely serve different purposes. `
          + `Clusters: ${summary}. Consider splitting into separate classes.`,
        evidence: {
          cluster_count: count,
          total_private_methods: mc.totalPrivateMethods,
          clusters: mc.clusters,
          package: pkg.name,
          file_path: struct.filePath,
        },
        relatedPath: structAnchor(pkg, struct),
      });
    }
  }

  return findings;
};

export const detectFieldClusters: Rule = (packages, t) => {
  const findings: Finding[] = [];

  for (const pkg of packages) {
    for (const struct of pkg.structs) {
      const fm = struct.fieldClusters;
      if (!fm || !fm.hasMultipleResponsibilities) continue;

      findings.push({
        kind: 'Split Responsibility (Field Clusters)',
        targetName: structTarget(pkg, struct),
        severity: fm.estimatedClusters >= t.fieldClusterCritical ? 'Critical' : 'Warning',
        message: `Class '${struct.structName}' shows ${fm.estimatedClusters} distinct responsibility patterns `
          + `in method-field usage (PCA analysis). ${fm.recommendationText}`,
        evidence: {
          estimated_clusters: fm.estimatedClusters,
          explained_variance: fm.explainedVariance,
          method_count: fm.methodNames.length,
          field_count: fm.fieldNames.length,
          package: pkg.name,
          file_path: struct.filePath,
          recommendations: fm.recommendationText,
        },
        relatedPath: structAnchor(pkg, struct),
      });
    }
  }

  return findings;
};

const RULES: Rule[] = [
  detectGodObjects,
  detectUnstableFoundations,
  detectComplexFunctions,
  detectAmbiguousStructs,
  detectMethodIslands,
  detectFieldClusters,
];

/**
 * Evaluate every rule in order; findings are appended rule by rule.
 */
export function performDiagnostics(
  packages: PackageResult[],
  thresholds: DiagnosticsThresholds
): Finding[] {
  return RULES.flatMap(rule => rule(packages, thresholds));
}
