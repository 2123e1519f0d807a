/**
 * Field usage clustering: a lightweight principal-component analysis of the
 * method x field usage matrix, estimating how many responsibilities a
 * struct's fields and methods decompose into.
 *
 * Eigenvalues come from power iteration with a diagonal-shift deflation
 * (subtracting a fraction of each eigenvalue from the diagonal). That is an
 * approximation of true deflation, so the estimate is a heuristic signal;
 * the Kaiser, elbow and cumulative thresholds are tuned against it.
 */

import type { StructFacts } from '../types/facts.js';
import type { FieldClusterResult } from '../types/metrics.js';
import type { FieldClusteringSettings } from '../config/schema.js';

type Matrix = number[][];

export function buildUsageMatrix(
  struct: StructFacts
): { matrix: Matrix; methodNames: string[] } {
  const methods = struct.methods.filter(m => !m.isUtility);
  return {
    matrix: methods.map(m => struct.fields.map(field => m.fieldUsage[field] ?? 0)),
    methodNames: methods.map(m => m.qualifiedName),
  };
}

export function centerColumns(matrix: Matrix): Matrix {
  const rows = matrix.length;
  if (rows === 0) return [];
  const cols = matrix[0]?.length ?? 0;

  const means = new Array<number>(cols).fill(0);
  for (const row of matrix) {
    for (let j = 0; j < cols; j++) {
      means[j] = (means[j] ?? 0) + (row[j] ?? 0);
    }
  }
  for (let j = 0; j < cols; j++) {
    means[j] = (means[j] ?? 0) / rows;
  }

  return matrix.map(row => row.map((value, j) => value - (means[j] ?? 0)));
}

/**
 * Sample covariance of the columns of an already centered matrix
 */
export function covarianceMatrix(centered: Matrix): Matrix {
  const rows = centered.length;
  if (rows < 2) return [];
  const cols = centered[0]?.length ?? 0;

  const cov: Matrix = Array.from({ length: cols }, () => new Array<number>(cols).fill(0));
  for (let i = 0; i < cols; i++) {
    for (let j = i; j < cols; j++) {
      let sum = 0;
      for (const row of centered) {
        sum += (row[i] ?? 0) * (row[j] ?? 0);
      }
      const value = sum / (rows - 1);
      setCell(cov, i, j, value);
      setCell(cov, j, i, value);
    }
  }
  return cov;
}

function setCell(matrix: Matrix, i: number, j: number, value: number): void {
  const row = matrix[i];
  if (row) row[j] = value;
}

function multiply(matrix: Matrix, vector: number[]): number[] {
  return matrix.map(row => row.reduce((sum, value, j) => sum + value * (vector[j] ?? 0), 0));
}

function dot(a: number[], b: number[]): number {
  return a.reduce((sum, value, i) => sum + value * (b[i] ?? 0), 0);
}

/**
 * Dominant eigenvalue magnitude by power iteration from the uniform unit
 * vector, estimated with the Rayleigh quotient.
 */
export function powerIteration(matrix: Matrix, iterations: number): number {
  const n = matrix.length;
  if (n === 0) return 0;

  let v = new Array<number>(n).fill(1 / Math.sqrt(n));
  let eigenvalue = 0;

  for (let iter = 0; iter < iterations; iter++) {
    const next = multiply(matrix, v);

    const denominator = dot(v, v);
    if (denominator > 0) {
      eigenvalue = dot(next, v) / denominator;
    }

    const norm = Math.sqrt(dot(next, next));
    if (norm < 1e-10) break;

    v = next.map(value => value / norm);
  }

  return Math.abs(eigenvalue);
}

export function topEigenvalues(covariance: Matrix, settings: FieldClusteringSettings): number[] {
  const k = Math.min(settings.maxComponents, covariance.length);
  const work = covariance.map(row => [...row]);
  const eigenvalues: number[] = [];

  for (let i = 0; i < k; i++) {
    const eigenvalue = powerIteration(work, settings.powerIterations);
    if (eigenvalue <= settings.eigenvalueFloor) break;

    eigenvalues.push(eigenvalue);

    for (let d = 0; d < work.length; d++) {
      const row = work[d];
      if (row) row[d] = (row[d] ?? 0) - eigenvalue * settings.deflationFactor;
    }
  }

  return eigenvalues;
}

export function explainedVarianceRatios(eigenvalues: number[]): number[] {
  const total = eigenvalues.reduce((sum, ev) => (ev > 0 ? sum + ev : sum), 0);
  return eigenvalues.map(ev => (total > 0 ? ev / total : 0));
}

/**
 * Combine the Kaiser criterion, the elbow and the cumulative-variance cap
 * into one cluster count in [1, maxClusters].
 */
export function estimateClusterCount(
  eigenvalues: number[],
  explainedVariance: number[],
  settings: FieldClusteringSettings
): number {
  if (eigenvalues.length === 0) return 1;

  const kaiser = eigenvalues.filter(ev => ev > settings.kaiserThreshold).length;

  // The final component is never examined on its own
  let elbow = 1;
  for (let i = 0; i < explainedVariance.length - 1; i++) {
    if ((explainedVariance[i] ?? 0) > settings.elbowThreshold) {
      elbow = i + 1;
    } else {
      break;
    }
  }

  let cumulative = 0;
  let varianceCap = 0;
  for (let i = 0; i < explainedVariance.length; i++) {
    cumulative += explainedVariance[i] ?? 0;
    varianceCap = i + 1;
    if (cumulative >= settings.cumulativeVarianceTarget) break;
  }

  let estimate = Math.max(kaiser, elbow);
  estimate = Math.min(estimate, varianceCap);
  return Math.min(Math.max(estimate, 1), settings.maxClusters);
}

function separationStrength(explainedVariance: number[]): 'strong' | 'moderate' | 'weak' {
  const leading = explainedVariance[0];
  if (leading === undefined) return 'moderate';
  if (leading > 0.5) return 'strong';
  if (leading < 0.3) return 'weak';
  return 'moderate';
}

export function generateRecommendation(
  clusters: number,
  methodCount: number,
  fieldCount: number,
  explainedVariance: number[]
): string {
  if (clusters === 1) {
    return `Analysis suggests a single cohesive responsibility. `
      + `The ${methodCount} methods work together on ${fieldCount} fields in a unified way. `
      + `This is a good sign of high cohesion.`;
  }

  const shares = explainedVariance
    .slice(0, clusters)
    .sort((a, b) => b - a)
    .map(v => `${(v * 100).toFixed(1)}%`)
    .join(', ');

  return `Analysis detects ${clusters} distinct responsibility clusters (variance explained: ${shares}). `
    + `The primary cluster shows ${separationStrength(explainedVariance)} separation. `
    + `Consider splitting this class into ${clusters} smaller, focused classes, `
    + `each handling one specific responsibility. `
    + `Group methods and fields based on which cluster they belong to.`;
}

/**
 * Run the analysis for one struct. Returns null when there is too little
 * data: fewer than `minFields` fields or `minMethods` non-utility methods.
 */
export function analyzeFieldClustering(
  struct: StructFacts,
  settings: FieldClusteringSettings
): FieldClusterResult | null {
  if (struct.fields.length < settings.minFields) {
    return null;
  }

  const { matrix, methodNames } = buildUsageMatrix(struct);
  if (matrix.length < settings.minMethods) {
    return null;
  }

  const covariance = covarianceMatrix(centerColumns(matrix));
  const eigenvalues = topEigenvalues(covariance, settings);
  const explainedVariance = explainedVarianceRatios(eigenvalues);
  const estimatedClusters = estimateClusterCount(eigenvalues, explainedVariance, settings);

  return {
    matrix,
    methodNames,
    fieldNames: [...struct.fields],
    estimatedClusters,
    explainedVariance,
    hasMultipleResponsibilities: estimatedClusters >= 2,
    recommendationText: generateRecommendation(
      estimatedClusters,
      methodNames.length,
      struct.fields.length,
      explainedVariance
    ),
  };
}
