import { describe, it, expect } from 'vitest';
import {
  analyzeFieldClustering,
  buildUsageMatrix,
  centerColumns,
  covarianceMatrix,
  estimateClusterCount,
  explainedVarianceRatios,
  generateRecommendation,
  powerIteration,
  topEigenvalues,
} from '../../../src/analyzer/field-clustering.js';
import { fieldClusteringSchema } from '../../../src/config/schema.js';
import type { FieldUsageWeight } from '../../../src/types/facts.js';
import { method, struct } from '../../helpers/facts.js';

const settings = fieldClusteringSchema.parse({});

/**
 * A struct whose method i uses field j with weight rows[i][j]
 */
function structFromMatrix(name: string, fields: string[], rows: FieldUsageWeight[][]) {
  return struct(name, fields, rows.map((row, i) => {
    const fieldUsage: Record<string, FieldUsageWeight> = {};
    row.forEach((weight, j) => {
      const field = fields[j];
      if (field !== undefined && weight > 0) fieldUsage[field] = weight;
    });
    return method(name, `m${i + 1}`, { fieldUsage });
  }));
}

describe('buildUsageMatrix', () => {
  it('should build one row per non-utility method in field order', () => {
    const result = buildUsageMatrix(struct('Cache', ['store', 'hits', 'misses'], [
      method('Cache', 'get', { fieldUsage: { store: 1, hits: 3 } }),
      method('Cache', 'testReset', { isUtility: true, fieldUsage: { store: 2 } }),
      method('Cache', 'miss', { fieldUsage: { misses: 3 } }),
    ]));

    expect(result.methodNames).toEqual(['Cache.get', 'Cache.miss']);
    expect(result.matrix).toEqual([[1, 3, 0], [0, 0, 3]]);
  });
});

describe('centerColumns', () => {
  it('should subtract each column mean', () => {
    expect(centerColumns([[1, 2], [3, 4]])).toEqual([[-1, -1], [1, 1]]);
  });

  it('should return an empty matrix for no rows', () => {
    expect(centerColumns([])).toEqual([]);
  });
});

describe('covarianceMatrix', () => {
  it('should divide by rows minus one', () => {
    expect(covarianceMatrix([[-1, -1], [1, 1]])).toEqual([[2, 2], [2, 2]]);
  });

  it('should be empty with fewer than two rows', () => {
    expect(covarianceMatrix([[0, 0]])).toEqual([]);
  });
});

describe('powerIteration', () => {
  it('should converge to the dominant eigenvalue', () => {
    expect(powerIteration([[2, 0], [0, 1]], 100)).toBeCloseTo(2, 6);
  });

  it('should return 0 for a zero matrix and for no matrix', () => {
    expect(powerIteration([[0, 0], [0, 0]], 100)).toBe(0);
    expect(powerIteration([], 100)).toBe(0);
  });
});

describe('topEigenvalues', () => {
  it('should stop at the first eigenvalue at or below the floor', () => {
    expect(topEigenvalues([[0, 0], [0, 0]], settings)).toEqual([]);
  });

  it('should take at most maxComponents values', () => {
    const eigenvalues = topEigenvalues([[3, 1, 0], [1, 3, 0], [0, 0, 3]], {
      ...settings,
      maxComponents: 1,
    });

    expect(eigenvalues).toHaveLength(1);
  });
});

describe('explainedVarianceRatios', () => {
  it('should divide each eigenvalue by the positive total', () => {
    expect(explainedVarianceRatios([3, 1.5, 0.5])).toEqual([0.6, 0.3, 0.1]);
  });

  it('should be all zeros when the total is zero', () => {
    expect(explainedVarianceRatios([0, 0])).toEqual([0, 0]);
  });
});

describe('estimateClusterCount', () => {
  it('should be 1 without eigenvalues', () => {
    expect(estimateClusterCount([], [], settings)).toBe(1);
  });

  it('should combine Kaiser, elbow and cumulative variance', () => {
    // Kaiser: 2 above 1.0; elbow: 2; 80% reached after 2 components
    expect(estimateClusterCount([3, 1.5, 0.5], [0.6, 0.3, 0.1], settings)).toBe(2);
  });

  it('should cap the estimate at the cumulative variance target', () => {
    expect(estimateClusterCount([4, 3, 2], [0.85, 0.1, 0.05], settings)).toBe(1);
  });

  it('should never exceed maxClusters', () => {
    expect(estimateClusterCount([3, 2, 2], [0.4, 0.3, 0.3], { ...settings, maxClusters: 2 })).toBe(2);
  });
});

describe('generateRecommendation', () => {
  it('should describe a single cohesive responsibility', () => {
    expect(generateRecommendation(1, 4, 3, [0.7])).toBe(
      'Analysis suggests a single cohesive responsibility. '
      + 'The 4 methods work together on 3 fields in a unified way. '
      + 'This is a good sign of high cohesion.'
    );
  });

  it('should list sorted variance shares and the separation strength', () => {
    expect(generateRecommendation(2, 5, 4, [0.25, 0.55, 0.2])).toBe(
      'Analysis detects 2 distinct responsibility clusters (variance explained: 55.0%, 25.0%). '
      + 'The primary cluster shows weak separation. '
      + 'Consider splitting this class into 2 smaller, focused classes, each handling one specific responsibility. '
      + 'Group methods and fields based on which cluster they belong to.'
    );
  });
});

describe('analyzeFieldClustering', () => {
  it('should return null with too few fields', () => {
    const result = analyzeFieldClustering(structFromMatrix('Small', ['a', 'b'], [[1, 0], [0, 1]]), settings);

    expect(result).toBeNull();
  });

  it('should return null with too few non-utility methods', () => {
    const result = analyzeFieldClustering(struct('Lonely', ['a', 'b', 'c'], [
      method('Lonely', 'use', { fieldUsage: { a: 1 } }),
      method('Lonely', 'isReady', { isUtility: true }),
    ]), settings);

    expect(result).toBeNull();
  });

  it('should estimate three responsibilities for three weakly related usage patterns', () => {
    const result = analyzeFieldClustering(
      structFromMatrix('Mixer', ['a', 'b', 'c'], [[3, 1, 0], [1, 3, 0], [0, 0, 3]]),
      settings
    );

    expect(result?.estimatedClusters).toBe(3);
    expect(result?.hasMultipleResponsibilities).toBe(true);
    expect(result?.methodNames).toEqual(['Mixer.m1', 'Mixer.m2', 'Mixer.m3']);
    expect(result?.fieldNames).toEqual(['a', 'b', 'c']);
    expect(result?.explainedVariance).toHaveLength(3);
    expect(result?.explainedVariance[0]).toBeCloseTo(0.4503, 4);
    expect(result?.explainedVariance[1]).toBeCloseTo(0.2163, 4);
    expect(result?.explainedVariance[2]).toBeCloseTo(0.3333, 4);
    expect(result?.recommendationText).toBe(
      'Analysis detects 3 distinct responsibility clusters (variance explained: 45.0%, 33.3%, 21.6%). '
      + 'The primary cluster shows moderate separation. '
      + 'Consider splitting this class into 3 smaller, focused classes, each handling one specific responsibility. '
      + 'Group methods and fields based on which cluster they belong to.'
    );
  });

  it('should report a single responsibility for nested usage', () => {
    const result = analyzeFieldClustering(
      structFromMatrix('Nested', ['a', 'b', 'c'], [[1, 0, 0], [1, 1, 0], [1, 1, 1]]),
      settings
    );

    expect(result?.estimatedClusters).toBe(1);
    expect(result?.hasMultipleResponsibilities).toBe(false);
    expect(result?.matrix).toEqual([[1, 0, 0], [1, 1, 0], [1, 1, 1]]);
  });

  it('should report a single responsibility when every method uses every field alike', () => {
    const result = analyzeFieldClustering(
      structFromMatrix('Uniform', ['a', 'b', 'c'], [[1, 1, 1], [1, 1, 1], [1, 1, 1]]),
      settings
    );

    expect(result?.explainedVariance).toEqual([]);
    expect(result?.estimatedClusters).toBe(1);
    expect(result?.recommendationText).toBe(
      'Analysis suggests a single cohesive responsibility. '
      + 'The 3 methods work together on 3 fields in a unified way. '
      + 'This is a good sign of high cohesion.'
    );
  });
});
