import { describe, it, expect } from 'vitest';
import {
  configSchema,
  analysisSettingsSchema,
  fieldClusteringSchema,
  reportConfigSchema,
} from '../../../src/config/schema.js';

describe('Config Schema', () => {
  describe('configSchema', () => {
    it('should apply default values for empty object', () => {
      const result = configSchema.parse({});

      expect(result.include).toEqual(['**/*.ts', '**/*.tsx', '**/*.mts', '**/*.cts', '**/*.js', '**/*.jsx']);
      expect(result.exclude).toContain('**/testdata/**');
      expect(result.report.format).toBe('text');
      expect(result.analysis).toEqual(analysisSettingsSchema.parse({}));
    });

    it('should validate include patterns', () => {
      const valid = configSchema.safeParse({ include: ['**/*.ts', '**/*.js'] });
      expect(valid.success).toBe(true);
      expect(valid.data?.include).toEqual(['**/*.ts', '**/*.js']);

      const invalid = configSchema.safeParse({ include: 'src' });
      expect(invalid.success).toBe(false);
    });
  });

  describe('analysisSettingsSchema', () => {
    it('should carry the documented defaults', () => {
      const settings = analysisSettingsSchema.parse({});

      expect(settings.utility).toEqual({
        namePatterns: ['test', 'util', 'helper', 'mock', 'stub'],
        accessorPrefixes: ['Get', 'Set', 'Is', 'Has'],
      });
      expect(settings.clustering).toEqual({
        minCallFrequency: 1,
        minClusterSize: 2,
        minClusterRatio: 0.2,
        stopWords: ['get', 'set', 'is', 'has', 'do'],
      });
      expect(settings.diagnostics).toEqual({
        godObjectLcom4: 5,
        godObjectAfferent: 10,
        unstableAfferent: 10,
        unstableInstability: 0.7,
        complexFunction: 15,
        ambiguousLcom4: 3,
        ambiguousMethodComplexity: 10,
        fieldClusterCritical: 3,
      });
    });

    it('should reject a cluster ratio above 1', () => {
      const result = analysisSettingsSchema.safeParse({ clustering: { minClusterRatio: 1.5 } });

      expect(result.success).toBe(false);
    });
  });

  describe('fieldClusteringSchema', () => {
    it('should default the PCA parameters', () => {
      expect(fieldClusteringSchema.parse({})).toEqual({
        minFields: 3,
        minMethods: 2,
        maxComponents: 5,
        powerIterations: 100,
        eigenvalueFloor: 1e-10,
        deflationFactor: 0.5,
        kaiserThreshold: 1,
        elbowThreshold: 0.1,
        cumulativeVarianceTarget: 0.8,
        maxClusters: 5,
      });
    });

    it('should require whole numbers of iterations', () => {
      expect(fieldClusteringSchema.safeParse({ powerIterations: 2.5 }).success).toBe(false);
    });
  });

  describe('reportConfigSchema', () => {
    it('should accept only known formats', () => {
      expect(reportConfigSchema.safeParse({ format: 'both' }).success).toBe(true);
      expect(reportConfigSchema.safeParse({ format: 'html' }).success).toBe(false);
    });
  });
});
