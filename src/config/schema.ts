/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

export const utilityHeuristicSchema = z.object({
  namePatterns: z.array(z.string()).default(['test', 'util', 'helper', 'mock', 'stub']),
  accessorPrefixes: z.array(z.string()).default(['Get', 'Set', 'Is', 'Has']),
});

export const methodClusteringSchema = z.object({
  minCallFrequency: z.number().int().min(1).default(1),
  minClusterSize: z.number().int().min(1).default(2),
  minClusterRatio: z.number().min(0).max(1).default(0.2),
  stopWords: z.array(z.string()).default(['get', 'set', 'is', 'has', 'do']),
});

export const fieldClusteringSchema = z.object({
  minFields: z.number().int().min(2).default(3),
  minMethods: z.number().int().min(2).default(2),
  maxComponents: z.number().int().min(1).default(5),
  powerIterations: z.number().int().min(1).default(100),
  eigenvalueFloor: z.number().min(0).default(1e-10),
  deflationFactor: z.number().min(0).max(1).default(0.5),
  kaiserThreshold: z.number().min(0).default(1.0),
  elbowThreshold: z.number().min(0).max(1).default(0.1),
  cumulativeVarianceTarget: z.number().min(0).max(1).default(0.8),
  maxClusters: z.number().int().min(1).default(5),
});

export const diagnosticsThresholdsSchema = z.object({
  godObjectLcom4: z.number().int().min(1).default(5),
  godObjectAfferent: z.number().int().min(0).default(10),
  unstableAfferent: z.number().int().min(0).default(10),
  unstableInstability: z.number().min(0).max(1).default(0.7),
  complexFunction: z.number().int().min(1).default(15),
  ambiguousLcom4: z.number().int().min(1).default(3),
  ambiguousMethodComplexity: z.number().int().min(1).default(10),
  fieldClusterCritical: z.number().int().min(2).default(3),
});

export const analysisSettingsSchema = z.object({
  utility: utilityHeuristicSchema.default({}),
  clustering: methodClusteringSchema.default({}),
  fieldClustering: fieldClusteringSchema.default({}),
  diagnostics: diagnosticsThresholdsSchema.default({}),
});

export const reportConfigSchema = z.object({
  format: z.enum(['json', 'text', 'both']).default('text'),
  output: z.string().default('code_health_report.json'),
});

export const configSchema = z.object({
  include: z.array(z.string()).default([
    '**/*.ts',
    '**/*.tsx',
    '**/*.mts',
    '**/*.cts',
    '**/*.js',
    '**/*.jsx',
  ]),
  exclude: z.array(z.string()).default([
    '**/node_modules/**',
    '**/dist/**',
    '**/build/**',
    '**/.git/**',
    '**/coverage/**',
    '**/vendor/**',
    '**/testdata/**',
    '**/*.d.ts',
    '**/*.test.*',
    '**/*.spec.*',
  ]),
  report: reportConfigSchema.default({}),
  analysis: analysisSettingsSchema.default({}),
});

export type Config = z.infer<typeof configSchema>;
export type AnalysisSettings = z.infer<typeof analysisSettingsSchema>;
export type UtilityHeuristic = z.infer<typeof utilityHeuristicSchema>;
export type MethodClusteringSettings = z.infer<typeof methodClusteringSchema>;
export type FieldClusteringSettings = z.infer<typeof fieldClusteringSchema>;
export type DiagnosticsThresholds = z.infer<typeof diagnosticsThresholdsSchema>;
export type ReportConfig = z.infer<typeof reportConfigSchema>;
