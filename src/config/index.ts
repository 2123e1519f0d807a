/**
 * Config module exports
 */

export {
  configSchema,
  analysisSettingsSchema,
  utilityHeuristicSchema,
  methodClusteringSchema,
  fieldClusteringSchema,
  diagnosticsThresholdsSchema,
  reportConfigSchema,
  type Config,
  type AnalysisSettings,
  type UtilityHeuristic,
  type MethodClusteringSettings,
  type FieldClusteringSettings,
  type DiagnosticsThresholds,
  type ReportConfig,
} from './schema.js';

export {
  loadConfig,
  getDefaultConfig,
  getAnalysisSettings,
  findConfig,
  loadConfigOrDefault,
} from './loader.js';
