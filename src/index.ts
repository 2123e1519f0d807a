/**
 * code-health-lens: cohesion, complexity, coupling and responsibility
 * clustering metrics, combined into cross-metric findings.
 */

// Types
export * from './types/index.js';

// Analysis
export {
  analyzeProject,
  analyzePackage,
  analyzeStructs,
  calculateLcom4,
  calculateComplexity,
  calculateCoupling,
  analyzeMethodClustering,
  analyzeFieldClustering,
  performDiagnostics,
  InvariantViolationError,
  AnalysisAbortedError,
  type AnalyzeOptions,
} from './analyzer/index.js';

// Fact extraction
export {
  FactIndexer,
  ImportResolver,
  TypeScriptParser,
  FactParser,
  readModulePath,
  type IndexerConfig,
  type ExtractOptions,
  type ParsedFile,
  type ParserOptions,
} from './indexer/index.js';

// Fact storage
export { saveFacts, loadFacts, parseFacts, JsonFactStore, type FactStore } from './indexer/storage/index.js';

// Reports
export { writeJsonReport, serializeReport, formatSummary, type SummaryOptions } from './reporter/index.js';

// Config
export {
  configSchema,
  analysisSettingsSchema,
  loadConfig,
  getDefaultConfig,
  getAnalysisSettings,
  findConfig,
  loadConfigOrDefault,
  type Config,
  type AnalysisSettings,
} from './config/index.js';
