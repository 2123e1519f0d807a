/**
 * Metric and diagnostic result records produced by the analyzers
 */

export interface CohesionResult {
  structName: string;
  filePath: string;
  lcom4Score: number;
  components: string[][];
}

export interface MethodCluster {
  id: number;
  methods: string[];
  size: number;
  calledBy: string[];           // Public methods calling into the cluster
  responsibilityHint: string;
}

export interface MethodClusterResult {
  clusters: MethodCluster[];
  totalPrivateMethods: number;
  hasMultipleIslands: boolean;
}

export interface FieldClusterResult {
  matrix: number[][];
  methodNames: string[];
  fieldNames: string[];
  estimatedClusters: number;
  explainedVariance: number[];
  hasMultipleResponsibilities: boolean;
  recommendationText: string;
}

export interface StructResult extends CohesionResult {
  methodClusters: MethodClusterResult | null;
  fieldClusters: FieldClusterResult | null;
}

export interface ComplexityResult {
  funcName: string;
  filePath: string;
  complexity: number;
  loc: number;
  dependencies: string[];
  internalDeps: string[];
  externalDeps: string[];
  efferent: number;
  afferent: number;
  instability: number;
}

export interface CouplingResult {
  packageName: string;
  afferent: number;
  efferent: number;
  instability: number;
  dependencyDepth: number;
  inCycle: boolean;
}

export interface PackageResult {
  name: string;
  path: string;
  importPath: string;
  afferent: number;
  efferent: number;
  instability: number;
  dependencyDepth: number;
  inCycle: boolean;
  structs: StructResult[];
  functions: ComplexityResult[];
  totalLoc: number;
  avgFuncLoc: number;
  funcCount: number;
  fileCount: number;
}

export type FindingKind =
  | 'God Object'
  | 'Unstable Foundation'
  | 'Overly Complex Function'
  | 'Ambiguous Struct'
  | 'Split Responsibility (Method Islands)'
  | 'Split Responsibility (Field Clusters)';

export type Severity = 'Critical' | 'Warning';

export type EvidenceValue = string | number | boolean | string[] | number[] | MethodCluster[];

export interface Finding {
  kind: FindingKind;
  targetName: string;
  severity: Severity;
  message: string;
  evidence: Record<string, EvidenceValue>;
  relatedPath: string;
}

export interface AnalysisReport {
  findings: Finding[];
  packages: PackageResult[];
  totalLoc: number;
  skippedDirectories: string[];
}
