/**
 * Fact model: structural facts extracted from a project's source, consumed by
 * every analyzer. Facts are built once per run and never mutated afterwards.
 */

/**
 * How a method touches a field: 0 unused, 1 read only, 2 write only, 3 both.
 * Read and write are bit flags, so combining usages is a bitwise OR.
 */
export type FieldUsageWeight = 0 | 1 | 2 | 3;

export const FIELD_READ = 1;
export const FIELD_WRITE = 2;

export interface MethodFacts {
  qualifiedName: string;          // Struct.method
  receiverBindingName: string;    // Local name bound to the receiver ('this' for TypeScript)
  isPrivate: boolean;
  isUtility: boolean;
  fieldUsage: Record<string, FieldUsageWeight>;
  calls: Record<string, number>;  // Callee qualified name -> call-site frequency
}

export interface StructFacts {
  name: string;
  filePath: string;
  fields: string[];
  methods: MethodFacts[];
}

export interface DecisionPoints {
  ifStatements: number;
  loops: number;
  switches: number;
  caseClauses: number;      // Clauses with at least one match value
  selectCases: number;      // Non-empty select/communication cases
  logicalOperators: number; // && and || occurrences
}

export interface FunctionFacts {
  qualifiedName: string;
  filePath: string;
  hasBody: boolean;
  bodyLineCount: number;
  decisionPoints: DecisionPoints;
  importedPackagesUsed: string[];
  callees: string[];        // One entry per call expression in the body
}

export interface FileFacts {
  filePath: string;
  lineCount: number;
}

export interface PackageFacts {
  name: string;
  path: string;             // Project-relative, slash-normalized, '' for root
  importPath: string;
  structs: StructFacts[];
  functions: FunctionFacts[];
  imports: string[];
  files: FileFacts[];
}

export interface ProjectFacts {
  rootDirectory: string;
  modulePath: string;
  packages: PackageFacts[];
  skippedDirectories: string[];
}

export interface PackageDependency {
  importPath: string;
  imports: string[];
  importedBy: string[];
}

export function emptyDecisionPoints(): DecisionPoints {
  return {
    ifStatements: 0,
    loops: 0,
    switches: 0,
    caseClauses: 0,
    selectCases: 0,
    logicalOperators: 0,
  };
}
