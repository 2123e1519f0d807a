/**
 * JSON file storage for the fact model
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

import type { UtilityHeuristic } from '../../config/schema.js';
import { utilityHeuristicSchema } from '../../config/schema.js';
import { isLowerCaseName, isUtilityMethod } from '../../analyzer/heuristics.js';
import type { MethodFacts, PackageFacts, ProjectFacts, StructFacts } from '../../types/facts.js';
import type { FactStore } from './index.js';

const fieldUsageWeightSchema = z.union([z.literal(0), z.literal(1), z.literal(2), z.literal(3)]);

const methodFactsSchema = z.object({
  qualifiedName: z.string().min(1),
  receiverBindingName: z.string().default(''),
  isPrivate: z.boolean().optional(),
  isUtility: z.boolean().optional(),
  fieldUsage: z.record(fieldUsageWeightSchema).default({}),
  calls: z.record(z.number().int().min(1)).default({}),
});

const structFactsSchema = z.object({
  name: z.string().min(1),
  filePath: z.string().default(''),
  fields: z.array(z.string()).default([]),
  methods: z.array(methodFactsSchema).default([]),
});

const decisionPointsSchema = z.object({
  ifStatements: z.number().int().min(0).default(0),
  loops: z.number().int().min(0).default(0),
  switches: z.number().int().min(0).default(0),
  caseClauses: z.number().int().min(0).default(0),
  selectCases: z.number().int().min(0).default(0),
  logicalOperators: z.number().int().min(0).default(0),
});

const functionFactsSchema = z.object({
  qualifiedName: z.string().min(1),
  filePath: z.string().default(''),
  hasBody: z.boolean().default(true),
  bodyLineCount: z.number().int().default(0),
  decisionPoints: decisionPointsSchema.default({}),
  importedPackagesUsed: z.array(z.string()).default([]),
  callees: z.array(z.string()).default([]),
});

const packageFactsSchema = z.object({
  name: z.string().min(1),
  path: z.string().default(''),
  importPath: z.string().optional(),
  structs: z.array(structFactsSchema).default([]),
  functions: z.array(functionFactsSchema).default([]),
  imports: z.array(z.string()).default([]),
  files: z.array(z.object({
    filePath: z.string(),
    lineCount: z.number().int().min(0),
  })).default([]),
});

export const projectFactsSchema = z.object({
  rootDirectory: z.string().default(''),
  modulePath: z.string().min(1),
  packages: z.array(packageFactsSchema),
  skippedDirectories: z.array(z.string()).default([]),
});

type StoredProject = z.infer<typeof projectFactsSchema>;
type StoredPackage = StoredProject['packages'][number];
type StoredStruct = StoredPackage['structs'][number];

function formatIssues(error: z.ZodError): string {
  return error.errors.map(e => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
}

function toStruct(stored: StoredStruct, heuristic: UtilityHeuristic): StructFacts {
  return {
    ...stored,
    methods: stored.methods.map(method => ({
      ...method,
      isPrivate: method.isPrivate ?? isLowerCaseName(method.qualifiedName),
      isUtility: method.isUtility ?? isUtilityMethod(method.qualifiedName, heuristic),
    })),
  };
}

function toPackage(stored: StoredPackage, modulePath: string, heuristic: UtilityHeuristic): PackageFacts {
  return {
    ...stored,
    importPath: stored.importPath ?? (stored.path ? `${modulePath}/${stored.path}` : modulePath),
    structs: stored.structs.map(struct => toStruct(struct, heuristic)),
  };
}

type StoredMethod = Omit<MethodFacts, 'isUtility'>;

/**
 * Utility flags depend on configuration, so they are left out of stored facts
 * and decided again on load
 */
function withoutUtilityFlags(facts: ProjectFacts): unknown {
  return {
    ...facts,
    packages: facts.packages.map(pkg => ({
      ...pkg,
      structs: pkg.structs.map(struct => ({
        ...struct,
        methods: struct.methods.map((method): StoredMethod => ({
          qualifiedName: method.qualifiedName,
          receiverBindingName: method.receiverBindingName,
          isPrivate: method.isPrivate,
          fieldUsage: method.fieldUsage,
          calls: method.calls,
        })),
      })),
    })),
  };
}

/**
 * Validate a parsed facts document and fill what a front end may leave out:
 * privacy from name case, utility flags from the heuristic, import paths
 * from the module path.
 */
export function parseFacts(raw: unknown, heuristic: UtilityHeuristic = utilityHeuristicSchema.parse({})): ProjectFacts {
  const result = projectFactsSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid facts file:\n${formatIssues(result.error)}`);
  }

  const stored = result.data;
  return {
    rootDirectory: stored.rootDirectory,
    modulePath: stored.modulePath,
    packages: stored.packages
      .map(pkg => toPackage(pkg, stored.modulePath, heuristic))
      .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0)),
    skippedDirectories: stored.skippedDirectories,
  };
}

export class JsonFactStore implements FactStore {
  constructor(private heuristic: UtilityHeuristic = utilityHeuristicSchema.parse({})) {}

  async save(filePath: string, facts: ProjectFacts): Promise<void> {
    const absolutePath = path.resolve(filePath);
    await fs.promises.mkdir(path.dirname(absolutePath), { recursive: true });
    await fs.promises.writeFile(absolutePath, `${JSON.stringify(withoutUtilityFlags(facts), null, 2)}\n`, 'utf-8');
  }

  async load(filePath: string): Promise<ProjectFacts> {
    const absolutePath = path.resolve(filePath);

    if (!fs.existsSync(absolutePath)) {
      throw new Error(`Facts file not found: ${absolutePath}`);
    }

    const content = await fs.promises.readFile(absolutePath, 'utf-8');

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      throw new Error(`Invalid JSON in facts file: ${absolutePath}`);
    }

    return parseFacts(raw, this.heuristic);
  }
}
