/**
 * TypeScript/JavaScript fact parser using ts-morph
 */

import {
  Project,
  SourceFile,
  ClassDeclaration,
  MethodDeclaration,
  SyntaxKind,
  Node,
  Scope,
} from 'ts-morph';

import type {
  DecisionPoints,
  FieldUsageWeight,
  FunctionFacts,
  MethodFacts,
  StructFacts,
} from '../../types/facts.js';
import { FIELD_READ, FIELD_WRITE, emptyDecisionPoints } from '../../types/facts.js';
import { isUtilityMethod } from '../../analyzer/heuristics.js';
import {
  FactParser,
  type ParseContext,
  type ParseError,
  type ParsedFile,
  type ParserOptions,
} from './base.js';

const LOOP_KINDS = new Set([
  SyntaxKind.ForStatement,
  SyntaxKind.ForInStatement,
  SyntaxKind.ForOfStatement,
  SyntaxKind.WhileStatement,
  SyntaxKind.DoStatement,
]);

const COMPOUND_ASSIGNMENT_KINDS = new Set([
  SyntaxKind.PlusEqualsToken,
  SyntaxKind.MinusEqualsToken,
  SyntaxKind.AsteriskEqualsToken,
  SyntaxKind.AsteriskAsteriskEqualsToken,
  SyntaxKind.SlashEqualsToken,
  SyntaxKind.PercentEqualsToken,
  SyntaxKind.LessThanLessThanEqualsToken,
  SyntaxKind.GreaterThanGreaterThanEqualsToken,
  SyntaxKind.GreaterThanGreaterThanGreaterThanEqualsToken,
  SyntaxKind.AmpersandEqualsToken,
  SyntaxKind.BarEqualsToken,
  SyntaxKind.CaretEqualsToken,
  SyntaxKind.BarBarEqualsToken,
  SyntaxKind.AmpersandAmpersandEqualsToken,
  SyntaxKind.QuestionQuestionEqualsToken,
]);

/**
 * Function-like bodies in which `this` no longer refers to the enclosing instance
 */
function rebindsThis(node: Node): boolean {
  return Node.isFunctionDeclaration(node)
    || Node.isFunctionExpression(node)
    || Node.isClassDeclaration(node)
    || Node.isClassExpression(node)
    || Node.isMethodDeclaration(node)
    || Node.isGetAccessorDeclaration(node)
    || Node.isSetAccessorDeclaration(node);
}

function isThisAccess(node: Node): boolean {
  return Node.isPropertyAccessExpression(node)
    && node.getExpression().getKind() === SyntaxKind.ThisKeyword;
}

/**
 * How a `this.field` access uses the field
 */
function accessWeight(access: Node): number {
  const parent = access.getParent();
  if (!parent) return FIELD_READ;

  if (Node.isBinaryExpression(parent) && parent.getLeft() === access) {
    const operator = parent.getOperatorToken().getKind();
    if (operator === SyntaxKind.EqualsToken) return FIELD_WRITE;
    if (COMPOUND_ASSIGNMENT_KINDS.has(operator)) return FIELD_READ | FIELD_WRITE;
  }

  if (Node.isPrefixUnaryExpression(parent) || Node.isPostfixUnaryExpression(parent)) {
    const operator = parent.getOperatorToken();
    if (operator === SyntaxKind.PlusPlusToken || operator === SyntaxKind.MinusMinusToken) {
      return FIELD_READ | FIELD_WRITE;
    }
  }

  return FIELD_READ;
}

function toUsageWeight(value: number): FieldUsageWeight {
  switch (value) {
    case 1: return 1;
    case 2: return 2;
    case 3: return 3;
    default: return 0;
  }
}

/**
 * Whether an identifier is a name being referenced, rather than the member
 * name in `a.name` or the name of a declared property, method or accessor
 */
function isReferenceIdentifier(node: Node): boolean {
  const parent = node.getParent();
  if (!parent) return true;
  if (Node.isQualifiedName(parent)) return parent.getRight() !== node;
  if (
    Node.isPropertyAccessExpression(parent)
    || Node.isPropertyAssignment(parent)
    || Node.isPropertyDeclaration(parent)
    || Node.isPropertySignature(parent)
    || Node.isMethodDeclaration(parent)
    || Node.isMethodSignature(parent)
    || Node.isGetAccessorDeclaration(parent)
    || Node.isSetAccessorDeclaration(parent)
  ) {
    return parent.getNameNode() !== node;
  }
  return true;
}

interface BodyScan {
  decisionPoints: DecisionPoints;
  importedPackagesUsed: string[];
  callees: string[];
}

export class TypeScriptParser extends FactParser {
  private project: Project;

  constructor(options: ParserOptions = {}) {
    super(options);
    this.project = new Project({
      useInMemoryFileSystem: true,
      compilerOptions: {
        target: 99, // ESNext
        module: 99, // ESNext
        allowJs: true,
        checkJs: false,
        noLib: true,
        noEmit: true,
      },
    });
  }

  get extensions(): string[] {
    return ['ts', 'tsx', 'js', 'jsx', 'mts', 'cts', 'mjs', 'cjs'];
  }

  parseFile(filePath: string, content: string, context: ParseContext): ParsedFile {
    if (this.isFileTooLarge(content)) {
      return this.buildSkippedFile(filePath, content, this.createFileTooLargeWarning(content));
    }

    const sourceFile = this.project.createSourceFile(filePath, content, { overwrite: true });

    try {
      const errors = this.collectSyntaxErrors(sourceFile);
      if (errors.length > 0) {
        return this.buildSkippedFile(filePath, content, ...errors);
      }

      const importBindings = this.extractImportBindings(sourceFile, context);
      const structs: StructFacts[] = [];
      const functions: FunctionFacts[] = [];

      for (const classDecl of sourceFile.getClasses()) {
        const className = classDecl.getName();
        if (!className) continue;
        structs.push(this.extractStruct(classDecl, className, filePath));
        functions.push(...this.extractClassFunctions(classDecl, className, filePath, importBindings));
      }

      functions.push(...this.extractFunctions(sourceFile, filePath, importBindings));

      return {
        filePath,
        lineCount: this.countLines(content),
        structs,
        functions,
        imports: this.extractImports(sourceFile, context),
        errors: [],
      };
    } finally {
      this.project.removeSourceFile(sourceFile);
    }
  }

  private collectSyntaxErrors(sourceFile: SourceFile): ParseError[] {
    return this.project.getProgram().getSyntacticDiagnostics(sourceFile).map(diagnostic => {
      const text = diagnostic.getMessageText();
      return {
        message: typeof text === 'string' ? text : text.getMessageText(),
        line: diagnostic.getLineNumber(),
        severity: 'error' as const,
      };
    });
  }

  // ---------------------------------------------------------------------------
  // Structs
  // ---------------------------------------------------------------------------

  private extractStruct(classDecl: ClassDeclaration, className: string, filePath: string): StructFacts {
    const fields = this.extractFields(classDecl);
    const fieldSet = new Set(fields);

    const instanceMethods = classDecl.getMethods().filter(m => !m.isStatic() && m.getBody() !== undefined);
    const methodNames = new Set(instanceMethods.map(m => m.getName()));

    const methods: MethodFacts[] = [];
    const seen = new Set<string>();
    for (const method of instanceMethods) {
      const name = method.getName();
      if (seen.has(name)) continue;
      seen.add(name);
      methods.push(this.extractMethod(method, className, fieldSet, methodNames));
    }

    return { name: className, filePath, fields, methods };
  }

  /**
   * Instance properties and constructor parameter properties, in source order
   */
  private extractFields(classDecl: ClassDeclaration): string[] {
    const declared: Array<{ name: string; pos: number }> = [];

    for (const prop of classDecl.getProperties()) {
      if (prop.isStatic()) continue;
      declared.push({ name: prop.getName(), pos: prop.getStart() });
    }

    for (const ctor of classDecl.getConstructors()) {
      for (const param of ctor.getParameters()) {
        if (param.isParameterProperty()) {
          declared.push({ name: param.getName(), pos: param.getStart() });
        }
      }
    }

    declared.sort((a, b) => a.pos - b.pos);
    return [...new Set(declared.map(d => d.name))];
  }

  private extractMethod(
    method: MethodDeclaration,
    className: string,
    fields: Set<string>,
    methodNames: Set<string>
  ): MethodFacts {
    const name = method.getName();
    const qualifiedName = `${className}.${name}`;
    const usage = new Map<string, number>();
    const calls: Record<string, number> = {};

    const body = method.getBody();
    body?.forEachDescendant((node, traversal) => {
      if (rebindsThis(node)) {
        traversal.skip();
        return;
      }
      if (!Node.isPropertyAccessExpression(node) || !isThisAccess(node)) return;

      const member = node.getName();
      const parent = node.getParent();
      const isCallee = parent !== undefined
        && Node.isCallExpression(parent)
        && parent.getExpression() === node;

      if (isCallee && methodNames.has(member)) {
        const callee = `${className}.${member}`;
        calls[callee] = (calls[callee] ?? 0) + 1;
      } else if (fields.has(member)) {
        usage.set(member, (usage.get(member) ?? 0) | accessWeight(node));
      }
    });

    const fieldUsage: Record<string, FieldUsageWeight> = {};
    for (const [field, weight] of usage) {
      fieldUsage[field] = toUsageWeight(weight);
    }

    return {
      qualifiedName,
      receiverBindingName: 'this',
      isPrivate: method.getScope() === Scope.Private || name.startsWith('#') || name.startsWith('_'),
      isUtility: isUtilityMethod(qualifiedName, this.options.utility),
      fieldUsage,
      calls,
    };
  }

  // ---------------------------------------------------------------------------
  // Functions
  // ---------------------------------------------------------------------------

  private extractClassFunctions(
    classDecl: ClassDeclaration,
    className: string,
    filePath: string,
    importBindings: Map<string, string>
  ): FunctionFacts[] {
    const functions: FunctionFacts[] = [];
    const seen = new Set<string>();

    for (const ctor of classDecl.getConstructors()) {
      const body = ctor.getBody();
      if (!body || seen.has('constructor')) continue;
      seen.add('constructor');
      functions.push(this.buildFunction(`${className}.constructor`, filePath, body, className, importBindings));
    }

    for (const method of classDecl.getMethods()) {
      const qualifiedName = `${className}.${method.getName()}`;
      if (seen.has(qualifiedName)) continue;
      seen.add(qualifiedName);
      functions.push(this.buildFunction(qualifiedName, filePath, method.getBody(), className, importBindings));
    }

    return functions;
  }

  private extractFunctions(
    sourceFile: SourceFile,
    filePath: string,
    importBindings: Map<string, string>
  ): FunctionFacts[] {
    const functions: FunctionFacts[] = [];
    const seen = new Set<string>();

    for (const func of sourceFile.getFunctions()) {
      const name = func.getName();
      if (!name || seen.has(name)) continue;
      seen.add(name);
      functions.push(this.buildFunction(name, filePath, func.getBody(), null, importBindings));
    }

    // Arrow functions and function expressions assigned to variables
    for (const varDecl of sourceFile.getVariableDeclarations()) {
      const initializer = varDecl.getInitializer();
      if (!initializer || !(Node.isArrowFunction(initializer) || Node.isFunctionExpression(initializer))) continue;

      const name = varDecl.getName();
      if (seen.has(name)) continue;
      seen.add(name);
      functions.push(this.buildFunction(name, filePath, initializer.getBody(), null, importBindings));
    }

    return functions;
  }

  private buildFunction(
    qualifiedName: string,
    filePath: string,
    body: Node | undefined,
    className: string | null,
    importBindings: Map<string, string>
  ): FunctionFacts {
    if (!body) {
      return {
        qualifiedName,
        filePath,
        hasBody: false,
        bodyLineCount: 0,
        decisionPoints: emptyDecisionPoints(),
        importedPackagesUsed: [],
        callees: [],
      };
    }

    const scan = this.scanBody(body, className, importBindings);
    return {
      qualifiedName,
      filePath,
      hasBody: true,
      bodyLineCount: Math.max(0, body.getEndLineNumber() - body.getStartLineNumber()),
      ...scan,
    };
  }

  private scanBody(body: Node, className: string | null, importBindings: Map<string, string>): BodyScan {
    const decisionPoints = emptyDecisionPoints();
    const used = new Set<string>();
    const callees: string[] = [];

    body.forEachDescendant(node => {
      const kind = node.getKind();

      if (kind === SyntaxKind.IfStatement) {
        decisionPoints.ifStatements++;
      } else if (LOOP_KINDS.has(kind)) {
        decisionPoints.loops++;
      } else if (kind === SyntaxKind.SwitchStatement) {
        decisionPoints.switches++;
      } else if (kind === SyntaxKind.CaseClause) {
        decisionPoints.caseClauses++;
      } else if (Node.isBinaryExpression(node)) {
        const operator = node.getOperatorToken().getKind();
        if (operator === SyntaxKind.AmpersandAmpersandToken || operator === SyntaxKind.BarBarToken) {
          decisionPoints.logicalOperators++;
        }
      } else if (Node.isCallExpression(node)) {
        callees.push(this.calleeName(node.getExpression(), className));
      } else if (Node.isIdentifier(node)) {
        const importPath = importBindings.get(node.getText());
        if (importPath !== undefined && isReferenceIdentifier(node)) {
          used.add(importPath);
        }
      }
    });

    return {
      decisionPoints,
      importedPackagesUsed: [...used].sort(),
      callees,
    };
  }

  /**
   * Syntactic callee name: `name`, `Class.method` for calls on `this`,
   * `a.b` for qualified calls
   */
  private calleeName(expression: Node, className: string | null): string {
    if (Node.isIdentifier(expression)) {
      return expression.getText();
    }
    if (Node.isPropertyAccessExpression(expression)) {
      const target = expression.getExpression();
      const member = expression.getName();
      if (target.getKind() === SyntaxKind.ThisKeyword && className) {
        return `${className}.${member}`;
      }
      if (Node.isIdentifier(target)) {
        return `${target.getText()}.${member}`;
      }
      return member;
    }
    return expression.getText();
  }

  // ---------------------------------------------------------------------------
  // Imports
  // ---------------------------------------------------------------------------

  /**
   * Local identifier -> import path, for every import-bound name in the file
   */
  private extractImportBindings(sourceFile: SourceFile, context: ParseContext): Map<string, string> {
    const bindings = new Map<string, string>();

    for (const importDecl of sourceFile.getImportDeclarations()) {
      const importPath = context.resolveImport(importDecl.getModuleSpecifierValue());
      if (importPath === null) continue;

      const defaultImport = importDecl.getDefaultImport();
      if (defaultImport) {
        bindings.set(defaultImport.getText(), importPath);
      }

      const namespaceImport = importDecl.getNamespaceImport();
      if (namespaceImport) {
        bindings.set(namespaceImport.getText(), importPath);
      }

      for (const named of importDecl.getNamedImports()) {
        const local = named.getAliasNode()?.getText() ?? named.getName();
        bindings.set(local, importPath);
      }
    }

    return bindings;
  }

  /**
   * Every package the file depends on: import declarations, re-exports,
   * `require('x')` and `import('x')` with a literal specifier
   */
  private extractImports(sourceFile: SourceFile, context: ParseContext): string[] {
    const sources: string[] = [];

    for (const importDecl of sourceFile.getImportDeclarations()) {
      sources.push(importDecl.getModuleSpecifierValue());
    }

    for (const exportDecl of sourceFile.getExportDeclarations()) {
      const source = exportDecl.getModuleSpecifierValue();
      if (source !== undefined) {
        sources.push(source);
      }
    }

    for (const call of sourceFile.getDescendantsOfKind(SyntaxKind.CallExpression)) {
      const expression = call.getExpression();
      const isRequire = Node.isIdentifier(expression) && expression.getText() === 'require';
      const isDynamicImport = expression.getKind() === SyntaxKind.ImportKeyword;
      if (!isRequire && !isDynamicImport) continue;

      const [arg] = call.getArguments();
      if (arg && Node.isStringLiteral(arg)) {
        sources.push(arg.getLiteralValue());
      }
    }

    const resolved = new Set<string>();
    for (const source of sources) {
      const importPath = context.resolveImport(source);
      if (importPath !== null) {
        resolved.add(importPath);
      }
    }
    return [...resolved].sort();
  }
}
