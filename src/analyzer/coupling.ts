/**
 * Package dependency graph, coupling metrics and dependency depth
 */

import type { PackageDependency, PackageFacts } from '../types/facts.js';
import type { CouplingResult } from '../types/metrics.js';
import { instability, isInternalImport } from './complexity.js';

/**
 * Build the import graph, keyed by package import path. Edges to packages
 * outside the analyzed set are kept on `imports` but never appear as an
 * `importedBy` entry.
 */
export function buildDependencyGraph(packages: PackageFacts[]): Map<string, PackageDependency> {
  const graph = new Map<string, PackageDependency>();

  for (const pkg of packages) {
    graph.set(pkg.importPath, {
      importPath: pkg.importPath,
      imports: [],
      importedBy: [],
    });
  }

  for (const pkg of packages) {
    const node = graph.get(pkg.importPath);
    if (!node) continue;

    const imports = [...new Set(pkg.imports)].filter(imp => imp !== pkg.importPath).sort();
    node.imports = imports;

    for (const imp of imports) {
      graph.get(imp)?.importedBy.push(pkg.importPath);
    }
  }

  return graph;
}

function internalImports(dep: PackageDependency, modulePath: string): string[] {
  return dep.imports.filter(imp => isInternalImport(imp, modulePath));
}

/**
 * Longest chain of in-project imports per package.
 *
 * Memoized depth-first search. An edge back to a package still on the
 * active stack contributes 0 instead of recursing, so cycles under-count
 * rather than diverge. Packages are visited in sorted order, which keeps the
 * result stable on cyclic graphs.
 */
export function calculateDependencyDepth(
  graph: Map<string, PackageDependency>,
  modulePath: string
): Map<string, number> {
  const depths = new Map<string, number>();
  const onStack = new Set<string>();

  const visit = (importPath: string): number => {
    const memo = depths.get(importPath);
    if (memo !== undefined) return memo;

    const node = graph.get(importPath);
    if (!node) return 0;

    onStack.add(importPath);
    let depth = 0;
    for (const imp of internalImports(node, modulePath)) {
      if (!graph.has(imp) || onStack.has(imp)) continue;
      depth = Math.max(depth, 1 + visit(imp));
    }
    onStack.delete(importPath);

    depths.set(importPath, depth);
    return depth;
  };

  for (const importPath of [...graph.keys()].sort()) {
    visit(importPath);
  }

  return depths;
}

/**
 * Packages that sit on at least one in-project import cycle (Tarjan's
 * strongly connected components; a self-import never reaches the graph).
 */
export function findCyclicPackages(
  graph: Map<string, PackageDependency>,
  modulePath: string
): Set<string> {
  const index = new Map<string, number>();
  const lowLink = new Map<string, number>();
  const stack: string[] = [];
  const onStack = new Set<string>();
  const cyclic = new Set<string>();
  let counter = 0;

  const strongConnect = (v: string): void => {
    index.set(v, counter);
    lowLink.set(v, counter);
    counter++;
    stack.push(v);
    onStack.add(v);

    const node = graph.get(v);
    for (const w of node ? internalImports(node, modulePath) : []) {
      if (!graph.has(w)) continue;
      if (!index.has(w)) {
        strongConnect(w);
        lowLink.set(v, Math.min(lowLink.get(v) ?? 0, lowLink.get(w) ?? 0));
      } else if (onStack.has(w)) {
        lowLink.set(v, Math.min(lowLink.get(v) ?? 0, index.get(w) ?? 0));
      }
    }

    if (lowLink.get(v) === index.get(v)) {
      const component: string[] = [];
      let w: string | undefined;
      do {
        w = stack.pop();
        if (w === undefined) break;
        onStack.delete(w);
        component.push(w);
      } while (w !== v);

      if (component.length > 1) {
        for (const member of component) cyclic.add(member);
      }
    }
  };

  for (const v of [...graph.keys()].sort()) {
    if (!index.has(v)) strongConnect(v);
  }

  return cyclic;
}

/**
 * Afferent/efferent coupling, instability and depth for every package,
 * keyed by import path.
 */
export function calculateCoupling(
  packages: PackageFacts[],
  modulePath: string
): Map<string, CouplingResult> {
  const graph = buildDependencyGraph(packages);
  const depths = calculateDependencyDepth(graph, modulePath);
  const cyclic = findCyclicPackages(graph, modulePath);
  const results = new Map<string, CouplingResult>();

  for (const pkg of packages) {
    const node = graph.get(pkg.importPath);
    const afferent = node ? node.importedBy.filter(imp => isInternalImport(imp, modulePath)).length : 0;
    const efferent = node ? internalImports(node, modulePath).length : 0;

    results.set(pkg.importPath, {
      packageName: pkg.name,
      afferent,
      efferent,
      instability: instability(afferent, efferent),
      dependencyDepth: depths.get(pkg.importPath) ?? 0,
      inCycle: cyclic.has(pkg.importPath),
    });
  }

  return results;
}
