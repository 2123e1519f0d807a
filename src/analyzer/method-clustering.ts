/**
 * Method responsibility clustering: islands of private methods that never
 * call each other.
 */

import type { MethodFacts, StructFacts } from '../types/facts.js';
import type { MethodCluster, MethodClusterResult } from '../types/metrics.js';
import type { MethodClusteringSettings } from '../config/schema.js';
import { UnionFind } from './union-find.js';
import { InvariantViolationError } from './errors.js';
import { bareName, splitCamelCase } from './heuristics.js';

/**
 * Minimum size a cluster needs to survive filtering
 */
export function minimumClusterSize(totalMethods: number, settings: MethodClusteringSettings): number {
  return Math.max(settings.minClusterSize, Math.round(totalMethods * settings.minClusterRatio));
}

/**
 * Undirected call graph between private, non-utility methods. Utility
 * methods are left out entirely: they are called from everywhere and would
 * merge unrelated clusters.
 */
export function buildPrivateCallGraph(
  methods: MethodFacts[],
  settings: MethodClusteringSettings
): Map<string, Set<string>> {
  const nodes = new Map<string, MethodFacts>();
  for (const method of methods) {
    if (method.isPrivate && !method.isUtility) {
      nodes.set(method.qualifiedName, method);
    }
  }

  const graph = new Map<string, Set<string>>();
  for (const name of nodes.keys()) {
    graph.set(name, new Set());
  }

  for (const [caller, method] of nodes) {
    for (const [callee, frequency] of Object.entries(method.calls)) {
      if (callee === caller || !nodes.has(callee)) continue;
      if (frequency < settings.minCallFrequency) continue;
      graph.get(caller)?.add(callee);
      graph.get(callee)?.add(caller);
    }
  }

  return graph;
}

/**
 * Label a cluster by the most frequent non-trivial word in its method names.
 * Ties go to the lexicographically smallest word.
 */
export function suggestResponsibility(methodNames: string[], stopWords: string[]): string {
  if (methodNames.length === 0) {
    return 'Unknown';
  }

  const ignored = new Set(stopWords.map(w => w.toLowerCase()));
  const keywords = new Map<string, number>();

  for (const name of methodNames) {
    for (const word of splitCamelCase(bareName(name))) {
      const lower = word.toLowerCase();
      if (ignored.has(lower)) continue;
      keywords.set(lower, (keywords.get(lower) ?? 0) + 1);
    }
  }

  let best = '';
  let bestCount = 0;
  for (const [word, count] of keywords) {
    if (count > bestCount || (count === bestCount && word < best)) {
      best = word;
      bestCount = count;
    }
  }

  if (!best) {
    return 'Mixed operations';
  }
  return `${best.charAt(0).toUpperCase()}${best.slice(1)}-related operations`;
}

function findPublicCallers(members: string[], methods: MethodFacts[]): string[] {
  const memberSet = new Set(members);
  const callers = new Set<string>();

  for (const method of methods) {
    if (method.isPrivate) continue;
    if (Object.keys(method.calls).some(callee => memberSet.has(callee))) {
      callers.add(method.qualifiedName);
    }
  }

  return [...callers].sort();
}

function compareClusters(a: string[], b: string[]): number {
  if (a.length !== b.length) return b.length - a.length;
  const firstA = a[0] ?? '';
  const firstB = b[0] ?? '';
  return firstA < firstB ? -1 : firstA > firstB ? 1 : 0;
}

/**
 * Cluster a struct's private methods by their call graph. Returns null when
 * the struct has no methods or no private methods.
 */
export function analyzeMethodClustering(
  struct: StructFacts,
  settings: MethodClusteringSettings
): MethodClusterResult | null {
  if (struct.methods.length === 0) {
    return null;
  }

  const privateMethods = struct.methods.filter(m => m.isPrivate);
  if (privateMethods.length === 0) {
    return null;
  }

  const graph = buildPrivateCallGraph(struct.methods, settings);
  const uf = new UnionFind();
  for (const name of graph.keys()) {
    uf.add(name);
  }
  for (const [caller, callees] of graph) {
    for (const callee of callees) {
      uf.union(caller, callee);
    }
  }

  const components = uf.components();
  const minSize = minimumClusterSize(uf.size, settings);
  const known = new Set(struct.methods.map(m => m.qualifiedName));

  const surviving = components
    .filter(component => component.length >= minSize || components.length === 1)
    .map(component => [...component].sort())
    .sort(compareClusters);

  const clusters: MethodCluster[] = surviving.map((members, i) => {
    for (const member of members) {
      if (!known.has(member)) {
        throw new InvariantViolationError(
          `Cluster member '${member}' is not a method of struct '${struct.name}'`
        );
      }
    }
    return {
      id: i + 1,
      methods: members,
      size: members.length,
      calledBy: findPublicCallers(members, struct.methods),
      responsibilityHint: suggestResponsibility(members, settings.stopWords),
    };
  });

  return {
    clusters,
    totalPrivateMethods: privateMethods.length,
    hasMultipleIslands: clusters.length >= 2,
  };
}
