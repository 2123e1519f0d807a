/**
 * Union-find over string keys, with path compression and union by rank.
 * Shared by cohesion (methods + fields) and method clustering (call graph).
 */

import { InvariantViolationError } from './errors.js';

export class UnionFind {
  private parent = new Map<string, string>();
  private rank = new Map<string, number>();

  add(node: string): void {
    if (!this.parent.has(node)) {
      this.parent.set(node, node);
      this.rank.set(node, 0);
    }
  }

  has(node: string): boolean {
    return this.parent.has(node);
  }

  get size(): number {
    return this.parent.size;
  }

  find(node: string): string {
    const parent = this.parent.get(node);
    if (parent === undefined) {
      throw new InvariantViolationError(`Union-find has no node '${node}'`);
    }
    if (parent === node) {
      return node;
    }
    const root = this.find(parent);
    this.parent.set(node, root);
    return root;
  }

  union(a: string, b: string): void {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) return;

    const rankA = this.rank.get(rootA) ?? 0;
    const rankB = this.rank.get(rootB) ?? 0;

    if (rankA < rankB) {
      this.parent.set(rootA, rootB);
    } else if (rankA > rankB) {
      this.parent.set(rootB, rootA);
    } else {
      this.parent.set(rootB, rootA);
      this.rank.set(rootA, rankA + 1);
    }
  }

  /**
   * Connected components. Components appear in the order their first member
   * was added; members keep insertion order.
   */
  components(): string[][] {
    const byRoot = new Map<string, string[]>();

    for (const node of this.parent.keys()) {
      const root = this.find(node);
      const members = byRoot.get(root);
      if (members) {
        members.push(node);
      } else {
        byRoot.set(root, [node]);
      }
    }

    return Array.from(byRoot.values());
  }
}
