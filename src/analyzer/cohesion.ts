/**
 * LCOM4 cohesion: connected components of the method/field usage graph
 */

import type { StructFacts } from '../types/facts.js';
import type { CohesionResult } from '../types/metrics.js';
import { UnionFind } from './union-find.js';

/**
 * Compute LCOM4 for one struct.
 *
 * Every method and field is a node; a method is joined to every field it
 * reads or writes. A struct without methods scores 0 ("not applicable"),
 * which callers must not read as better than 1.
 */
export function calculateLcom4(struct: StructFacts): CohesionResult {
  if (struct.methods.length === 0) {
    return {
      structName: struct.name,
      filePath: struct.filePath,
      lcom4Score: 0,
      components: [],
    };
  }

  const uf = new UnionFind();

  for (const method of struct.methods) {
    uf.add(method.qualifiedName);
  }
  for (const field of struct.fields) {
    uf.add(field);
  }

  for (const method of struct.methods) {
    for (const [field, weight] of Object.entries(method.fieldUsage)) {
      if (weight >= 1 && uf.has(field)) {
        uf.union(method.qualifiedName, field);
      }
    }
  }

  const components = uf.components();

  return {
    structName: struct.name,
    filePath: struct.filePath,
    lcom4Score: components.length,
    components,
  };
}
