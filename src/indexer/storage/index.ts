/**
 * Fact store interface and exports
 */

import type { UtilityHeuristic } from '../../config/schema.js';
import type { ProjectFacts } from '../../types/facts.js';
import { JsonFactStore } from './json.js';

export interface FactStore {
  save(filePath: string, facts: ProjectFacts): Promise<void>;
  load(filePath: string): Promise<ProjectFacts>;
}

export async function saveFacts(filePath: string, facts: ProjectFacts): Promise<void> {
  await new JsonFactStore().save(filePath, facts);
}

export async function loadFacts(filePath: string, heuristic?: UtilityHeuristic): Promise<ProjectFacts> {
  return new JsonFactStore(heuristic).load(filePath);
}

export { JsonFactStore, parseFacts, projectFactsSchema } from './json.js';
