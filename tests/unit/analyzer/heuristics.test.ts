import { describe, it, expect } from 'vitest';
import { bareName, isLowerCaseName, isUtilityMethod, splitCamelCase } from '../../../src/analyzer/heuristics.js';
import { utilityHeuristicSchema } from '../../../src/config/schema.js';

const heuristic = utilityHeuristicSchema.parse({});

describe('bareName', () => {
  it('should strip the struct prefix', () => {
    expect(bareName('Store.#flush')).toBe('#flush');
    expect(bareName('main')).toBe('main');
  });
});

describe('isLowerCaseName', () => {
  it('should look at the first character of the bare name', () => {
    expect(isLowerCaseName('Store.flush')).toBe(true);
    expect(isLowerCaseName('Store.Flush')).toBe(false);
    expect(isLowerCaseName('Store._flush')).toBe(false);
  });
});

describe('isUtilityMethod', () => {
  it('should match name patterns anywhere, ignoring case', () => {
    expect(isUtilityMethod('Repo.resetForTest', heuristic)).toBe(true);
    expect(isUtilityMethod('Repo.#mockClock', heuristic)).toBe(true);
    expect(isUtilityMethod('Repo.StringUtils', heuristic)).toBe(true);
  });

  it('should match accessor prefixes followed by an uppercase letter', () => {
    expect(isUtilityMethod('Repo.getName', heuristic)).toBe(true);
    expect(isUtilityMethod('Repo.IsReady', heuristic)).toBe(true);
    expect(isUtilityMethod('Repo._hasItems', heuristic)).toBe(true);
  });

  it('should not match accessor-like words', () => {
    expect(isUtilityMethod('Repo.settle', heuristic)).toBe(false);
    expect(isUtilityMethod('Repo.get', heuristic)).toBe(false);
    expect(isUtilityMethod('Repo.issue', heuristic)).toBe(false);
  });

  it('should follow configured patterns', () => {
    expect(isUtilityMethod('Repo.debugDump', { namePatterns: ['debug'], accessorPrefixes: [] })).toBe(true);
    expect(isUtilityMethod('Repo.getName', { namePatterns: [], accessorPrefixes: [] })).toBe(false);
  });
});

describe('splitCamelCase', () => {
  it('should split at uppercase letters and separators', () => {
    expect(splitCamelCase('loadUserRows')).toEqual(['load', 'User', 'Rows']);
    expect(splitCamelCase('#flush_queue')).toEqual(['flush', 'queue']);
    expect(splitCamelCase('')).toEqual([]);
  });
});
