/**
 * Name heuristics shared by the analyzers
 */

import type { UtilityHeuristic } from '../config/schema.js';

/**
 * Bare member name of a qualified name: 'Store.#flush' -> '#flush'
 */
export function bareName(qualifiedName: string): string {
  const dot = qualifiedName.lastIndexOf('.');
  return dot === -1 ? qualifiedName : qualifiedName.slice(dot + 1);
}

function isUpperCaseLetter(ch: string | undefined): boolean {
  return ch !== undefined && ch !== ch.toLowerCase() && ch === ch.toUpperCase();
}

function isLowerCaseLetter(ch: string | undefined): boolean {
  return ch !== undefined && ch !== ch.toUpperCase() && ch === ch.toLowerCase();
}

/**
 * Lexical-case privacy: the first letter of the bare name is lowercase.
 * Used for fact models that do not carry an explicit visibility.
 */
export function isLowerCaseName(qualifiedName: string): boolean {
  return isLowerCaseLetter(bareName(qualifiedName).charAt(0) || undefined);
}

/**
 * Whether a method is a utility (test/helper/accessor) that every other
 * method is assumed to call, and so says nothing about responsibilities.
 */
export function isUtilityMethod(qualifiedName: string, heuristic: UtilityHeuristic): boolean {
  const name = bareName(qualifiedName).replace(/^[#_]+/, '');
  const lower = name.toLowerCase();

  if (heuristic.namePatterns.some(pattern => lower.includes(pattern.toLowerCase()))) {
    return true;
  }

  // Accessor shape: Get*/Set*/Is*/Has* followed by an uppercase letter
  return heuristic.accessorPrefixes.some(prefix => {
    if (prefix.length === 0 || name.length <= prefix.length) return false;
    const head = name.slice(0, prefix.length);
    const sameFirst = head.charAt(0).toLowerCase() === prefix.charAt(0).toLowerCase();
    const sameRest = head.slice(1) === prefix.slice(1);
    return sameFirst && sameRest && isUpperCaseLetter(name.charAt(prefix.length));
  });
}

/**
 * Split an identifier into words at camel-case boundaries and underscores
 */
export function splitCamelCase(identifier: string): string[] {
  const words: string[] = [];
  let current = '';

  for (const ch of identifier) {
    if (ch === '_' || ch === '#' || ch === '$') {
      if (current) words.push(current);
      current = '';
      continue;
    }
    if (current && isUpperCaseLetter(ch)) {
      words.push(current);
      current = '';
    }
    current += ch;
  }

  if (current) words.push(current);
  return words;
}
