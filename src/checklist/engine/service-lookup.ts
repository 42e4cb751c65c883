/**
 * Service Dictionary Lookups
 *
 * Both lookups scan the dictionary in order and stop at the first entry whose
 * `names` list contains the alias (exact, case-sensitive). They search
 * independently of each other, so a caller can resolve the canonical name and
 * the resource type from the same raw alias.
 *
 * Pure functions — no I/O.
 */

import type { ServiceDictionary, ServiceDictionaryEntry } from '../types/index.js';

function findEntry(
  name: string,
  dictionary: ServiceDictionary,
): ServiceDictionaryEntry | undefined {
  return dictionary.find((entry) => entry.names.includes(name));
}

/**
 * Returns the canonical service name for an alias.
 * Falls back to the alias itself when nothing matches or no dictionary is given.
 */
export function lookupService(name: string, dictionary?: ServiceDictionary): string {
  if (!dictionary) return name;
  return findEntry(name, dictionary)?.service ?? name;
}

/**
 * Returns the ARM resource type of the first entry matching the alias.
 */
export function lookupResourceType(
  name: string,
  dictionary?: ServiceDictionary,
): string | undefined {
  if (!dictionary) return undefined;
  return findEntry(name, dictionary)?.arm;
}
