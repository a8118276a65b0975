import { Player } from '../../domain/model/canonical.types';

/** Whether two candidates share their id or any (source, native id) pair. */
export function isSameCandidate(a: Player, b: Player): boolean {
  if (a.id === b.id) return true;
  return Object.entries(b.sourceIds).some(([source, nativeId]) => a.sourceIds[source] === nativeId);
}

/**
 * Add a candidate to a de-duplicated list. A candidate already present keeps
 * its fields; only source ids and hints it lacks are taken from the newcomer.
 * Returns a new list; neither input is modified.
 */
export function mergeCandidate(candidates: readonly Player[], incoming: Player): Player[] {
  const index = candidates.findIndex((existing) => isSameCandidate(existing, incoming));
  if (index === -1) return [...candidates, incoming];

  const existing = candidates[index];
  const merged: Player = {
    ...existing,
    sourceIds: { ...incoming.sourceIds, ...existing.sourceIds },
    disambiguationHints: { ...incoming.disambiguationHints, ...existing.disambiguationHints },
  };
  return candidates.map((candidate, position) => (position === index ? merged : candidate));
}
