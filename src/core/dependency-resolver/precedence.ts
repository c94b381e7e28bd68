import type { DependencyRecord } from './types.js';

/**
 * Collapse duplicate records and order them causally.
 *
 * An object reachable through several paths keeps the occurrence with the
 * greatest tier (the longest path carries the strongest ordering constraint;
 * the first occurrence wins on equal tiers). Survivors are sorted by ascending
 * tier, ties keeping the order in which each identity first appeared.
 */
export function resolvePrecedence(records: readonly DependencyRecord[]): DependencyRecord[] {
  const strongest = new Map<string, { record: DependencyRecord; firstSeen: number }>();

  records.forEach((record, index) => {
    const key = record.dependentIdentity.key;
    const existing = strongest.get(key);
    if (!existing) {
      strongest.set(key, { record, firstSeen: index });
    } else if (record.tier > existing.record.tier) {
      existing.record = record;
    }
  });

  return Array.from(strongest.values())
    .sort((a, b) => a.record.tier - b.record.tier || a.firstSeen - b.firstSeen)
    .map(entry => entry.record);
}
