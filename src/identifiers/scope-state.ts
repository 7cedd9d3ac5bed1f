/**
 * Bookkeeping for one scope (a session or a pageview): its identifier, the next sequence number to
 * hand out, and the sequence number already assigned to each activity name.
 */
export interface ScopeState {
  id: string;
  generation: number;
  activities: Record<string, number>;
}

const ID_PATTERN = /^[0-9a-f]{32}$/;

function isSequenceNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1;
}

/** Type guard for state loaded from a store; anything partial or corrupted is rejected. */
export function isScopeState(value: unknown): value is ScopeState {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  if (!('id' in value) || !('generation' in value) || !('activities' in value)) {
    return false;
  }
  const { id, generation, activities } = value;
  if (typeof id !== 'string' || !ID_PATTERN.test(id) || !isSequenceNumber(generation)) {
    return false;
  }
  if (typeof activities !== 'object' || activities === null || Array.isArray(activities)) {
    return false;
  }
  return Object.values(activities).every(
    (sequenceNumber: unknown) => isSequenceNumber(sequenceNumber) && sequenceNumber < generation,
  );
}

// No prototype, so a name such as "__proto__" is stored as an ordinary key.
function activityTable(entries: Record<string, number> = {}): Record<string, number> {
  const table: Record<string, number> = Object.create(null);
  return Object.assign(table, entries);
}

export function newScopeState(id: string): ScopeState {
  return { id, generation: 1, activities: activityTable() };
}

export function cloneScopeState(state: ScopeState): ScopeState {
  return { ...state, activities: activityTable(state.activities) };
}
