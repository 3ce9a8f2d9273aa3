// ─── Encoder Events ──────────────────────────────────────────────────────────
//
// Tie-break ordering and token formatting for encoder events.
// ─────────────────────────────────────────────────────────────────────────────

import type { Event, EventRole } from "../types.js";

/**
 * Rank of each event role among events sharing a tick. Note events all
 * share one rank and keep their insertion order, so a note's Position
 * stays right before its Program / Pitch / Velocity / Duration.
 */
export const TIE_BREAK_RANK: Readonly<Record<EventRole, number>> = {
  "bar": 0,
  "time-signature": 1,
  "tempo-position": 2,
  "tempo": 3,
  "chord-position": 4,
  "chord": 5,
  "rest": 7,
  "note": 8,
};

/**
 * Stable sort by (tick, tie-break rank). Returns a new array.
 */
export function sortEvents(events: readonly Event[]): Event[] {
  return events
    .map((event, index) => ({ event, index }))
    .sort((a, b) =>
      a.event.tick - b.event.tick ||
      TIE_BREAK_RANK[a.event.role] - TIE_BREAK_RANK[b.event.role] ||
      a.index - b.index,
    )
    .map(({ event }) => event);
}

/** Wire form of an event: `Type_Value`. */
export function eventToToken(event: Event): string {
  return `${event.type}_${event.value}`;
}
