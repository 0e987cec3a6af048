/**
 * Explicit "who" and "when" for every mutating operation. Services never read
 * the current user or the wall clock from ambient state.
 */

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

export interface OperationContext {
  actorId: string;
  companyId: string;
  branchId: string | null;
  clock: Clock;
}

/** `YYYY-MM-DD HH:mm:ss` in UTC, used for timestamped note logs. */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

/** `YYYY-MM-DD` in UTC. */
export function toDateString(date: Date): string {
  return date.toISOString().split('T')[0];
}

export function addDays(dateString: string, days: number): string {
  const date = new Date(`${dateString}T00:00:00.000Z`);
  date.setUTCDate(date.getUTCDate() + days);
  return toDateString(date);
}

export function appendNote(existing: string | null, line: string): string {
  return existing ? `${existing}\n${line}` : line;
}
