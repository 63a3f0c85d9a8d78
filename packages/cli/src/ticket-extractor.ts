export const TICKET_PATTERN = /[A-Z]+-[0-9]+/g;

/**
 * Collect every ticket id (PROJ-123) mentioned in the given branch names.
 * Returns distinct ids sorted by code units.
 */
export function extractTickets(branches: readonly string[]): string[] {
  const tickets = new Set<string>();

  for (const branch of branches) {
    for (const match of branch.match(TICKET_PATTERN) ?? []) {
      tickets.add(match);
    }
  }

  return [...tickets].sort(compareCodeUnits);
}

export function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
