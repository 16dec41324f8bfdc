// Licensed under the Hungry Ghost Hive License. See LICENSE.

// Strict form: uppercase project key only, e.g. "ABC-123"
const TICKET_KEY_PATTERN = /[A-Z]+-[0-9]+/;

// Loose form for whole branch names: optional conventional prefix, any case
const LOOSE_TICKET_PATTERN = /(?:feature\/|bugfix\/|hotfix\/|release\/)?([A-Z]+-\d+)/i;

/**
 * Return the first `PROJECT-123` substring of the text, or null.
 */
export function extractTicketKey(text: string): string | null {
  const match = text.match(TICKET_KEY_PATTERN);
  return match ? match[0] : null;
}

/**
 * Ticket key from the part of a branch name after its first `/`.
 * `feature/ABC-12-login` → `ABC-12`; `ABC-12` (no slash) → null.
 */
export function extractTicketFromBranch(branchName: string): string | null {
  const slash = branchName.indexOf('/');
  if (slash === -1) {
    return null;
  }
  return extractTicketKey(branchName.slice(slash + 1));
}

/**
 * Case-insensitive lookup used for navigation: `feature/abc-12` → `ABC-12`.
 */
export function extractLooseTicketKey(text: string): string | null {
  const match = text.match(LOOSE_TICKET_PATTERN);
  return match ? match[1].toUpperCase() : null;
}
