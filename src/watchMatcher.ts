interface WatchEntry {
  raw: string;
  tokens: string[];
}

function tokenize(name: string): string[] {
  return name
    .toLowerCase()
    .trim()
    .split(/\s+/)
    .filter((token) => token.length > 0);
}

function entryMatches(entry: WatchEntry, firstName: string, lastName: string): boolean {
  const [head, ...rest] = entry.tokens;
  if (head === undefined) {
    return false;
  }

  // Surname alone: either name field may carry it
  if (rest.length === 0) {
    return lastName === head || firstName === head;
  }

  const remainder = rest.join(" ");

  // "Surname Given": the configured given name may be a prefix of the recorded one
  if (lastName === head && firstName.startsWith(remainder)) {
    return true;
  }

  // "Given Surname"
  return firstName === head && lastName === remainder;
}

/**
 * Matches roster names against the watchlist. Deliberately permissive:
 * an extra alert is cheaper than a missed one.
 */
export class WatchMatcher {
  private readonly entries: WatchEntry[];

  constructor(watchNames: readonly string[]) {
    this.entries = watchNames
      .map((raw) => ({ raw, tokens: tokenize(raw) }))
      .filter((entry) => entry.tokens.length > 0);
  }

  get size(): number {
    return this.entries.length;
  }

  matches(firstName: string, lastName: string): boolean {
    return this.findMatch(firstName, lastName) !== null;
  }

  /** Returns the first watchlist entry the name satisfies, as configured. */
  findMatch(firstName: string, lastName: string): string | null {
    const first = firstName.toLowerCase().trim();
    const last = lastName.toLowerCase().trim();

    for (const entry of this.entries) {
      if (entryMatches(entry, first, last)) {
        return entry.raw;
      }
    }
    return null;
  }
}

export function nameMatches(firstName: string, lastName: string, watchNames: readonly string[]): boolean {
  return new WatchMatcher(watchNames).matches(firstName, lastName);
}
