import { normalizePlayerName } from "./names";

export type MatchTier = "exact" | "suffix" | "initial";

export interface NameMatch {
  candidate: string;
  tier: MatchTier;
}

interface IndexedCandidate {
  name: string;
  key: string;
  keyWithoutSuffix: string;
  surnameInitial: string | null;
}

const GENERATIONAL_SUFFIX = /\s+(jr\.?|sr\.?|ii|iii|iv)$/i;

/**
 * Candidate pool from one provider, keyed once so that a whole roster can be
 * resolved against it. Iteration order of the pool is preserved; the first
 * candidate inside the first tier that hits wins.
 */
export class PlayerNameIndex {
  private readonly candidates: IndexedCandidate[];

  constructor(names: readonly string[]) {
    this.candidates = names.map((name) => {
      const key = normalizePlayerName(name);
      return {
        name,
        key,
        keyWithoutSuffix: stripGenerationalSuffix(key),
        surnameInitial: surnameInitialKey(key),
      };
    });
  }

  get size(): number {
    return this.candidates.length;
  }

  match(target: string): string | null {
    return this.resolve(target)?.candidate ?? null;
  }

  resolve(target: string): NameMatch | null {
    const key = normalizePlayerName(target);

    const exact = this.candidates.find((candidate) => candidate.key === key);
    if (exact) {
      return { candidate: exact.name, tier: "exact" };
    }

    const keyWithoutSuffix = stripGenerationalSuffix(key);
    const suffix = this.candidates.find((candidate) => candidate.keyWithoutSuffix === keyWithoutSuffix);
    if (suffix) {
      return { candidate: suffix.name, tier: "suffix" };
    }

    // Surname plus first initial only when the target has at least two tokens.
    const initialKey = surnameInitialKey(key);
    if (initialKey === null) {
      return null;
    }

    const initial = this.candidates.find((candidate) => candidate.surnameInitial === initialKey);
    return initial ? { candidate: initial.name, tier: "initial" } : null;
  }
}

export function matchPlayerName(target: string, candidates: readonly string[]): string | null {
  return new PlayerNameIndex(candidates).match(target);
}

function stripGenerationalSuffix(key: string): string {
  return key.replace(GENERATIONAL_SUFFIX, "");
}

function surnameInitialKey(key: string): string | null {
  const parts = key.split(" ").filter((part) => part.length > 0);
  if (parts.length < 2) {
    return null;
  }

  const surname = parts[parts.length - 1].replace(/\.+$/, "");
  // The initial is always one code unit, so the concatenation is unambiguous.
  const initial = parts[0].charAt(0);
  return `${initial}${surname}`;
}
