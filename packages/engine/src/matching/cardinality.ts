/**
 * Cardinality resolution over an ordered candidate set.
 *
 * Pure: the caller filters candidates and turns errors into diagnostics.
 */

import { error, ok, type Result } from "../types/result.js";
import type { Cardinality } from "../schema/types.js";

export type Candidate<T> = {
  readonly item: T;
  /** Declaration index among all members of the scope */
  readonly index: number;
  /** Externally-facing name, used as the key of named collections */
  readonly name: string;
};

export type MatchedSet<T> =
  | { readonly kind: "single"; readonly match: Candidate<T> }
  | { readonly kind: "optional"; readonly match?: Candidate<T> }
  | { readonly kind: "many"; readonly matches: readonly Candidate<T>[] }
  | { readonly kind: "named"; readonly matches: readonly Candidate<T>[] };

export type CardinalityError<T> =
  | { readonly kind: "noMatch" }
  | { readonly kind: "ambiguous"; readonly candidates: readonly Candidate<T>[] }
  | {
      readonly kind: "duplicateName";
      readonly name: string;
      readonly candidates: readonly Candidate<T>[];
    };

export const resolveCardinality = <T>(
  cardinality: Cardinality,
  candidates: readonly Candidate<T>[]
): Result<MatchedSet<T>, readonly CardinalityError<T>[]> => {
  const [first, ...rest] = candidates;

  switch (cardinality.kind) {
    case "single":
      if (!first) {
        return error([{ kind: "noMatch" }]);
      }
      return rest.length > 0
        ? error([{ kind: "ambiguous", candidates }])
        : ok({ kind: "single", match: first });

    case "optional":
      return rest.length > 0
        ? error([{ kind: "ambiguous", candidates }])
        : ok({ kind: "optional", match: first });

    case "many":
      if (!cardinality.named) {
        return ok({ kind: "many", matches: candidates });
      }
      return resolveNamed(candidates);
  }
};

const resolveNamed = <T>(
  candidates: readonly Candidate<T>[]
): Result<MatchedSet<T>, readonly CardinalityError<T>[]> => {
  const byName = new Map<string, Candidate<T>[]>();
  for (const candidate of candidates) {
    const group = byName.get(candidate.name);
    if (group) {
      group.push(candidate);
    } else {
      byName.set(candidate.name, [candidate]);
    }
  }

  const collisions = [...byName.entries()]
    .filter(([, group]) => group.length > 1)
    .map(
      ([name, group]): CardinalityError<T> => ({
        kind: "duplicateName",
        name,
        candidates: group,
      })
    );

  return collisions.length > 0
    ? error(collisions)
    : ok({ kind: "named", matches: candidates });
};

/**
 * Matched candidates in declaration order
 */
export const matchedCandidates = <T>(
  matched: MatchedSet<T>
): readonly Candidate<T>[] => {
  switch (matched.kind) {
    case "single":
      return [matched.match];
    case "optional":
      return matched.match ? [matched.match] : [];
    case "many":
    case "named":
      return matched.matches;
  }
};
