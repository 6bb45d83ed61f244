/**
 * Find the file group identifier that belongs to a candidate (artifact) name.
 *
 * Two tiers are tried in order, each taking the *first* identifier in
 * iteration order that satisfies it:
 *
 * - exact: the case-folded identifier equals the case-folded candidate
 * - partial: either case-folded string contains the other
 *
 * Identifiers are never reserved - the same identifier can be returned
 * for any number of candidates.
 *
 * @param candidateName the artifact name
 * @param groupIdentifiers the identifiers of the file groups to choose from
 * @returns the matched identifier (as given) or undefined for no match
 */
export function matchName(
  candidateName: string,
  groupIdentifiers: Iterable<string>,
): string | undefined {
  // an empty candidate would be a substring of every identifier
  if (candidateName.length === 0) return undefined;

  const candidate = foldCase(candidateName);
  const identifiers = Array.from(groupIdentifiers);

  const exact = identifiers.find((id) => foldCase(id) === candidate);

  if (exact !== undefined) return exact;

  return identifiers.find((id) => {
    const folded = foldCase(id);
    return folded.includes(candidate) || candidate.includes(folded);
  });
}

export function foldCase(s: string): string {
  return s.toUpperCase();
}
