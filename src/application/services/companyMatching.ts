import type { MatchQuality } from "../../core/entities/industry";
import type { RankingEntry, RankingSnapshot } from "../../core/entities/ranking";

export const MATCH_QUALITY_ORDER: readonly MatchQuality[] = [
  "exact",
  "prefix",
  "word_prefix",
  "substring",
  "subsequence",
];

const WORD_SEPARATOR = /[^\p{L}\p{N}]/u;

export const normalizeCompanyName = (name: string): string =>
  name.trim().toLowerCase();

export const findCompanyEntry = (
  snapshot: RankingSnapshot | null,
  normalizedName: string,
): RankingEntry | null =>
  snapshot?.entries.find(
    (entry) => normalizeCompanyName(entry.company) === normalizedName,
  ) ?? null;

const isSubsequence = (needle: string, haystack: string): boolean => {
  let cursor = 0;
  for (const char of haystack) {
    if (char === needle[cursor]) {
      cursor += 1;
      if (cursor === needle.length) {
        return true;
      }
    }
  }
  return false;
};

/**
 * Grades how well a company name matches an already-normalized query, or null for no match.
 * Subsequence matching needs at least three query characters to avoid matching everything.
 */
export const matchQuality = (
  companyName: string,
  normalizedQuery: string,
): MatchQuality | null => {
  const name = normalizeCompanyName(companyName);
  if (!normalizedQuery) {
    return null;
  }
  if (name === normalizedQuery) {
    return "exact";
  }
  if (name.startsWith(normalizedQuery)) {
    return "prefix";
  }

  const first = name.indexOf(normalizedQuery);
  if (first > 0) {
    for (
      let index = first;
      index !== -1;
      index = name.indexOf(normalizedQuery, index + 1)
    ) {
      if (WORD_SEPARATOR.test(name.charAt(index - 1))) {
        return "word_prefix";
      }
    }
    return "substring";
  }

  const compactQuery = normalizedQuery.replace(/\s+/g, "");
  if (compactQuery.length >= 3 && isSubsequence(compactQuery, name)) {
    return "subsequence";
  }
  return null;
};

export const compareMatchQuality = (
  left: MatchQuality,
  right: MatchQuality,
): number => MATCH_QUALITY_ORDER.indexOf(left) - MATCH_QUALITY_ORDER.indexOf(right);
