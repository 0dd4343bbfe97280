import { ValidationError } from "./errors.js";
import type { Keyword, MatchPolicy, Post } from "./types.js";

/**
 * Inner whitespace runs collapse to one space; matching treats any whitespace
 * run in a keyword as equal to any whitespace run in the text.
 */
export function normalizeKeyword(raw: string): Keyword {
  const normalized = raw.trim().replace(/\s+/g, " ").toLowerCase();
  if (normalized.length === 0) {
    throw new ValidationError("Keyword must not be empty");
  }
  return { raw, normalized };
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").toLowerCase();
}

const exactPatterns = new Map<string, RegExp>();

function exactPattern(keywordNormalized: string): RegExp {
  let pattern = exactPatterns.get(keywordNormalized);
  if (!pattern) {
    // \b is ASCII-only; lookarounds over Unicode letters/digits keep "café" from matching "cafés".
    const phrase = keywordNormalized.trim().split(/\s+/).map(escapeRegExp).join("\\s+");
    pattern = new RegExp(`(?<![\\p{L}\\p{N}])${phrase}(?![\\p{L}\\p{N}])`, "iu");
    if (exactPatterns.size > 500) {
      exactPatterns.clear();
    }
    exactPatterns.set(keywordNormalized, pattern);
  }
  return pattern;
}

export function matches(text: string, keywordNormalized: string, policy: MatchPolicy): boolean {
  if (keywordNormalized.trim().length === 0 || text.length === 0) {
    return false;
  }

  switch (policy) {
    case "exact":
      return exactPattern(keywordNormalized).test(text);
    case "fuzzy":
      return collapseWhitespace(text).includes(collapseWhitespace(keywordNormalized));
  }
}

export function matchableText(post: Pick<Post, "title" | "body">): string {
  return `${post.title ?? ""} ${post.body ?? ""}`;
}

export function postMatches(post: Post, keywordNormalized: string, policy: MatchPolicy): boolean {
  return matches(matchableText(post), keywordNormalized, policy);
}

export function filterMatches(posts: readonly Post[], keywordNormalized: string, policy: MatchPolicy): Post[] {
  return posts.filter((post) => postMatches(post, keywordNormalized, policy));
}
