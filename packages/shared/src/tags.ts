const HASHTAG_PREFIX = /^#+/;

/**
 * Turns inline hashtag text (`#Todo`, `##todo `) into a bare tag name.
 */
export function tagFromHashtag(text: string): string {
  return text.trim().replace(HASHTAG_PREFIX, '').trim();
}

export function normalizeTags(tags?: string[]): string[] {
  if (!tags) {
    return [];
  }

  const seen = new Set<string>();
  const normalized: string[] = [];

  for (const rawTag of tags) {
    const tag = tagFromHashtag(rawTag).toLowerCase();
    if (!tag || seen.has(tag)) {
      continue;
    }
    seen.add(tag);
    normalized.push(tag);
  }

  return normalized;
}
