/** Keyword patterns behind `--auto-tag`, checked in insertion order. */
export const AUTO_TAG_PATTERNS: ReadonlyMap<string, RegExp> = new Map([
  ["api", /\b(api|endpoint|rest|graphql|http)\b/i],
  ["database", /\b(database|db|sql|postgres|sqlite|mongo)\b/i],
  ["config", /\b(config|configuration|settings|\.env|environment)\b/i],
  ["auth", /\b(auth|authentication|jwt|oauth|password|login)\b/i],
  ["error", /\b(error|exception|bug|fix|issue)\b/i],
  ["security", /\b(security|secret|key|credential|token)\b/i],
]);

export function detectTags(content: string): string[] {
  const tags: string[] = [];
  for (const [tag, pattern] of AUTO_TAG_PATTERNS) {
    if (pattern.test(content)) {
      tags.push(tag);
    }
  }
  return tags;
}
