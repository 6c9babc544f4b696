/**
 * Mirth version helpers
 */

/** First release with the /messagesWithObj endpoint, which returns the new message id */
export const MESSAGES_WITH_OBJ_MIN_VERSION = '3.9.0';

function parts(version: string): number[] {
  // "4.4.1.b263" → [4, 4, 1]; build suffixes and pre-release tags are ignored
  const core = version.trim().split(/[-+]/)[0] ?? '';
  return core
    .split('.')
    .slice(0, 3)
    .map((part) => {
      const n = parseInt(part, 10);
      return Number.isNaN(n) ? 0 : n;
    });
}

/**
 * Compare two dotted version strings: negative, zero or positive like a sort comparator
 */
export function compareVersions(a: string, b: string): number {
  const left = parts(a);
  const right = parts(b);
  for (let i = 0; i < 3; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

export function supportsMessagesWithObj(version: string | null): boolean {
  return version !== null && compareVersions(version, MESSAGES_WITH_OBJ_MIN_VERSION) >= 0;
}
