/**
 * Splits outgoing text into pieces the platform accepts.
 */

/** Each finder returns the cut position just past the last boundary in `head`, or -1. */
const BOUNDARIES: Array<(head: string) => number> = [
  (head) => {
    const at = head.lastIndexOf('\n\n');
    return at < 0 ? -1 : at + 2;
  },
  (head) => {
    const at = head.lastIndexOf('\n');
    return at < 0 ? -1 : at + 1;
  },
  (head) => {
    let cut = -1;
    for (const match of head.matchAll(/[.!?]\s/g)) {
      cut = (match.index ?? 0) + 2;
    }
    return cut;
  },
  (head) => {
    const at = head.lastIndexOf(' ');
    return at < 0 ? -1 : at + 1;
  },
];

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

function findCut(text: string, limit: number): number {
  const head = text.slice(0, limit);
  const minimum = Math.ceil(limit / 2);
  let longest = -1;
  for (const find of BOUNDARIES) {
    const cut = find(head);
    if (cut >= minimum) return cut;
    longest = Math.max(longest, cut);
  }
  if (longest > 0) return longest;

  if (isHighSurrogate(text.charCodeAt(limit - 1)) && isLowSurrogate(text.charCodeAt(limit))) {
    return limit - 1;
  }
  return limit;
}

/**
 * Splits `content` into ordered chunks of at most `limit` UTF-16 code units.
 * Chunks are contiguous slices, so joining them gives back `content`.
 *
 * Cuts prefer a paragraph break, then a line break, a sentence end and a
 * space, as long as the chunk stays at least half the limit long. Failing
 * that the longest boundary found is used, and text without any boundary is
 * cut hard, never between the halves of a surrogate pair.
 */
export function splitMessage(content: string, limit: number): string[] {
  if (!Number.isInteger(limit) || limit < 2) {
    throw new RangeError(`Chunk limit must be an integer of at least 2, got ${limit}`);
  }
  if (content.length <= limit) {
    return [content];
  }

  const chunks: string[] = [];
  let rest = content;
  while (rest.length > limit) {
    const cut = findCut(rest, limit);
    chunks.push(rest.slice(0, cut));
    rest = rest.slice(cut);
  }
  if (rest.length > 0) {
    chunks.push(rest);
  }
  return chunks;
}
