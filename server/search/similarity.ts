/**
 * Fuzzy String Similarity
 * 
 * 0-100 scores used by the name matcher and the title scorer.
 * 
 * - ratio: normalized indel similarity, 200 * LCS / (|a| + |b|)
 * - partialRatio: best ratio of the shorter string against every
 *   alignment with the longer one: each equal-length window, plus the
 *   shorter prefixes and suffixes where the alignment hangs off either
 *   end. A query fully contained in a title scores 100; a title cut off
 *   mid-word ("amazing grac") still scores against "grace".
 * 
 * Scores are rounded to integers. Callers compare against the tuned
 * thresholds in config/constants.ts.
 */

function longestCommonSubsequence(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;

  let previous = new Array<number>(b.length + 1).fill(0);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      current[j] = a[i - 1] === b[j - 1]
        ? previous[j - 1] + 1
        : Math.max(previous[j], current[j - 1]);
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length];
}

export function ratio(a: string, b: string): number {
  const total = a.length + b.length;
  if (a.length === 0 || b.length === 0) return 0;
  return Math.round((200 * longestCommonSubsequence(a, b)) / total);
}

export function partialRatio(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;

  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
  if (longer.includes(shorter)) return 100;

  let best = 0;
  for (let start = 0; start + shorter.length <= longer.length; start++) {
    best = Math.max(best, ratio(shorter, longer.slice(start, start + shorter.length)));
  }
  for (let length = 1; length < shorter.length; length++) {
    best = Math.max(
      best,
      ratio(shorter, longer.slice(0, length)),
      ratio(shorter, longer.slice(longer.length - length)),
    );
  }
  return best;
}
