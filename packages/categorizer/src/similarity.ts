/**
 * Length of the longest common substring (contiguous), O(n·m) time, O(m) space.
 */
export function longestCommonSubstring(a: string, b: string): number {
  if (a === '' || b === '') return 0;

  let previous = new Array<number>(b.length + 1).fill(0);
  let current = new Array<number>(b.length + 1).fill(0);
  let longest = 0;

  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      if (a[i - 1] === b[j - 1]) {
        const length = (previous[j - 1] ?? 0) + 1;
        current[j] = length;
        if (length > longest) longest = length;
      } else {
        current[j] = 0;
      }
    }
    [previous, current] = [current, previous];
  }

  return longest;
}

export interface KeySimilarity {
  /** Common substring length divided by the longer key's length, 0..1 */
  similarity: number;
  commonLength: number;
}

export function keySimilarity(a: string, b: string): KeySimilarity {
  const longer = Math.max(a.length, b.length);
  if (longer === 0) {
    return { similarity: 0, commonLength: 0 };
  }
  const commonLength = longestCommonSubstring(a, b);
  return { similarity: commonLength / longer, commonLength };
}
