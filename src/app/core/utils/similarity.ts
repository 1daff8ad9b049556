/**
 * String Similarity Utilities
 *
 * Edit-distance helpers for suggesting registry entries close to an
 * unmatched label.
 */

/**
 * Calculates Levenshtein distance between two strings.
 */
export function levenshteinDistance(a: string, b: string): number {
  const matrix: number[][] = [];

  for (let i = 0; i <= b.length; i++) {
    matrix[i] = [i];
  }

  for (let j = 0; j <= a.length; j++) {
    matrix[0][j] = j;
  }

  for (let i = 1; i <= b.length; i++) {
    for (let j = 1; j <= a.length; j++) {
      if (b.charAt(i - 1) === a.charAt(j - 1)) {
        matrix[i][j] = matrix[i - 1][j - 1];
      } else {
        matrix[i][j] = Math.min(
          matrix[i - 1][j - 1] + 1,
          matrix[i][j - 1] + 1,
          matrix[i - 1][j] + 1
        );
      }
    }
  }

  return matrix[b.length][a.length];
}

/**
 * Similarity in [0, 1], compared on lower-cased alphanumerics only.
 *
 * @example
 * similarity('MCF-7', 'mcf7') // 1
 */
export function similarity(a: string, b: string): number {
  const na = a.toLowerCase().replace(/[^a-z0-9]/g, '');
  const nb = b.toLowerCase().replace(/[^a-z0-9]/g, '');
  const maxLen = Math.max(na.length, nb.length);
  if (maxLen === 0) return 0;
  return 1 - levenshteinDistance(na, nb) / maxLen;
}

/**
 * Highest similarity between a query and any candidate.
 */
export function bestSimilarity(query: string, candidates: readonly string[]): number {
  let best = 0;
  for (const candidate of candidates) {
    const score = similarity(query, candidate);
    if (score > best) {
      best = score;
    }
  }
  return best;
}
