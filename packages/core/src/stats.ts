// Statistics helpers for the correlation view

/**
 * Pearson correlation coefficient of two equal-length samples.
 * NaN when fewer than two pairs or either sample has zero variance.
 */
export function pearson(xs: readonly number[], ys: readonly number[]): number {
  const n = xs.length;
  if (n < 2 || ys.length !== n) return NaN;

  let sumX = 0;
  let sumY = 0;
  for (let i = 0; i < n; i++) {
    sumX += xs[i]!;
    sumY += ys[i]!;
  }
  const meanX = sumX / n;
  const meanY = sumY / n;

  let sxx = 0;
  let syy = 0;
  let sxy = 0;
  for (let i = 0; i < n; i++) {
    const dx = xs[i]! - meanX;
    const dy = ys[i]! - meanY;
    sxx += dx * dx;
    syy += dy * dy;
    sxy += dx * dy;
  }

  if (sxx === 0 || syy === 0) return NaN;
  // Rounding can push |r| a hair past 1
  return Math.max(-1, Math.min(1, sxy / Math.sqrt(sxx * syy)));
}

function hasVariance(xs: readonly number[]): boolean {
  return xs.length >= 2 && xs.some(x => x !== xs[0]);
}

/**
 * Symmetric matrix of pairwise coefficients. Diagonal cells are exactly 1 when
 * the column is defined, NaN otherwise.
 */
export function correlationMatrix(columns: readonly (readonly number[])[]): number[][] {
  const k = columns.length;
  const matrix: number[][] = Array.from({ length: k }, () => new Array<number>(k).fill(NaN));

  for (let i = 0; i < k; i++) {
    const ci = columns[i]!;
    matrix[i]![i] = hasVariance(ci) ? 1 : NaN;
    for (let j = i + 1; j < k; j++) {
      const r = pearson(ci, columns[j]!);
      matrix[i]![j] = r;
      matrix[j]![i] = r;
    }
  }

  return matrix;
}
