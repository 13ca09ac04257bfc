/**
 * Edit distance (insertions, deletions, substitutions) between two strings.
 */
export function levenshtein(a: string, b: string): number {
  if (a.length < b.length) {
    return levenshtein(b, a);
  }
  if (b.length === 0) {
    return a.length;
  }

  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 0; i < a.length; i++) {
    const curr = [i + 1];
    for (let j = 0; j < b.length; j++) {
      const substitution = prev[j] + (a[i] === b[j] ? 0 : 1);
      curr.push(Math.min(prev[j + 1] + 1, curr[j] + 1, substitution));
    }
    prev = curr;
  }
  return prev[b.length];
}
