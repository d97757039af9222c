export function suggestClosest(input: string, options: string[]): string | null {
  let best: { value: string; distance: number } | null = null;
  for (const opt of options) {
    const d = levenshtein(input, opt);
    if (!best || d < best.distance) best = { value: opt, distance: d };
  }
  if (!best) return null;
  const threshold = Math.max(1, Math.floor(Math.max(input.length, best.value.length) * 0.4));
  return best.distance <= threshold ? best.value : null;
}

export function levenshtein(a: string, b: string): number {
  let prev = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const row = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      row[j] = Math.min(prev[j] + 1, row[j - 1] + 1, prev[j - 1] + cost);
    }
    prev = row;
  }
  return prev[b.length];
}

export function hintSuffix(hint: string | null): string {
  return hint ? ` (did you mean '${hint}'?)` : "";
}
