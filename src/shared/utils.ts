// Small general-purpose helpers

export function clamp(n: number, min: number, max: number) {
  return Math.max(min, Math.min(max, n));
}

// Inclusive integer range; empty when to < from
export function range(from: number, to: number): number[] {
  const out: number[] = [];
  for (let i = from; i <= to; i++) out.push(i);
  return out;
}
