/**
 * Utils.ts — Small shared helpers
 */

export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

export function formatDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

export function daysBetween(from: string, to: string): number {
  const ms = new Date(to + "T00:00:00Z").getTime() - new Date(from + "T00:00:00Z").getTime();
  return Math.round(ms / 86_400_000);
}

export function unique<T>(items: Iterable<T>): T[] {
  return [...new Set(items)];
}
