export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

export function round3(n: number): number {
  return Math.round(n * 1000) / 1000;
}

// DECIMAL columns come back from PG as strings
export function parseNum(val: string | number | null | undefined): number {
  if (typeof val === 'number') return Number.isFinite(val) ? val : 0;
  return parseFloat(val ?? '') || 0;
}

export function parseNullableNum(val: string | number | null | undefined): number | null {
  if (val === null || val === undefined || val === '') return null;
  return parseNum(val);
}
