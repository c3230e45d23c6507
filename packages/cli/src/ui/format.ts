/** Whole percent, rounded down so an unfinished loop never shows 100%. */
export function percent(fraction: number): string {
  const clamped = Math.min(1, Math.max(0, fraction));
  return `${String(Math.floor(clamped * 100))}%`;
}

export function textBar(fraction: number, width = 30): string {
  const clamped = Math.min(1, Math.max(0, fraction));
  const filled = Math.floor(clamped * width);
  return '█'.repeat(filled) + '░'.repeat(width - filled);
}
