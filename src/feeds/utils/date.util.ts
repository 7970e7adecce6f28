export function nowSeconds(): number {
  return Date.now() / 1000;
}

export function formatHttpDate(epochMs: number): string {
  return new Date(epochMs).toUTCString();
}

export function formatCommitTimestamp(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  const hh = String(date.getHours()).padStart(2, '0');
  const mm = String(date.getMinutes()).padStart(2, '0');
  return `${y}-${m}-${d} ${hh}:${mm}`;
}
