export function hex(n?: number | null) {
  if (n == null) return '-';
  return '0x' + n.toString(16);
}

export function formatSize(n: number, unit: string) {
  return unit ? `${n} ${unit}` : String(n);
}

/** Positive decimal integer or null. "16", " 16 " → 16; "0", "1.5", "0x10", "" → null. */
export function parseSize(input: string): number | null {
  const s = input.trim();
  if (!/^\d+$/.test(s)) return null;
  const v = Number.parseInt(s, 10);
  return Number.isSafeInteger(v) && v > 0 ? v : null;
}

function pad(n: number, width = 2) {
  return n.toString().padStart(width, '0');
}

/** Local time as YYYY-MM-DD HH:MM:SS. */
export function formatTimestamp(ts: number) {
  const d = new Date(ts);
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
  );
}

export function percent(part: number, whole: number) {
  if (whole <= 0) return 0;
  return (part / whole) * 100;
}
