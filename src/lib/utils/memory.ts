const UNITS: Record<string, number> = {
  b: 1 / (1024 * 1024),
  kb: 1 / 1024,
  k: 1 / 1024,
  mb: 1,
  m: 1,
  gb: 1024,
  g: 1024,
  tb: 1024 * 1024,
  t: 1024 * 1024,
};

/**
 * Parses sizes like "2GB", "512 MB" or "1.5g" into whole megabytes.
 * Bare numbers are megabytes. Returns null when the value is not a size.
 */
export function parseMemorySize(value: string): number | null {
  const match = /^\s*(\d+(?:\.\d+)?)\s*([a-zA-Z]*)\s*$/.exec(value);
  if (!match) return null;
  const amount = Number.parseFloat(match[1] ?? "");
  const unit = (match[2] ?? "").toLowerCase() || "mb";
  const factor = UNITS[unit];
  if (factor === undefined || !Number.isFinite(amount) || amount <= 0) {
    return null;
  }
  return Math.max(1, Math.round(amount * factor));
}

export function bytesToMb(bytes: number): number {
  return Math.round(bytes / 1024 / 1024);
}

export function currentRssMb(): number {
  return bytesToMb(process.memoryUsage().rss);
}
