const KB = 1024;
const MB = KB * 1024;
const GB = MB * 1024;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Human readable byte size: `512 bytes`, `1.5 KB`, `2.25 MB`
 */
export function toSizeString(bytes: number): string {
  if (bytes >= GB) return `${round2(bytes / GB)} GB`;
  if (bytes >= MB) return `${round2(bytes / MB)} MB`;
  if (bytes >= KB) return `${round2(bytes / KB)} KB`;
  return `${bytes} bytes`;
}

export function messageCountString(count: number): string {
  return `${count} message${count === 1 ? "" : "s"}`;
}

/**
 * `1h 2m 3s 45ms`; zero-valued units are omitted, milliseconds always shown
 */
export function elapsedTimeString(ms: number): string {
  const total = Math.max(0, Math.floor(ms));
  const days = Math.floor(total / 86_400_000);
  const hours = Math.floor(total / 3_600_000) % 24;
  const minutes = Math.floor(total / 60_000) % 60;
  const seconds = Math.floor(total / 1000) % 60;
  const millis = total % 1000;

  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  if (seconds > 0) parts.push(`${seconds}s`);
  parts.push(`${millis}ms`);
  return parts.join(" ");
}
