/**
 * Format a duration as hours, minutes and seconds, e.g. `1h 2min 5.5s`.
 * Zero-valued units are left out.
 */
export function formatElapsed(elapsedMs: number): string {
  const totalSeconds = Math.max(0, elapsedMs) / 1000;
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  const parts: string[] = [];
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}min`);
  if (seconds > 0 || parts.length === 0) parts.push(`${seconds.toFixed(1)}s`);

  return parts.join(' ');
}
