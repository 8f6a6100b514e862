import { ConfigError } from "./errors.ts";

/**
 * Parse user-friendly durations into milliseconds.
 *
 * Accepts: "45s", "90m", "2h", "1d", "1:30:00", "30:00"
 */
export function parseDuration(input: string): number {
  const ms = toMilliseconds(input);
  if (ms <= 0) {
    throw new ConfigError(`Duration must be positive: "${input}"`);
  }
  return ms;
}

function toMilliseconds(input: string): number {
  const trimmed = input.trim();

  if (trimmed.includes(":")) {
    return clockToSeconds(trimmed) * 1000;
  }

  const match = trimmed.match(/^(\d+(?:\.\d+)?)\s*(s|m|h|d)$/i);
  if (match) {
    const value = parseFloat(match[1] ?? "");
    const unit = (match[2] ?? "").toLowerCase();
    let seconds: number;
    if (unit === "s") seconds = value;
    else if (unit === "m") seconds = value * 60;
    else if (unit === "h") seconds = value * 3600;
    else seconds = value * 86400;
    return Math.round(seconds * 1000);
  }

  throw new ConfigError(
    `Invalid duration: "${input}". Use 45s, 90m, 2h, 1d, or HH:MM:SS.`,
  );
}

function clockToSeconds(time: string): number {
  // HH:MM:SS
  const hms = time.match(/^(\d+):(\d{1,2}):(\d{1,2})$/);
  if (hms) {
    return (
      parseInt(hms[1] ?? "0") * 3600 +
      clockField(hms[2], time) * 60 +
      clockField(hms[3], time)
    );
  }

  // MM:SS
  const ms = time.match(/^(\d+):(\d{1,2})$/);
  if (ms) {
    return parseInt(ms[1] ?? "0") * 60 + clockField(ms[2], time);
  }

  throw new ConfigError(`Cannot parse duration: "${time}"`);
}

function clockField(field: string | undefined, time: string): number {
  const value = parseInt(field ?? "0");
  if (value > 59) {
    throw new ConfigError(`Cannot parse duration: "${time}"`);
  }
  return value;
}

/** Render milliseconds as "1h 5m", "12m 3s" or "40s". */
export function formatDuration(ms: number): string {
  const total = Math.max(0, Math.round(ms / 1000));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const seconds = total % 60;
  if (hours > 0) return minutes > 0 ? `${hours}h ${minutes}m` : `${hours}h`;
  if (minutes > 0) return seconds > 0 ? `${minutes}m ${seconds}s` : `${minutes}m`;
  return `${seconds}s`;
}
