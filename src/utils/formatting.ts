/**
 * Formatting Utilities
 * HTML escaping, filename encoding and human-readable sizes/durations.
 */

/**
 * Escapes special HTML characters.
 */
export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#x27;");
}

/**
 * Percent-encodes a value for an RFC 5987 ext-value (filename*=UTF-8''...).
 * encodeURIComponent leaves !'()* alone; those are not attr-chars.
 */
export function encodeRfc5987(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

/**
 * Formats duration in seconds as M:SS, or H:MM:SS from an hour up.
 */
export function formatDuration(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;

  if (hours === 0) {
    return `${minutes}:${secs.toString().padStart(2, "0")}`;
  }
  return [
    hours.toString(),
    minutes.toString().padStart(2, "0"),
    secs.toString().padStart(2, "0"),
  ].join(":");
}

/**
 * Bytes to MiB with one decimal, e.g. "12.3".
 */
export function formatMegabytes(bytes: number): string {
  return (bytes / (1024 * 1024)).toFixed(1);
}
