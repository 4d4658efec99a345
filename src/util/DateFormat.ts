/**
 * Local-time date formatting shared by log lines and provenance headers.
 */

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * yyyy-MM-dd HH:mm:ss in local time.
 */
export function formatLocalDateTime(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * yyyy-MM-dd HH:mm:ss,SSS in local time.
 */
export function formatLocalDateTimeMillis(date: Date): string {
  return `${formatLocalDateTime(date)},${pad(date.getMilliseconds(), 3)}`;
}
