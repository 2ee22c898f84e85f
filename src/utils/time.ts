const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Local time as YYYY-MM-DD HH:mm:ss
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
