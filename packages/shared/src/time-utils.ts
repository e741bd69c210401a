const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/**
 * Formats an epoch-millisecond timestamp as `YYYY-MM-DD HH:MM:SS` in local time.
 * Fractional seconds are truncated.
 */
export const formatLocalTimestamp = (epochMs: number): string => {
  const d = new Date(epochMs);
  const date = `${pad(d.getFullYear(), 4)}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
  const time = `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
  return `${date} ${time}`;
};
