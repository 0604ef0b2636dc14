const pad2 = (value: number) => String(value).padStart(2, '0');

/**
 * Local wall-clock time as `YYYY-MM-DD HH:MM:SS`.
 */
export const formatTimestamp = (date: Date): string => {
  const y = String(date.getFullYear()).padStart(4, '0');
  const mm = pad2(date.getMonth() + 1);
  const dd = pad2(date.getDate());
  const hh = pad2(date.getHours());
  const mi = pad2(date.getMinutes());
  const ss = pad2(date.getSeconds());
  return `${y}-${mm}-${dd} ${hh}:${mi}:${ss}`;
};

export const formatLogEntry = (timestamp: string, iteration: number, message: string): string =>
  `[${timestamp}] Loop ${iteration}: ${message}`;
