function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/** `+HHmm` / `-HHmm` offset of the local zone at `date`. */
export function formatZoneOffset(date: Date): string {
  const offsetMinutes = -date.getTimezoneOffset();
  const sign = offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(offsetMinutes);
  return `${sign}${pad(Math.floor(abs / 60), 2)}${pad(abs % 60, 2)}`;
}

/** Local time as `yyyy-MM-dd'T'HH:mm:ss.SSSZ`, e.g. `2026-03-01T09:05:07.042+0100`. */
export function formatTimestamp(date: Date): string {
  return (
    `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1, 2)}-${pad(date.getDate(), 2)}` +
    `T${pad(date.getHours(), 2)}:${pad(date.getMinutes(), 2)}:${pad(date.getSeconds(), 2)}` +
    `.${pad(date.getMilliseconds(), 3)}${formatZoneOffset(date)}`
  );
}

/** Local time as `yyyyMMdd-HHmmss-SSS`, for file names. */
export function formatFileTimestamp(date: Date): string {
  return (
    `${pad(date.getFullYear(), 4)}${pad(date.getMonth() + 1, 2)}${pad(date.getDate(), 2)}` +
    `-${pad(date.getHours(), 2)}${pad(date.getMinutes(), 2)}${pad(date.getSeconds(), 2)}` +
    `-${pad(date.getMilliseconds(), 3)}`
  );
}
