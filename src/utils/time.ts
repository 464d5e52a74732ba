const DATE_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

// Same text layout SQLite writes for CURRENT_TIMESTAMP, always UTC.
export function toSqlTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

export function toDateKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function toCompactStamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}`;
}

export function isDateKey(value: string): boolean {
  if (!DATE_KEY_PATTERN.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && toDateKey(parsed) === value;
}
