export function isoNow(): string {
  return new Date().toISOString();
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

// Local time, YYYYMMDD_HHMMSS. Shared by every file of one export.
export function fileTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

// Local time, YYYY-MM-DD HH:MM:SS. Used in generated file headers.
export function displayTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function truncateText(text: string, limit: number): { text: string; truncated: boolean } {
  const chars = Array.from(text);
  if (chars.length <= limit) {
    return { text, truncated: false };
  }
  return { text: chars.slice(0, limit).join(""), truncated: true };
}
