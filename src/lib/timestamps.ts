function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

/** `MM:SS` below an hour, `HH:MM:SS` from an hour on. */
export function formatTimestamp(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const rest = seconds % 60;

  return hours > 0 ? `${pad(hours)}:${pad(minutes)}:${pad(rest)}` : `${pad(minutes)}:${pad(rest)}`;
}

export function formatDuration(totalSeconds: number): string {
  return formatTimestamp(totalSeconds);
}

export function sanitizeFileName(name: string, maxLength = 100): string {
  const cleaned = name
    .replace(/[<>:"/\\|?*\u0000-\u001f]/g, '')
    .trim()
    .replace(/\s+/g, '_')
    .slice(0, maxLength);
  return cleaned || 'untitled';
}
