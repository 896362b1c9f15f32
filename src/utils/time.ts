const pad = (n: number) => n.toString().padStart(2, "0");

/**
 * Local-time stamp safe for filenames: YYYY-MM-DD_HH-mm-ss.
 * Lexical order of the stamps matches chronological order.
 */
export function formatDateForFilename(date: Date): string {
  const yyyy = date.getFullYear();
  const MM = pad(date.getMonth() + 1);
  const dd = pad(date.getDate());
  const HH = pad(date.getHours());
  const mm = pad(date.getMinutes());
  const ss = pad(date.getSeconds());
  return `${yyyy}-${MM}-${dd}_${HH}-${mm}-${ss}`;
}

/** DD/MM/YYYY HH:mm, the way dates are shown in the PDF. */
export function formatDisplayDate(date: Date): string {
  const dd = pad(date.getDate());
  const MM = pad(date.getMonth() + 1);
  const HH = pad(date.getHours());
  const mm = pad(date.getMinutes());
  return `${dd}/${MM}/${date.getFullYear()} ${HH}:${mm}`;
}

/** First 16 chars of an ISO timestamp, with the T replaced: "2026-10-19 14:05". */
export function shortTimestamp(iso: string): string {
  return iso.slice(0, 16).replace("T", " ");
}
