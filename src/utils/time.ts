const POSTED_AT_PATTERN = /投稿日[:：]\s*(\d{4}年\d{2}月\d{2}日\s+\d{2}:\d{2})/;

/**
 * Pulls the post timestamp out of the forum's header line
 * (`投稿日: 2025年04月01日 23:15 ...`). Returns null when the line has none.
 */
export function extractPostedAt(headerText: string): string | null {
  const match = POSTED_AT_PATTERN.exec(headerText);
  const value = match?.[1];
  return value ? value.replace(/\s+/, ' ') : null;
}

/** Filesystem-safe timestamp for output file names. */
export function fileStamp(date: Date = new Date()): string {
  return date.toISOString().replace(/[:]/g, '-').replace(/\.\d{3}Z$/, 'Z');
}

export function elapsedSince(startMs: number, nowMs: number = Date.now()): string {
  const seconds = Math.max(0, Math.round((nowMs - startMs) / 1000));
  return seconds < 60 ? `${seconds}s` : `${Math.floor(seconds / 60)}m${seconds % 60}s`;
}
