export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }

  return `${text.slice(0, maxLength - 1)}…`;
}

/** Single-line preview of a comment for log output. */
export function preview(text: string, maxLength: number = 50): string {
  return truncate(collapseWhitespace(text), maxLength);
}
