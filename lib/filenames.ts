/** Keeps letters, digits, underscores, whitespace and hyphens; trims; spaces become underscores. */
export function sanitizeFilename(name: string): string {
  return name
    .replace(/[^\p{L}\p{N}_\s-]/gu, '')
    .trim()
    .replace(/ /g, '_');
}
