export function lastWord(line: string): string {
  const words = line.trim().split(/\s+/);
  return words[words.length - 1] ?? '';
}

/** Text right of the last colon, trimmed. */
export function colonRight(line: string): string {
  const parts = line.split(':');
  return (parts[parts.length - 1] ?? '').trim();
}
