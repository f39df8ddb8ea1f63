export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength) + '...(truncated)';
}

/** Last `maxLines` non-empty lines, for console-sized previews of command output. */
export function tail(text: string, maxLines: number): string {
  const lines = text.split('\n').filter(l => l.trim() !== '');
  return lines.slice(-maxLines).join('\n');
}
