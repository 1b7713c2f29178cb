/**
 * Shortens `text` to `keep` characters plus an ellipsis once it is longer than
 * `max`. `keep` defaults to `max`.
 */
export function previewText(text: string, max: number, keep: number = max): string {
  return text.length > max ? `${text.slice(0, keep)}...` : text;
}
