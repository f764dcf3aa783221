export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength);
}

export function preview(text: string, maxLength: number): string {
  return text.length > maxLength ? `${truncate(text, maxLength)}...` : text;
}

export function stripThousands(value: string): string {
  return value.replace(/,/g, "");
}
