const htmlEscapeMap: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (character) => htmlEscapeMap[character] ?? character);
}

// Keeps letters, combining marks, apostrophes and hyphens inside words.
export function normalizeLookupText(value: string): string {
  return value
    .replace(/[^\p{L}\p{M}'\-\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function htmlToPlaintext(html: string): string {
  const text = html
    .replace(/<h[1-6][^>]*>/gi, '# ')
    .replace(/<li[^>]*>\s*(<p[^>]*>)?/gi, '• ')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(p|h[1-6]|li|ul|ol|div)>/gi, '\n')
    .replace(/<[^>]*>/g, '')
    .replace(/&nbsp;/g, ' ')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, '&');

  return text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

export function escapeMarkdown(value: string): string {
  return value.replace(/[\\`*_{}[\]<>#+!|~]/g, (character) => `\\${character}`);
}
