/**
 * Calculate Jaccard similarity between two texts
 * Used for near-duplicate detection between retrieved chunks
 */
export function calculateJaccardSimilarity(text1: string, text2: string): number {
  const tokens1 = new Set(tokenize(text1));
  const tokens2 = new Set(tokenize(text2));

  const intersection = new Set([...tokens1].filter(x => tokens2.has(x)));
  const union = new Set([...tokens1, ...tokens2]);

  if (union.size === 0) return 0;

  return intersection.size / union.size;
}

/**
 * Tokenize text into lowercase words (for text analysis)
 */
export function tokenize(text: string, minLength: number = 3): string[] {
  return text
    .toLowerCase()
    .replace(/[^\w\s]/g, ' ')
    .split(/\s+/)
    .filter(t => t.length >= minLength);
}

/**
 * Rough token count: ~4 characters per token for English text
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/**
 * Strip HTML tags and decode entities from HTML content
 */
export function stripHtml(html: string): string {
  let text = html;

  // Remove script and style elements with their content
  text = text.replace(/<script[^>]*>[\s\S]*?<\/script>/gi, '');
  text = text.replace(/<style[^>]*>[\s\S]*?<\/style>/gi, '');

  // Replace <br> and block closers with newlines before removing tags
  text = text.replace(/<br\s*\/?>/gi, '\n');
  text = text.replace(/<\/p>/gi, '\n\n');
  text = text.replace(/<\/(div|li|h[1-6]|tr)>/gi, '\n');

  // Remove all HTML tags
  text = text.replace(/<[^>]+>/g, '');

  const entities: Record<string, string> = {
    '&nbsp;': ' ',
    '&lt;': '<',
    '&gt;': '>',
    '&quot;': '"',
    '&#39;': "'",
    '&apos;': "'",
    '&mdash;': '—',
    '&ndash;': '–',
    '&hellip;': '...',
  };

  for (const [entity, replacement] of Object.entries(entities)) {
    text = text.split(entity).join(replacement);
  }

  // Decode numeric entities (&#123; or &#xAB;)
  text = text.replace(/&#(\d+);/g, (_, code: string) => String.fromCharCode(parseInt(code, 10)));
  text = text.replace(/&#x([0-9a-f]+);/gi, (_, code: string) =>
    String.fromCharCode(parseInt(code, 16))
  );
  // &amp; last so "&amp;lt;" stays "&lt;"
  text = text.split('&amp;').join('&');

  // Normalize whitespace
  text = text.replace(/[ \t]+/g, ' ');
  text = text.replace(/^[ \t]+|[ \t]+$/gm, '');
  text = text.replace(/\n{3,}/g, '\n\n');

  return text.trim();
}

/**
 * Cleans extracted document text by removing common PDF artifacts and
 * normalizing whitespace. Paragraph breaks are kept for the chunker.
 */
export function cleanExtractedText(text: string): string {
  let cleaned = text.replace(/\r\n?/g, '\n');

  // Remove page numbers (various formats)
  cleaned = cleaned.replace(/\bPage\s+\d+\s+of\s+\d+\b/gi, '');
  cleaned = cleaned.replace(/^\s*\d+\s*$/gm, '');

  // Remove lines made only of dashes/underscores
  cleaned = cleaned.replace(/^[-_=]{3,}$/gm, '');

  // Fix hyphenated words split across lines
  cleaned = cleaned.replace(/(\w+)-\n\s*(\w+)/g, '$1$2');

  cleaned = cleaned.replace(/[ \t]+/g, ' ');
  cleaned = cleaned
    .split('\n')
    .map(line => line.trim())
    .join('\n');
  cleaned = cleaned.replace(/\n{3,}/g, '\n\n');

  return cleaned.trim();
}
