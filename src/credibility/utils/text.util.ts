const WS_RE = /\s+/g;
const TAG_RE = /<[^>]+>/g;

const ENTITY_MAP: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&nbsp;': ' ',
};

export function decodeHtmlEntities(value: string): string {
  if (!value) {
    return '';
  }
  return value.replace(
    /&(amp|lt|gt|quot|#39|nbsp);/g,
    (match) => ENTITY_MAP[match] ?? match,
  );
}

export function cleanText(value: string): string {
  if (!value) {
    return '';
  }
  const decoded = decodeHtmlEntities(value);
  return decoded.replace(TAG_RE, ' ').replace(WS_RE, ' ').trim();
}

export function normalizeDomain(domain: string): string {
  const cleaned = cleanText(domain || '').toLowerCase();
  return cleaned
    .replace(/^https?:\/\//, '')
    .replace(/^www\./, '')
    .replace(/[/?#].*$/, '')
    .replace(/[^a-z0-9.-]/g, '')
    .replace(/^\.+|\.+$/g, '');
}

export function countKeywordHits(text: string, keywords: string[]): number {
  const normalized = cleanText(text).toLowerCase();
  if (!normalized) {
    return 0;
  }
  return keywords.filter((keyword) =>
    normalized.includes(keyword.toLowerCase()),
  ).length;
}

// "left-center", "Left Center" and "LEFT_CENTER" share one key.
export function normalizeLabelKey(label: string): string {
  return cleanText(label || '')
    .toUpperCase()
    .replace(/[-_]+/g, ' ')
    .replace(WS_RE, ' ')
    .trim();
}
