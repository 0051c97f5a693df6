const WORD_CHAR = /[\p{L}\p{N}_]/u;

const HTML_ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&#039;': "'",
  '&nbsp;': ' ',
};

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Removes tags and the common entities, then collapses whitespace
 */
export function stripHtml(html: string): string {
  const withoutTags = html.replace(/<[^>]*>/g, ' ');
  const decoded = withoutTags.replace(/&(?:amp|lt|gt|quot|#0?39|nbsp);/g, entity => HTML_ENTITIES[entity] ?? entity);
  return collapseWhitespace(decoded);
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Cuts on the last word boundary before maxLength and appends "..."
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;

  let cut = text.slice(0, maxLength);
  if (isHighSurrogate(cut.charCodeAt(cut.length - 1))) {
    cut = cut.slice(0, -1);
  }
  const lastSpace = cut.lastIndexOf(' ');
  if (lastSpace > 0) {
    cut = cut.slice(0, lastSpace);
  }
  return `${cut}...`;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

export function formatAmount(value: number): string {
  return Math.round(value).toString().replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}

/**
 * "1,000-2,000 USD", "from 1,000 USD", "up to 2,000 USD", or undefined
 */
export function formatSalaryRange(
  min: number | null | undefined,
  max: number | null | undefined,
  currency?: string | null
): string | undefined {
  const hasMin = typeof min === 'number' && min > 0;
  const hasMax = typeof max === 'number' && max > 0;
  const suffix = currency ? ` ${currency}` : '';

  if (hasMin && hasMax) return `${formatAmount(min)}-${formatAmount(max)}${suffix}`;
  if (hasMin) return `from ${formatAmount(min)}${suffix}`;
  if (hasMax) return `up to ${formatAmount(max)}${suffix}`;
  return undefined;
}

function isWordChar(char: string): boolean {
  return char.length > 0 && WORD_CHAR.test(char);
}

/**
 * Case-insensitive keyword lookup on word boundaries.
 * A boundary is only enforced on a side where the keyword itself starts
 * or ends with a letter or digit, so "jr." and "c#" still match.
 */
function containsLowercased(haystack: string, keyword: string): boolean {
  const term = keyword.toLowerCase();
  if (!term) return false;

  const checkStart = isWordChar(term.charAt(0));
  const checkEnd = isWordChar(term.charAt(term.length - 1));

  let from = 0;
  for (;;) {
    const index = haystack.indexOf(term, from);
    if (index === -1) return false;

    const startOk = !checkStart || !isWordChar(haystack.charAt(index - 1));
    const endOk = !checkEnd || !isWordChar(haystack.charAt(index + term.length));
    if (startOk && endOk) return true;

    from = index + 1;
  }
}

/**
 * Returns the keywords that occur in the text, in keyword order
 */
export function findKeywords(text: string, keywords: readonly string[]): string[] {
  const haystack = text.toLowerCase();
  return keywords.filter(keyword => containsLowercased(haystack, keyword));
}

export function containsAnyKeyword(text: string, keywords: readonly string[]): boolean {
  const haystack = text.toLowerCase();
  return keywords.some(keyword => containsLowercased(haystack, keyword));
}

function capitalizeWords(value: string): string {
  return value
    .toLowerCase()
    .split(' ')
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/**
 * Provider tags as display skills: trimmed, shorter than 25 chars,
 * capitalized, deduplicated case-insensitively
 */
export function normalizeTags(tags: readonly unknown[] | undefined): string[] {
  if (!tags) return [];

  const seen = new Set<string>();
  const skills: string[] = [];

  for (const tag of tags) {
    if (typeof tag !== 'string') continue;
    const trimmed = collapseWhitespace(tag);
    if (!trimmed || trimmed.length >= 25) continue;

    const key = trimmed.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    skills.push(capitalizeWords(trimmed));
  }

  return skills;
}
