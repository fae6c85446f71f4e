import levenshtein from 'fast-levenshtein';

const AFFIX_TOKENS = '(?:col|column|field)';
const LEADING_AFFIX = new RegExp(`^${AFFIX_TOKENS}[\\s_.-]+`);
const TRAILING_AFFIX = new RegExp(`[\\s_.-]+${AFFIX_TOKENS}$`);

// Substring bonus only applies when the contained string is at least this long.
const MIN_CONTAINED_LENGTH = 4;
const CONTAINMENT_BONUS = 0.1;

export const normalizeHeader = (header: unknown) =>
  String(header ?? '')
    .toLowerCase()
    .trim()
    .replace(LEADING_AFFIX, '')
    .replace(TRAILING_AFFIX, '')
    .replace(/[\s_.-]+/g, '_')
    .replace(/[^\p{L}\p{M}\p{N}_]/gu, '')
    .replace(/^_+|_+$/g, '');

export const charRatio = (a: string, b: string) => {
  if (a === b) return 1;
  if (!a || !b) return 0;
  const dist = levenshtein.get(a, b);
  const maxLen = Math.max(a.length, b.length) || 1;
  return 1 - dist / maxLen;
};

const sortTokens = (value: string) => value.split('_').filter(Boolean).sort().join('_');

export const tokenSortRatio = (a: string, b: string) => charRatio(sortTokens(a), sortTokens(b));

export const matchScore = (sourceHeader: string, synonym: string) => {
  const source = normalizeHeader(sourceHeader);
  const target = normalizeHeader(synonym);
  if (!source || !target) return 0;
  if (source === target) return 1;

  let score = Math.max(charRatio(source, target), tokenSortRatio(source, target));
  const [shorter, longer] = source.length <= target.length ? [source, target] : [target, source];
  if (shorter.length >= MIN_CONTAINED_LENGTH && longer.includes(shorter)) {
    score += CONTAINMENT_BONUS;
  }
  return Math.min(1, score);
};

export const bestMatchScore = (sourceHeader: string, synonyms: string[]) => {
  let best = 0;
  for (const synonym of synonyms) {
    const score = matchScore(sourceHeader, synonym);
    if (score === 1) return 1;
    if (score > best) best = score;
  }
  return best;
};

/** Plain case-insensitive ratio on raw strings, used for platform fingerprinting. */
export const rawSimilarity = (a: string, b: string) => charRatio(a.toLowerCase().trim(), b.toLowerCase().trim());
