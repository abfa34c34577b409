const HONORIFICS = new Set(['mr', 'mrs', 'ms', 'miss', 'dr', 'prof', 'sir', 'madam']);

export interface ScoringAttributes {
  location?: string | null;
}

export interface SimilarityOptions {
  locationBonus?: number;
  stripHonorifics?: boolean;
}

export interface SimilarityScorer {
  score(
    nameA: string,
    nameB: string,
    attributes?: { a?: ScoringAttributes; b?: ScoringAttributes },
  ): number;
}

const DEFAULT_LOCATION_BONUS = 0.05;
const FIRST_TOKEN_WEIGHT = 0.4;
const LAST_TOKEN_WEIGHT = 0.6;

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim().toLowerCase();
}

export function normalizeName(name: string, stripHonorifics = true): string {
  const collapsed = collapse(name);
  if (!stripHonorifics) return collapsed;
  return collapsed
    .split(' ')
    .filter((word) => !HONORIFICS.has(word.replace(/\.+$/, '')))
    .join(' ');
}

export function normalizeLocation(location: string | null | undefined): string {
  return collapse(location ?? '');
}

export function levenshteinDistance(a: string, b: string): number {
  if (a === b) return 0;
  const m = a.length;
  const n = b.length;
  if (m === 0) return n;
  if (n === 0) return m;

  const dp: number[] = new Array<number>(n + 1);
  for (let j = 0; j <= n; j += 1) dp[j] = j;

  for (let i = 1; i <= m; i += 1) {
    let prev = dp[0] ?? 0;
    dp[0] = i;
    for (let j = 1; j <= n; j += 1) {
      const temp = dp[j] ?? 0;
      const cost = a.charCodeAt(i - 1) === b.charCodeAt(j - 1) ? 0 : 1;
      dp[j] = Math.min(temp + 1, (dp[j - 1] ?? 0) + 1, prev + cost);
      prev = temp;
    }
  }
  return dp[n] ?? 0;
}

/** 1 - distance / longer length, over already-normalized strings. */
export function sequenceSimilarity(left: string, right: string): number {
  if (!left && !right) return 1;
  if (!left || !right) return 0;
  const maxLen = Math.max(left.length, right.length);
  return 1 - levenshteinDistance(left, right) / maxLen;
}

function tokenSimilarity(left: string, right: string): number | null {
  const leftTokens = left.split(' ');
  const rightTokens = right.split(' ');
  if (leftTokens.length < 2 || rightTokens.length < 2) return null;
  const first = sequenceSimilarity(leftTokens[0] ?? '', rightTokens[0] ?? '');
  const last = sequenceSimilarity(leftTokens.at(-1) ?? '', rightTokens.at(-1) ?? '');
  return first * FIRST_TOKEN_WEIGHT + last * LAST_TOKEN_WEIGHT;
}

function round(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

export function scoreNames(
  nameA: string,
  nameB: string,
  attributes: { a?: ScoringAttributes; b?: ScoringAttributes } = {},
  options: SimilarityOptions = {},
): number {
  const strip = options.stripHonorifics ?? true;
  const left = normalizeName(nameA, strip);
  const right = normalizeName(nameB, strip);
  if (left === right) return 1;

  const full = sequenceSimilarity(left, right);
  const tokens = tokenSimilarity(left, right);
  let score = tokens === null ? full : Math.max(full, tokens);

  const locationA = normalizeLocation(attributes.a?.location);
  const locationB = normalizeLocation(attributes.b?.location);
  if (locationA && locationA === locationB) {
    score += Math.max(0, options.locationBonus ?? DEFAULT_LOCATION_BONUS);
  }
  return round(Math.min(1, Math.max(0, score)));
}

export function createSimilarityScorer(options: SimilarityOptions = {}): SimilarityScorer {
  return {
    score: (nameA, nameB, attributes) => scoreNames(nameA, nameB, attributes, options),
  };
}
