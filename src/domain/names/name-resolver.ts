/**
 * Name Resolution Domain Logic
 *
 * Pure functions for matching free-text player queries against names that
 * sources spell with different romanizations and in different orders
 * ("Ohtani Shohei", "Otani, Shohei", "Shohei Ohtani").
 * No async I/O, no database access.
 */

/**
 * Spellings treated as the same sound. The first entry of each group is the
 * canonical form `normalizeName` rewrites the others to.
 */
export const ROMANIZATION_GROUPS: readonly (readonly string[])[] = [
  ['o', 'ou', 'oo', 'oh'],
  ['u', 'uu'],
  ['e', 'ei'],
  ['i', 'ii'],
  ['si', 'shi'],
  ['ti', 'chi'],
  ['tu', 'tsu'],
  ['hu', 'fu'],
  ['zi', 'ji', 'di'],
  ['zu', 'du'],
  ['sya', 'sha'],
  ['syu', 'shu'],
  ['syo', 'sho'],
  ['tya', 'cha'],
  ['tyu', 'chu'],
  ['tyo', 'cho'],
  ['zya', 'ja', 'dya'],
  ['zyu', 'ju', 'dyu'],
  ['zyo', 'jo', 'dyo'],
];

// Longest spellings first
const REWRITES: readonly [string, string][] = ROMANIZATION_GROUPS.flatMap(([canonical, ...others]) =>
  others.map((spelling): [string, string] => [spelling, canonical])
).sort((a, b) => b[0].length - a[0].length);

// Rewrites only shorten the string or remove f/j/d/sh/ch, so passes settle well before this.
const MAX_REWRITE_PASSES = 16;

/**
 * Lowercase, strip punctuation (letters, digits, whitespace and hyphens are
 * kept) and collapse whitespace. No romanization rewriting.
 */
export function cleanName(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s-]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
}

function applyRewrites(value: string): string {
  let current = value;
  for (let pass = 0; pass < MAX_REWRITE_PASSES; pass++) {
    let next = current;
    for (const [spelling, canonical] of REWRITES) {
      next = next.split(spelling).join(canonical);
    }
    if (next === current) return current;
    current = next;
  }
  return current;
}

/**
 * Canonical search form of a name. Idempotent.
 *
 * @example
 * normalizeName('Ohtani, Shohei') // 'otani syoe'
 * normalizeName('Otani Shouhei')  // 'otani syoe'
 */
export function normalizeName(name: string): string {
  return applyRewrites(cleanName(name));
}

/**
 * Likely alternate spellings of a name: the cleaned and normalized forms,
 * every single-cluster substitution within each romanization group, and
 * the swapped order of a two-token name.
 */
export function generateNameVariants(name: string): Set<string> {
  const cleaned = cleanName(name);
  const variants = new Set<string>([cleaned, normalizeName(cleaned)]);

  for (const group of ROMANIZATION_GROUPS) {
    for (const spelling of group) {
      if (!cleaned.includes(spelling)) continue;
      for (const replacement of group) {
        if (replacement === spelling) continue;
        variants.add(cleaned.split(spelling).join(replacement));
      }
    }
  }

  const tokens = cleaned.split(' ');
  if (tokens.length === 2) {
    const swapped = `${tokens[1]} ${tokens[0]}`;
    variants.add(swapped);
    variants.add(normalizeName(swapped));
  }

  variants.delete('');
  return variants;
}

/**
 * Whether `candidate` names the player the `query` asks for.
 *
 * Strict mode is normalized equality. Otherwise a match is also accepted when:
 * - the candidate is "Family, Given" and the query equals either part or the
 *   Western-order recombination
 * - any variant of the query equals the normalized candidate
 * - a single-token query equals any token of the candidate
 */
export function matchName(query: string, candidate: string, strict = false): boolean {
  const normalizedQuery = normalizeName(query);
  const normalizedCandidate = normalizeName(candidate);

  if (normalizedQuery === normalizedCandidate) return true;
  if (strict || normalizedQuery.length === 0) return false;

  const commaParts = candidate.split(',');
  if (commaParts.length === 2) {
    const family = commaParts[0].trim();
    const given = commaParts[1].trim();
    if (
      normalizedQuery === normalizeName(family) ||
      normalizedQuery === normalizeName(given) ||
      normalizedQuery === normalizeName(`${given} ${family}`)
    ) {
      return true;
    }
  }

  for (const variant of generateNameVariants(query)) {
    if (variant === normalizedCandidate) return true;
  }

  if (!normalizedQuery.includes(' ')) {
    const candidateTokens = cleanName(candidate.replace(/,/g, ' ')).split(' ');
    if (candidateTokens.some((token) => normalizeName(token) === normalizedQuery)) {
      return true;
    }
  }

  return false;
}

/**
 * Whether two full display names spell the same person, in either order
 * ("Taro Yamada", "Yamada, Taro", "Yamada Taro"). Unlike `matchName` a partial
 * name never matches.
 */
export function isSameName(a: string, b: string): boolean {
  const left = normalizeName(toWesternOrder(a));
  const right = normalizeName(toWesternOrder(b));
  if (!left || !right) return false;
  if (left === right) return true;

  const tokens = right.split(' ');
  return tokens.length === 2 && left === `${tokens[1]} ${tokens[0]}`;
}

/**
 * "Family, Given" to "Given Family"; any other shape is returned trimmed.
 */
export function toWesternOrder(name: string): string {
  const parts = name.split(',');
  if (parts.length !== 2) return name.trim();
  const family = parts[0].trim();
  const given = parts[1].trim();
  if (!family || !given) return name.replace(',', '').trim();
  return `${given} ${family}`;
}

/**
 * Stable slug of a display name, used where a source exposes no player id.
 * Spelling and order variants of the same name converge on one slug only when
 * they normalize identically.
 */
export function nameSlug(name: string): string {
  return normalizeName(toWesternOrder(name)).replace(/ /g, '-');
}
