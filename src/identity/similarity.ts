/** Common TLD misspellings and the TLD they stand for. */
export const DOMAIN_TYPO_CORRECTIONS: Readonly<Record<string, string>> = {
  con: 'com',
  cmo: 'com',
  ocm: 'com',
  om: 'com',
  comm: 'com',
  xom: 'com',
  vom: 'com',
  'coм': 'com', // Cyrillic em
  og: 'org',
  ogr: 'org',
  rog: 'org',
  ner: 'net',
  nte: 'net',
  met: 'net',
  eud: 'edu',
  deu: 'edu',
};

export function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));

  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      dp[i][j] = a[i - 1] === b[j - 1]
        ? dp[i - 1][j - 1]
        : 1 + Math.min(dp[i - 1][j], dp[i][j - 1], dp[i - 1][j - 1]);
    }
  }
  return dp[m][n];
}

/** 1 - distance / longer length, in [0, 1]. Zero when either side is empty. */
export function similarity(a: string, b: string): number {
  if (!a || !b) return 0;
  const maxLen = Math.max(a.length, b.length);
  return 1 - levenshtein(a, b) / maxLen;
}

/**
 * Replace a misspelled TLD (the part after the last dot).
 * Works on a bare domain or a whole address: 'icloud.cmo' -> 'icloud.com'.
 */
export function fixDomainTypo(domain: string): string {
  if (!domain) return domain;
  const lower = domain.toLowerCase();
  const dot = lower.lastIndexOf('.');
  if (dot < 0) return lower;

  const tld = lower.slice(dot + 1);
  const corrected = Object.hasOwn(DOMAIN_TYPO_CORRECTIONS, tld) ? DOMAIN_TYPO_CORRECTIONS[tld] : undefined;
  return corrected ? `${lower.slice(0, dot)}.${corrected}` : lower;
}

export function domainsMatchWithTypoTolerance(a: string | null, b: string | null): boolean {
  if (!a || !b) return false;
  return fixDomainTypo(a) === fixDomainTypo(b);
}
