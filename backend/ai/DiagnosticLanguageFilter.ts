// Detects text that asserts a diagnosis ("you have X", "Xと診断されます").
// Disclaiming phrases ("this is not a diagnosis", 診断ではありません) are removed
// before matching so that a proper disclaimer never trips the filter.

const DISCLAIMER_PATTERNS: readonly RegExp[] = [
  /(?:this\s+is\s+|it\s+is\s+|is\s+)?not\s+(?:a\s+)?(?:medical\s+)?diagnos(?:is|e|ed)/gi,
  /(?:cannot|can't|do(?:es)?\s+not|will\s+not)\s+(?:provide\s+(?:a\s+)?)?diagnos(?:is|e)/gi,
  /only\s+a\s+(?:physician|doctor|clinician)\s+can\s+diagnose/gi,
  /診断(?:では|じゃ)(?:ありません|ない)/g,
  /診断(?:を|は)?(?:行い|行え|でき|し)(?:ません|ない)/g,
  /診断(?:する|できる)のは医師/g,
  /医師(?:の|による)診断/g,
];

const ASSERTION_PATTERNS: readonly RegExp[] = [
  /\byou\s+(?:likely\s+|probably\s+|may\s+|might\s+)?(?:have|are\s+suffering\s+from)\s+(?:an?\s+)?[a-z-]*(?:itis|osis|emia|oma|pathy|disease|syndrome|infection|disorder|cancer|fracture)\b/i,
  /\bdiagnos(?:ed|is)\s+(?:with|of|is)\b/i,
  /\b(?:consistent|compatible)\s+with\s+(?:an?\s+)?[a-z-]*(?:itis|osis|disease|syndrome|infection)\b/i,
  /\b(?:most\s+likely|probably|likely)\s+(?:an?\s+)?[a-z-]*(?:itis|osis|disease|syndrome|infection)\b/i,
  /と診断/,
  /(?:の|である)可能性が(?:高い|あります|考えられ)/,
  /の疑い(?:があります|が強い|が濃厚)/,
  /(?:病|症|炎|癌|がん)(?:です|でしょう|だと思われます|と考えられます)/,
];

function stripDisclaimers(text: string): string {
  return DISCLAIMER_PATTERNS.reduce((acc, re) => acc.replace(re, " "), text);
}

// Returns the first offending phrase, or null when the text is clean.
export function findDiagnosticLanguage(text: string): string | null {
  const cleaned = stripDisclaimers(text.normalize("NFKC"));
  for (const re of ASSERTION_PATTERNS) {
    const m = re.exec(cleaned);
    if (m) return m[0];
  }
  return null;
}

export function containsDiagnosticLanguage(text: string): boolean {
  return findDiagnosticLanguage(text) !== null;
}
