const SPAM_EXACT = new Set(['true', 'yes', 'spam']);
const LEGITIMATE_EXACT = new Set(['false', 'no', 'not spam', 'legitimate']);

const LEGITIMATE_MARKERS = ['not spam', 'spam: false', 'classification: legitimate', '"spam": false', "'spam': false"];
const SPAM_MARKERS = ['is spam', 'spam: true', 'classification: spam', '"spam": true', "'spam': true"];

/**
 * Read a verdict out of model output. `undefined` means the answer was
 * ambiguous; callers must not guess.
 *
 * Negative markers are checked first since "not spam" contains "spam".
 */
export function parseVerdict(raw: string): boolean | undefined {
  const normalized = raw.trim().toLowerCase();

  if (SPAM_EXACT.has(normalized)) return true;
  if (LEGITIMATE_EXACT.has(normalized)) return false;

  if (LEGITIMATE_MARKERS.some((marker) => normalized.includes(marker))) return false;
  if (SPAM_MARKERS.some((marker) => normalized.includes(marker))) return true;

  return undefined;
}
