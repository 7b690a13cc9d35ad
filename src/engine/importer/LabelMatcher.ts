/**
 * LabelMatcher
 *
 * Permissive matching of externally supplied material names ("plastic_shreds",
 * "PLASTIC", "sawdust_kg") against the registry's canonical labels.
 *
 * A key matches a label when either:
 *  - the lowercased label contains the normalized key, or
 *  - the normalized key contains the first word of the lowercased label.
 *
 * One key can match several labels, and short or generic keys can match
 * labels they were not meant for. There is no tie-breaking: every match is
 * returned, in registry order. The empty key is contained in every label
 * and so matches all of them.
 */

const DECIMAL_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Lowercase and turn underscores into spaces. */
export function normalizeExternalKey(key: string): string {
  return key.toLowerCase().replace(/_/g, ' ');
}

function firstWord(text: string): string {
  return text.split(/\s+/)[0] ?? '';
}

export function matchLabels(externalKey: string, labels: readonly string[]): string[] {
  const normalized = normalizeExternalKey(externalKey);
  return labels.filter(label => {
    const lower = label.toLowerCase();
    return lower.includes(normalized) || normalized.includes(firstWord(lower));
  });
}

/**
 * Best-effort numeric coercion of an import value.
 *
 * Numbers pass through; decimal strings (surrounding whitespace allowed) are
 * parsed. Anything else, including non-finite numbers, yields undefined.
 */
export function coerceQuantity(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!DECIMAL_RE.test(trimmed)) return undefined;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}
