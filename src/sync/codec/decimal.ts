// Money amounts travel as decimal strings so no float rounding ever touches them.

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * Canonicalize a decimal amount: strips a leading "+", redundant leading
 * zeros and trailing fractional zeros ("0100.50" -> "100.5").
 */
export function normalizeDecimal(input: string): string | null {
  const trimmed = input.trim().replace(/^\+/, '');
  if (!DECIMAL_PATTERN.test(trimmed)) return null;

  const negative = trimmed.startsWith('-');
  const unsigned = negative ? trimmed.slice(1) : trimmed;
  const [rawInteger, rawFraction = ''] = unsigned.split('.');

  const integer = rawInteger.replace(/^0+(?=\d)/, '');
  const fraction = rawFraction.replace(/0+$/, '');
  const body = fraction ? `${integer}.${fraction}` : integer;

  if (/^0(\.0*)?$/.test(body)) return '0';
  return negative ? `-${body}` : body;
}

/**
 * Parse an amount from the wire. Older documents stored doubles; those go
 * through their shortest round-trip decimal form.
 */
export function parseDecimal(value: unknown): string | null {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    // Exponent notation only shows up for magnitudes no amount reaches
    const text = String(value);
    return text.includes('e') ? null : normalizeDecimal(text);
  }
  if (typeof value === 'string') {
    return normalizeDecimal(value);
  }
  return null;
}
