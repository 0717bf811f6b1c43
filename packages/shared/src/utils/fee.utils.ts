// ============================================================================
// Patient Records: Fee Utilities
// ============================================================================

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parses a fee entered on a form.
 *
 * Accepts plain decimal notation (optionally with an exponent). Returns null
 * for anything that does not parse, for negative amounts and for non-finite
 * values.
 */
export function validateFee(fee: string): number | null {
  if (typeof fee !== 'string') {
    return null;
  }

  const trimmed = fee.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return null;
  }

  const value = Number.parseFloat(trimmed);
  if (!Number.isFinite(value) || value < 0) {
    return null;
  }
  // "-0" parses to -0; store it as 0
  return value === 0 ? 0 : value;
}

/** Two-decimal display form; an unspecified fee renders as an empty string. */
export function formatFee(fee: number | null | undefined): string {
  return fee == null ? '' : fee.toFixed(2);
}
