// ============================================================================
// Teeth Selection Model
// ============================================================================

import {
  QUADRANT_LABELS,
  QUADRANT_ORDER,
  TEETH_PER_QUADRANT,
  TEETH_SEPARATOR,
  ToothQuadrant,
} from '../constants/teeth.constants.js';

/**
 * A tooth identifier such as "UL3". Parsed selections are kept as opaque
 * strings; use {@link isValidToothId} where the shape matters.
 */
export type ToothId = string;

export type TeethSelection = ReadonlySet<ToothId>;

export interface QuadrantLayout {
  quadrant: ToothQuadrant;
  label: string;
  /** Positions in on-screen order (left to right). */
  positions: number[];
  /** Tooth identifiers in the same order as `positions`. */
  teeth: ToothId[];
}

const TOOTH_ID_PATTERN = /^(UL|UR|LL|LR)[1-8]$/;

/**
 * Parses a stored teeth-location string into a selection.
 *
 * Splits on commas, trims each token and drops empty ones. Token shape is not
 * checked, so "UL9" or "foo" survive a parse/serialize cycle unchanged.
 */
export function parseTeeth(serialized: string | null | undefined): TeethSelection {
  const selection = new Set<ToothId>();
  if (!serialized) {
    return selection;
  }

  for (const raw of serialized.split(',')) {
    const token = raw.trim();
    if (token) {
      selection.add(token);
    }
  }
  return selection;
}

/**
 * Returns a new selection with `toothId` removed if present, added otherwise.
 */
export function toggleTooth(selection: TeethSelection, toothId: ToothId): TeethSelection {
  const next = new Set(selection);
  if (next.has(toothId)) {
    next.delete(toothId);
  } else {
    next.add(toothId);
  }
  return next;
}

/**
 * Canonical form: tokens sorted lexicographically, joined with ", ".
 * An empty selection serializes to "".
 */
export function serializeTeeth(selection: Iterable<ToothId>): string {
  return [...new Set(selection)].sort().join(TEETH_SEPARATOR);
}

/** Re-serializes a stored string into canonical form. */
export function normalizeTeeth(serialized: string | null | undefined): string {
  return serializeTeeth(parseTeeth(serialized));
}

export function isValidToothId(token: string): boolean {
  return TOOTH_ID_PATTERN.test(token);
}

/**
 * Display layout for a teeth picker. Left-side quadrants run 8 → 1 and
 * right-side quadrants 1 → 8, mirroring a dental chart. Serialized order is
 * unaffected.
 */
export function getQuadrantLayout(): QuadrantLayout[] {
  const ascending = Array.from({ length: TEETH_PER_QUADRANT }, (_, i) => i + 1);

  return QUADRANT_ORDER.map((quadrant) => {
    const isLeft =
      quadrant === ToothQuadrant.UPPER_LEFT || quadrant === ToothQuadrant.LOWER_LEFT;
    const positions = isLeft ? [...ascending].reverse() : [...ascending];
    return {
      quadrant,
      label: QUADRANT_LABELS[quadrant],
      positions,
      teeth: positions.map((position) => `${quadrant}${position}`),
    };
  });
}
