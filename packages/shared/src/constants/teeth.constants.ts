// ============================================================================
// Teeth Selection: Constants
// ============================================================================

// --- Quadrant Prefixes ---

export const ToothQuadrant = {
  UPPER_LEFT: 'UL',
  UPPER_RIGHT: 'UR',
  LOWER_LEFT: 'LL',
  LOWER_RIGHT: 'LR',
} as const;

export type ToothQuadrant = (typeof ToothQuadrant)[keyof typeof ToothQuadrant];

// Presentation order: upper row first, left before right.
export const QUADRANT_ORDER: readonly ToothQuadrant[] = Object.freeze([
  ToothQuadrant.UPPER_LEFT,
  ToothQuadrant.UPPER_RIGHT,
  ToothQuadrant.LOWER_LEFT,
  ToothQuadrant.LOWER_RIGHT,
]);

export const QUADRANT_LABELS: Readonly<Record<ToothQuadrant, string>> =
  Object.freeze({
    UL: 'Upper Left',
    UR: 'Upper Right',
    LL: 'Lower Left',
    LR: 'Lower Right',
  });

export const TEETH_PER_QUADRANT = 8;

export const TEETH_SEPARATOR = ', ';
