import {
  DENTISTS,
  TREATMENT_TYPES,
} from '@dentdesk/shared/constants/patient.constants.js';
import {
  getQuadrantLayout,
  parseTeeth,
  serializeTeeth,
  toggleTooth,
  type QuadrantLayout,
} from '@dentdesk/shared/utils/teeth.utils.js';

export interface FormOptions {
  treatmentTypes: string[];
  dentists: string[];
  quadrants: QuadrantLayout[];
}

export interface TeethSelectionResult {
  teethLocation: string;
  teeth: string[];
}

/** Choices the add/modify forms offer, plus the teeth picker layout. */
export function getFormOptions(): FormOptions {
  return {
    treatmentTypes: [...TREATMENT_TYPES],
    dentists: [...DENTISTS],
    quadrants: getQuadrantLayout(),
  };
}

/**
 * Applies one click on the teeth picker to a stored selection and returns
 * the canonical result.
 */
export function applyToothToggle(
  teethLocation: string,
  tooth: string,
): TeethSelectionResult {
  const selection = toggleTooth(parseTeeth(teethLocation), tooth);
  const serialized = serializeTeeth(selection);
  return {
    teethLocation: serialized,
    teeth: [...parseTeeth(serialized)],
  };
}
