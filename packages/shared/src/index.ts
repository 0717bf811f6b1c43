export {
  PHONE_NUMBER_PATTERN,
  TreatmentType,
  TREATMENT_TYPES,
  DENTISTS,
  RecordEvent,
  NO_REMINDERS_MESSAGE,
  DEFAULT_REFRESH_INTERVAL_MS,
} from './constants/patient.constants.js';

export {
  ToothQuadrant,
  QUADRANT_ORDER,
  QUADRANT_LABELS,
  TEETH_PER_QUADRANT,
  TEETH_SEPARATOR,
} from './constants/teeth.constants.js';

export {
  parseTeeth,
  toggleTooth,
  serializeTeeth,
  normalizeTeeth,
  isValidToothId,
  getQuadrantLayout,
} from './utils/teeth.utils.js';
export type { ToothId, TeethSelection, QuadrantLayout } from './utils/teeth.utils.js';

export { validatePhone, maskPhone } from './utils/phone.utils.js';
export { validateFee, formatFee } from './utils/fee.utils.js';
export { formatDate, isCalendarDate } from './utils/date.utils.js';
