// ============================================================================
// Form Reference Data: Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import { isValidToothId } from '../utils/teeth.utils.js';

// --- Toggle Tooth ---

export const toggleToothSchema = z.object({
  teeth_location: z.string().max(500).default(''),
  tooth: z.string().refine(isValidToothId, { message: 'Unknown tooth identifier' }),
});

export type ToggleTooth = z.infer<typeof toggleToothSchema>;
