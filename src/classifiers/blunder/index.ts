/**
 * Blunder Classifier Module
 */

export { BlunderDetector, blunderDetector } from './BlunderDetector.js';
export type { BlunderContext } from './BlunderDetector.js';
export {
  BLUNDER_THRESHOLDS,
  type BlunderResult,
  type BlunderSkipReason,
} from './BlunderThresholds.js';
