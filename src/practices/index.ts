/**
 * Practices Module
 */

export { PracticeRepository, DEFAULT_TARGET_LEVEL } from './PracticeRepository';
export {
  computeEffectiveness,
  computeLevelAfter,
  assertValidTargetDuration,
  MAX_EFFECTIVENESS,
  LEVEL_STEP,
} from './effect';
