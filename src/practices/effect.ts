import { ValidationError } from '../core/errors';

/**
 * Practice Effect Calculation
 *
 * A logged session raises the user's level in proportion to how much of the
 * target duration was completed and the practice's level factor:
 *
 *   effectiveness = min(actual / target, 1.5)
 *   levelAfter    = levelBefore + targetLevel * effectiveness * 0.1
 *
 * Overrunning the target pays off up to 150%, after which extra minutes add
 * nothing.
 */

export const MAX_EFFECTIVENESS = 1.5;
export const LEVEL_STEP = 0.1;

/**
 * @throws ValidationError when the target duration is not a positive number
 */
export function assertValidTargetDuration(targetDuration: number): void {
  if (!Number.isFinite(targetDuration) || targetDuration <= 0) {
    throw new ValidationError(
      `Target duration must be a positive number of minutes, got ${targetDuration}`
    );
  }
}

/**
 * Ratio of actual to target duration, capped at MAX_EFFECTIVENESS
 *
 * @param actualDuration - Minutes actually practiced
 * @param targetDuration - Template's target minutes (must be > 0)
 */
export function computeEffectiveness(actualDuration: number, targetDuration: number): number {
  assertValidTargetDuration(targetDuration);
  return Math.min(actualDuration / targetDuration, MAX_EFFECTIVENESS);
}

/**
 * Level after a session
 *
 * @example
 * // 15 minutes of a 10 minute, level 1.5 practice starting from 1.0
 * computeLevelAfter(1.0, 1.5, 15, 10); // 1.225
 */
export function computeLevelAfter(
  levelBefore: number,
  targetLevel: number,
  actualDuration: number,
  targetDuration: number
): number {
  const effectiveness = computeEffectiveness(actualDuration, targetDuration);
  return levelBefore + targetLevel * effectiveness * LEVEL_STEP;
}
