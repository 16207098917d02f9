import { ValidationError, err, ok, type Result } from './errors'

export type BlastRadius = 'low' | 'medium' | 'high'

export const BLAST_RADII: readonly BlastRadius[] = ['low', 'medium', 'high']

export interface SafetyProfile {
  /** Tolerated error rate for changes from this agent type, 0..1 */
  errorThreshold: number
  needsConsensus: boolean
  maxBlastRadius: BlastRadius
  autoRollback: boolean
  /** Historical success rate, feeds the priority formula */
  successRate: number
  /** Relative execution cost, feeds the priority formula */
  costFactor: number
}

export const DEFAULT_SAFETY_PROFILE: Readonly<SafetyProfile> = Object.freeze({
  errorThreshold: 0.05,
  needsConsensus: false,
  maxBlastRadius: 'low',
  autoRollback: true,
  successRate: 0.9,
  costFactor: 1.0,
})

export function validateSafetyProfile(
  profile: SafetyProfile
): Result<SafetyProfile, ValidationError> {
  if (
    !Number.isFinite(profile.errorThreshold) ||
    profile.errorThreshold < 0 ||
    profile.errorThreshold > 1
  ) {
    return err(
      new ValidationError(
        'error_threshold_out_of_range',
        `errorThreshold must be within [0, 1], got ${profile.errorThreshold}`
      )
    )
  }
  if (!BLAST_RADII.includes(profile.maxBlastRadius)) {
    return err(
      new ValidationError(
        'invalid_profile',
        `maxBlastRadius must be one of ${BLAST_RADII.join(', ')}`
      )
    )
  }
  const { successRate } = profile
  if (!Number.isFinite(successRate) || successRate <= 0 || successRate > 1) {
    return err(new ValidationError('invalid_profile', 'successRate must be within (0, 1]'))
  }
  if (!Number.isFinite(profile.costFactor) || profile.costFactor <= 0) {
    return err(new ValidationError('invalid_profile', 'costFactor must be greater than 0'))
  }
  return ok(profile)
}
