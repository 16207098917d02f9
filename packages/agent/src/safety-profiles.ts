import {
  DEFAULT_SAFETY_PROFILE,
  ValidationError,
  err,
  ok,
  validateSafetyProfile,
  type Result,
  type SafetyProfile,
} from '@fleetwise/core'

function frozenCopy(profile: SafetyProfile): Readonly<SafetyProfile> {
  return Object.freeze({ ...profile })
}

/**
 * Per-agent-type safety policy. Unregistered agent types get the default
 * profile. Every profile handed out is a frozen copy, so a snapshot attached
 * to a proposal cannot drift when the registry changes later.
 */
export class SafetyProfileRegistry {
  private profiles: Map<string, Readonly<SafetyProfile>> = new Map()

  constructor(initial?: Record<string, SafetyProfile>) {
    for (const [agentType, profile] of Object.entries(initial ?? {})) {
      const result = this.registerProfile(agentType, profile)
      if (!result.ok) throw result.error
    }
  }

  getProfile(agentType: string): Readonly<SafetyProfile> {
    return this.profiles.get(agentType) ?? DEFAULT_SAFETY_PROFILE
  }

  hasProfile(agentType: string): boolean {
    return this.profiles.has(agentType)
  }

  /** Replaces any profile already registered for the agent type. */
  registerProfile(
    agentType: string,
    profile: SafetyProfile
  ): Result<Readonly<SafetyProfile>, ValidationError> {
    if (agentType.trim() === '') {
      return err(new ValidationError('invalid_profile', 'agentType must be a non-empty string'))
    }
    const validated = validateSafetyProfile(profile)
    if (!validated.ok) return validated

    const stored = frozenCopy(validated.value)
    this.profiles.set(agentType, stored)
    return ok(stored)
  }

  /** Merges `patch` onto the current profile, or onto the default one. */
  updateProfile(
    agentType: string,
    patch: Partial<SafetyProfile>
  ): Result<Readonly<SafetyProfile>, ValidationError> {
    return this.registerProfile(agentType, { ...this.getProfile(agentType), ...patch })
  }

  listProfiles(): Record<string, Readonly<SafetyProfile>> {
    return Object.fromEntries(this.profiles)
  }
}
