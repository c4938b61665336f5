import type { ConstraintProfile } from './constraint-profile'

/**
 * Sign name -> constraint profile. Profiles are immutable once registered.
 * A missing profile is not an error: callers fall back to generic guidance.
 */
export class ProfileRegistry {
  private readonly profiles = new Map<string, ConstraintProfile>()

  constructor(profiles: readonly ConstraintProfile[] = []) {
    this.registerAll(profiles)
  }

  register(profile: ConstraintProfile): void {
    const existing = this.profiles.get(profile.signName)
    if (existing === profile) {
      return
    }
    if (existing) {
      console.warn(`[ProfileRegistry] Replacing constraint profile for '${profile.signName}'`)
    }
    this.profiles.set(profile.signName, profile)
  }

  registerAll(profiles: readonly ConstraintProfile[]): void {
    for (const profile of profiles) {
      this.register(profile)
    }
  }

  /** Exact name first, then the upper-cased name ("a" finds "A"). */
  get(signName: string): ConstraintProfile | null {
    return this.profiles.get(signName) ?? this.profiles.get(signName.toUpperCase()) ?? null
  }

  has(signName: string): boolean {
    return this.get(signName) !== null
  }

  names(): readonly string[] {
    return [...this.profiles.keys()]
  }

  get size(): number {
    return this.profiles.size
  }

  clear(): void {
    this.profiles.clear()
  }
}
