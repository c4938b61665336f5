import { readFile } from 'node:fs/promises'
import alphabetProfiles from './data/alphabet-profiles.json'
import digitProfiles from './data/digit-profiles.json'
import type { ConstraintProfile } from './constraint-profile'
import { ProfileRegistry } from './profile-registry'
import { parseProfileSet, ProfileValidationError } from './profile-schema'

export interface BuiltinProfileOptions {
  readonly alphabet: boolean
  readonly digits: boolean
}

const DEFAULT_BUILTIN_OPTIONS: BuiltinProfileOptions = {
  alphabet: true,
  digits: true,
}

export function loadBuiltinProfiles(
  options?: Partial<BuiltinProfileOptions>,
): ConstraintProfile[] {
  const fullOptions = { ...DEFAULT_BUILTIN_OPTIONS, ...options }
  const profiles: ConstraintProfile[] = []

  if (fullOptions.alphabet) {
    profiles.push(...parseProfileSet(alphabetProfiles, 'alphabet-profiles.json'))
  }
  if (fullOptions.digits) {
    profiles.push(...parseProfileSet(digitProfiles, 'digit-profiles.json'))
  }

  return profiles
}

export function createDefaultProfileRegistry(
  options?: Partial<BuiltinProfileOptions>,
): ProfileRegistry {
  return new ProfileRegistry(loadBuiltinProfiles(options))
}

/**
 * Read a `{ "profiles": [...] }` JSON file authored outside the builtin set.
 */
export async function loadProfileFile(path: string): Promise<ConstraintProfile[]> {
  const text = await readFile(path, 'utf-8')

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw new ProfileValidationError(path, [
      { code: 'custom', path: [], message: `not valid JSON (${reason})` },
    ])
  }

  return parseProfileSet(raw, path)
}
