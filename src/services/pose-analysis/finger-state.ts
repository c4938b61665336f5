import type { FingerShapeState, SemanticErrorType } from './pose-types'

export const EXTENDED_MAX_CURL = 0.3
export const CURVED_MAX_CURL = 0.72

export function getFingerShapeState(curl: number): FingerShapeState {
  if (curl < EXTENDED_MAX_CURL) {
    return 'extended'
  }
  if (curl <= CURVED_MAX_CURL) {
    return 'curved'
  }
  return 'closed'
}

/**
 * Corrective action needed to move a finger from `current` to `expected`,
 * or null when both are already in the same bucket.
 */
export function getSemanticErrorType(
  current: FingerShapeState,
  expected: FingerShapeState,
): SemanticErrorType | null {
  if (current === expected) {
    return null
  }

  switch (expected) {
    case 'curved':
      return current === 'extended' ? 'NEEDS_CURVE' : 'TOO_MUCH_CURL'
    case 'closed':
      return 'NEEDS_FIST'
    case 'extended':
      return 'NEEDS_EXTEND'
  }
}
