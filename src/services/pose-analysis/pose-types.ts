import type { Point3D, Vector3 } from '@/utils/math'
import type { Finger } from '@/services/hand-tracking/hand-types'

export type Severity = 'none' | 'minor' | 'major'

export const SEVERITY_RANK: Record<Severity, number> = {
  none: 0,
  minor: 1,
  major: 2,
}

export type FingerShapeState = 'extended' | 'curved' | 'closed'

export type SemanticErrorType = 'NEEDS_CURVE' | 'NEEDS_FIST' | 'TOO_MUCH_CURL' | 'NEEDS_EXTEND'

export type LegacyCurlErrorType = 'TOO_EXTENDED' | 'TOO_CURLED'

export type PositionalErrorType =
  | 'SPREAD_TOO_NARROW'
  | 'SPREAD_TOO_WIDE'
  | 'SHOULD_TOUCH'
  | 'SHOULD_NOT_TOUCH'
  | 'THUMB_POSITION_WRONG'
  | 'ROTATION_WRONG'

export type FingerErrorType = SemanticErrorType | LegacyCurlErrorType | PositionalErrorType

export interface FingerError {
  readonly finger: Finger
  readonly errorType: FingerErrorType
  readonly severity: Exclude<Severity, 'none'>
  readonly currentValue: number
  readonly expectedValue: number
  readonly message: string
  /** True when `message` came from a profile template rather than the dictionary. */
  readonly isCustomMessage: boolean
}

export interface StaticGestureResult {
  readonly isMatchGlobal: boolean
  readonly perFingerErrors: readonly FingerError[]
  readonly majorErrorCount: number
  readonly minorErrorCount: number
  readonly matchScore: number
  readonly isNearMatch: boolean
  readonly summaryMessage: string
}

/**
 * Geometry of one hand captured in a single tick. Every evaluator input
 * comes from the same snapshot.
 */
export interface HandSnapshot {
  readonly curls: Readonly<Record<Finger, number>>
  /** Unit proximal-to-tip direction per finger, null until first observed. */
  readonly directions: Readonly<Record<Finger, Vector3 | null>>
  readonly tipPositions: Readonly<Record<Finger, Point3D | null>>
  readonly proximalPositions: Readonly<Record<Finger, Point3D | null>>
  readonly palmForward: Vector3 | null
}

export function computeMatchScore(majorCount: number, minorCount: number): number {
  return Math.max(0, Math.min(1, 1 - 0.3 * majorCount - 0.1 * minorCount))
}

export function buildStaticResult(
  errors: readonly FingerError[],
  isMatchGlobal: boolean,
  summaryMessage = '',
): StaticGestureResult {
  let majorErrorCount = 0
  let minorErrorCount = 0
  for (const error of errors) {
    if (error.severity === 'major') {
      majorErrorCount++
    } else {
      minorErrorCount++
    }
  }

  return {
    isMatchGlobal,
    perFingerErrors: errors,
    majorErrorCount,
    minorErrorCount,
    matchScore: computeMatchScore(majorErrorCount, minorErrorCount),
    isNearMatch: majorErrorCount === 0 && minorErrorCount > 0,
    summaryMessage,
  }
}

export function createSuccessResult(summaryMessage = ''): StaticGestureResult {
  return buildStaticResult([], true, summaryMessage)
}

export function withSummary(result: StaticGestureResult, summaryMessage: string): StaticGestureResult {
  return { ...result, summaryMessage }
}

/** Most severe error reported for `finger`; the earliest wins a tie. */
export function getErrorForFinger(result: StaticGestureResult, finger: Finger): FingerError | null {
  let worst: FingerError | null = null
  for (const error of result.perFingerErrors) {
    if (error.finger !== finger) {
      continue
    }
    if (worst === null || SEVERITY_RANK[error.severity] > SEVERITY_RANK[worst.severity]) {
      worst = error
    }
  }
  return worst
}
