import type { Vector3 } from '@/utils/math'
import type { Finger } from '@/services/hand-tracking/hand-types'
import type { FingerErrorType, FingerShapeState, Severity } from '@/services/pose-analysis/pose-types'
import { getFingerShapeState } from '@/services/pose-analysis/finger-state'

export type ConstraintSeverity = Exclude<Severity, 'none'>

export interface CurlConstraint {
  /** 0 = straight, 1 = fully folded. */
  readonly minCurl: number
  readonly maxCurl: number
  readonly enabled: boolean
  readonly severity: ConstraintSeverity
}

export interface SpreadConstraint {
  /** Degrees between this finger and the next one, within [-30, 30]. */
  readonly minAngle: number
  readonly maxAngle: number
  readonly enabled: boolean
  readonly severity: ConstraintSeverity
}

export interface FingerMessages {
  readonly needsCurve?: string
  readonly needsFist?: string
  readonly tooMuchCurl?: string
  readonly needsExtend?: string
  readonly tooExtended?: string
  readonly tooCurled?: string
  readonly generic?: string
}

export interface FingerConstraint {
  readonly curl: CurlConstraint
  readonly spread: SpreadConstraint
  /** Declared semantic target; derived from the curl range when absent. */
  readonly expectedState?: FingerShapeState
  readonly messages: FingerMessages
}

export interface ThumbConstraint extends FingerConstraint {
  readonly shouldTouchIndex: boolean
  readonly shouldTouchMiddle: boolean
  readonly shouldTouchRing: boolean
  readonly shouldTouchPinky: boolean
  readonly shouldBeOverFingers: boolean
  readonly shouldBeBesideFingers: boolean
}

export interface OrientationCheck {
  readonly expectedPalmDirection: Vector3
  readonly toleranceDeg: number
}

export interface ProfileFingers {
  readonly thumb: ThumbConstraint
  readonly index: FingerConstraint
  readonly middle: FingerConstraint
  readonly ring: FingerConstraint
  readonly pinky: FingerConstraint
}

export interface ConstraintProfile {
  readonly signName: string
  readonly description: string
  readonly fingers: ProfileFingers
  readonly orientation: OrientationCheck | null
}

export const DEFAULT_CURL_CONSTRAINT: CurlConstraint = {
  minCurl: 0,
  maxCurl: 1,
  enabled: true,
  severity: 'major',
}

export const DEFAULT_SPREAD_CONSTRAINT: SpreadConstraint = {
  minAngle: -15,
  maxAngle: 15,
  enabled: false,
  severity: 'minor',
}

export const DEFAULT_ORIENTATION_TOLERANCE_DEG = 45

export function createCurlConstraint(
  minCurl: number,
  maxCurl: number,
  severity: ConstraintSeverity = 'major',
): CurlConstraint {
  return { minCurl, maxCurl, enabled: true, severity }
}

export function createFingerConstraint(overrides?: Partial<FingerConstraint>): FingerConstraint {
  return {
    curl: DEFAULT_CURL_CONSTRAINT,
    spread: DEFAULT_SPREAD_CONSTRAINT,
    messages: {},
    ...overrides,
  }
}

export function createThumbConstraint(overrides?: Partial<ThumbConstraint>): ThumbConstraint {
  return {
    ...createFingerConstraint(),
    shouldTouchIndex: false,
    shouldTouchMiddle: false,
    shouldTouchRing: false,
    shouldTouchPinky: false,
    shouldBeOverFingers: false,
    shouldBeBesideFingers: false,
    ...overrides,
  }
}

export function extendedConstraint(): FingerConstraint {
  return createFingerConstraint({ curl: createCurlConstraint(0, 0.25) })
}

export function curledConstraint(): FingerConstraint {
  return createFingerConstraint({ curl: createCurlConstraint(0.7, 1) })
}

export function partiallyCurledConstraint(): FingerConstraint {
  return createFingerConstraint({ curl: createCurlConstraint(0.3, 0.7) })
}

export interface ProfileInit {
  readonly signName: string
  readonly description?: string
  readonly fingers?: Partial<ProfileFingers>
  readonly orientation?: OrientationCheck | null
}

/** Unspecified fingers accept any curl. */
export function createProfile(init: ProfileInit): ConstraintProfile {
  return {
    signName: init.signName,
    description: init.description ?? '',
    fingers: {
      thumb: init.fingers?.thumb ?? createThumbConstraint(),
      index: init.fingers?.index ?? createFingerConstraint(),
      middle: init.fingers?.middle ?? createFingerConstraint(),
      ring: init.fingers?.ring ?? createFingerConstraint(),
      pinky: init.fingers?.pinky ?? createFingerConstraint(),
    },
    orientation: init.orientation ?? null,
  }
}

export function getFingerConstraint(profile: ConstraintProfile, finger: Finger): FingerConstraint {
  return profile.fingers[finger]
}

export function getCurlMidpoint(curl: CurlConstraint): number {
  return (curl.minCurl + curl.maxCurl) / 2
}

export function getExpectedState(constraint: FingerConstraint): FingerShapeState {
  return constraint.expectedState ?? getFingerShapeState(getCurlMidpoint(constraint.curl))
}

export function getThumbTouchTargets(thumb: ThumbConstraint): readonly Finger[] {
  const targets: Finger[] = []
  if (thumb.shouldTouchIndex) targets.push('index')
  if (thumb.shouldTouchMiddle) targets.push('middle')
  if (thumb.shouldTouchRing) targets.push('ring')
  if (thumb.shouldTouchPinky) targets.push('pinky')
  return targets
}

/**
 * Profile template for an error. Curl errors fall back from the semantic role
 * to its legacy counterpart; `generic` only covers non-curl errors.
 */
export function getCustomMessage(
  constraint: FingerConstraint,
  errorType: FingerErrorType,
): string | null {
  const { messages } = constraint
  switch (errorType) {
    case 'NEEDS_CURVE':
      return messages.needsCurve ?? messages.tooExtended ?? null
    case 'NEEDS_FIST':
      return messages.needsFist ?? messages.tooExtended ?? null
    case 'TOO_MUCH_CURL':
      return messages.tooMuchCurl ?? messages.tooCurled ?? null
    case 'NEEDS_EXTEND':
      return messages.needsExtend ?? messages.tooCurled ?? null
    case 'TOO_EXTENDED':
      return messages.tooExtended ?? null
    case 'TOO_CURLED':
      return messages.tooCurled ?? null
    case 'SPREAD_TOO_NARROW':
    case 'SPREAD_TOO_WIDE':
    case 'SHOULD_TOUCH':
    case 'SHOULD_NOT_TOUCH':
    case 'THUMB_POSITION_WRONG':
    case 'ROTATION_WRONG':
      return messages.generic ?? null
  }
}
