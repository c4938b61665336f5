import { distance3D, dot, magnitude, normalize, subtract, toDegrees, vectorAngle } from '@/utils/math'
import { FINGERS, type Finger } from '@/services/hand-tracking/hand-types'
import {
  getCurlMidpoint,
  getCustomMessage,
  getThumbTouchTargets,
  type ConstraintProfile,
  type FingerConstraint,
  type ThumbConstraint,
} from '@/services/profiles/constraint-profile'
import { fingerName, getCorrectionMessage } from '@/services/feedback/feedback-messages'
import { getFingerShapeState, getSemanticErrorType } from './finger-state'
import {
  buildStaticResult,
  createSuccessResult,
  type FingerError,
  type FingerErrorType,
  type HandSnapshot,
  type Severity,
  type StaticGestureResult,
} from './pose-types'

export interface StaticPoseEvaluatorOptions {
  /** Configured curl tolerance; halved and floored before use. */
  readonly curlTolerance: number
  readonly debugMode: boolean
}

export const DEFAULT_EVALUATOR_OPTIONS: StaticPoseEvaluatorOptions = {
  curlTolerance: 0.1,
  debugMode: false,
}

export const MIN_CURL_TOLERANCE = 0.08
export const MIN_THUMB_CURL_TOLERANCE = 0.12
export const MAJOR_DEVIATION = 0.18
export const MINOR_DEVIATION = 0.08
/** A thumb "major" below this deviation is reported as minor. */
export const THUMB_MAJOR_RELAXATION = 0.25
/** m */
export const TOUCH_DISTANCE = 0.03
/** Touch is not checked while the target finger is still this straight. */
export const TOUCH_TARGET_MIN_CURL = 0.25
/** Thumb tip projection on the index→pinky knuckle axis. */
export const THUMB_BESIDE_MAX_T = 0.15
export const THUMB_OVER_MIN_T = 0.25

export function getEffectiveTolerance(curlTolerance: number, finger: Finger): number {
  const tolerance = Math.max(curlTolerance / 2, MIN_CURL_TOLERANCE)
  return finger === 'thumb' ? Math.max(tolerance, MIN_THUMB_CURL_TOLERANCE) : tolerance
}

/** Three-band severity for a deviation outside the widened range. */
export function classifyDeviation(deviation: number, finger: Finger): Severity {
  let severity: Severity = 'none'
  if (deviation > MAJOR_DEVIATION) {
    severity = 'major'
  } else if (deviation > MINOR_DEVIATION) {
    severity = 'minor'
  }
  if (finger === 'thumb' && severity === 'major' && deviation < THUMB_MAJOR_RELAXATION) {
    severity = 'minor'
  }
  return severity
}

function percent(value: number): number {
  return Math.round(value * 100)
}

function createError(
  finger: Finger,
  errorType: FingerErrorType,
  severity: Exclude<Severity, 'none'>,
  currentValue: number,
  expectedValue: number,
  constraint: FingerConstraint,
  fallbackMessage: string,
): FingerError {
  const custom = getCustomMessage(constraint, errorType)
  return {
    finger,
    errorType,
    severity,
    currentValue,
    expectedValue,
    message: custom ?? fallbackMessage,
    isCustomMessage: custom !== null,
  }
}

function evaluateCurl(
  finger: Finger,
  constraint: FingerConstraint,
  curl: number,
  options: StaticPoseEvaluatorOptions,
): FingerError | null {
  const range = constraint.curl
  if (!range.enabled) {
    return null
  }

  const tolerance = getEffectiveTolerance(options.curlTolerance, finger)
  const low = Math.max(0, range.minCurl - tolerance)
  const high = Math.min(1, range.maxCurl + tolerance)

  let deviation = 0
  let tooExtended = false
  if (curl < low) {
    deviation = low - curl
    tooExtended = true
  } else if (curl > high) {
    deviation = curl - high
  }

  // Graded from the deviation alone; the declared severity is not consulted.
  const severity = classifyDeviation(deviation, finger)
  if (severity === 'none') {
    return null
  }

  if (options.debugMode) {
    console.log(
      `[HandPoseDebug] ${finger}: curl=${curl.toFixed(2)} range=${low.toFixed(2)}-${high.toFixed(2)} deviation=${deviation.toFixed(2)}`,
    )
  }

  const expectedValue = getCurlMidpoint(range)
  const name = fingerName(finger)

  if (constraint.expectedState) {
    const semantic = getSemanticErrorType(getFingerShapeState(curl), constraint.expectedState)
    if (semantic) {
      return createError(
        finger,
        semantic,
        severity,
        curl,
        expectedValue,
        constraint,
        getCorrectionMessage(finger, semantic, severity),
      )
    }
  }

  return tooExtended
    ? createError(
        finger,
        'TOO_EXTENDED',
        severity,
        curl,
        expectedValue,
        constraint,
        `Curl your ${name} more (${percent(curl)}% -> ${percent(range.minCurl)}%+)`,
      )
    : createError(
        finger,
        'TOO_CURLED',
        severity,
        curl,
        expectedValue,
        constraint,
        `Extend your ${name} more (${percent(curl)}% -> ${percent(range.maxCurl)}%-)`,
      )
}

function evaluateSpread(profile: ConstraintProfile, snapshot: HandSnapshot): FingerError[] {
  const errors: FingerError[] = []
  for (let i = 0; i < FINGERS.length - 1; i++) {
    const finger = FINGERS[i]
    const next = FINGERS[i + 1]
    const constraint = profile.fingers[finger]
    const { spread } = constraint
    const a = snapshot.directions[finger]
    const b = snapshot.directions[next]
    if (!spread.enabled || !a || !b) {
      continue
    }

    const angle = toDegrees(vectorAngle(a, b))
    if (angle >= spread.minAngle && angle <= spread.maxAngle) {
      continue
    }
    const errorType: FingerErrorType = angle < spread.minAngle ? 'SPREAD_TOO_NARROW' : 'SPREAD_TOO_WIDE'
    errors.push(
      createError(
        finger,
        errorType,
        spread.severity,
        angle,
        (spread.minAngle + spread.maxAngle) / 2,
        constraint,
        getCorrectionMessage(finger, errorType, spread.severity),
      ),
    )
  }
  return errors
}

function evaluateThumbTouch(thumb: ThumbConstraint, snapshot: HandSnapshot): FingerError[] {
  const errors: FingerError[] = []
  const thumbTip = snapshot.tipPositions.thumb
  if (!thumbTip) {
    return errors
  }

  for (const target of getThumbTouchTargets(thumb)) {
    const targetTip = snapshot.tipPositions[target]
    if (!targetTip || snapshot.curls[target] < TOUCH_TARGET_MIN_CURL) {
      continue
    }
    const distance = distance3D(thumbTip, targetTip)
    if (distance > TOUCH_DISTANCE) {
      errors.push(
        createError(
          'thumb',
          'SHOULD_TOUCH',
          'major',
          distance,
          TOUCH_DISTANCE,
          thumb,
          `Touch your thumb to your ${fingerName(target)}`,
        ),
      )
    }
  }
  return errors
}

/**
 * Where the thumb tip falls along the knuckle line, 0 at the index knuckle and
 * 1 at the pinky knuckle. Null when the knuckles are unknown or coincide.
 */
export function thumbKnuckleProjection(snapshot: HandSnapshot): number | null {
  const tip = snapshot.tipPositions.thumb
  const indexKnuckle = snapshot.proximalPositions.index
  const pinkyKnuckle = snapshot.proximalPositions.pinky
  if (!tip || !indexKnuckle || !pinkyKnuckle) {
    return null
  }
  const axis = subtract(pinkyKnuckle, indexKnuckle)
  const lengthSq = dot(axis, axis)
  if (lengthSq === 0) {
    return null
  }
  return dot(subtract(tip, indexKnuckle), axis) / lengthSq
}

function evaluateThumbPosition(thumb: ThumbConstraint, snapshot: HandSnapshot): FingerError | null {
  if (!thumb.shouldBeBesideFingers && !thumb.shouldBeOverFingers) {
    return null
  }
  const t = thumbKnuckleProjection(snapshot)
  if (t === null) {
    return null
  }

  let expected: number | null = null
  if (thumb.shouldBeBesideFingers && t > THUMB_BESIDE_MAX_T) {
    expected = THUMB_BESIDE_MAX_T
  } else if (thumb.shouldBeOverFingers && t < THUMB_OVER_MIN_T) {
    expected = THUMB_OVER_MIN_T
  }
  if (expected === null) {
    return null
  }

  const fallback = thumb.shouldBeBesideFingers
    ? 'Keep your thumb beside your index'
    : 'Place your thumb over your fingers'
  return createError('thumb', 'THUMB_POSITION_WRONG', 'minor', t, expected, thumb, fallback)
}

function evaluateOrientation(profile: ConstraintProfile, snapshot: HandSnapshot): FingerError | null {
  const { orientation } = profile
  const palmForward = snapshot.palmForward
  if (!orientation || !palmForward) {
    return null
  }
  if (magnitude(palmForward) < 1e-4 || magnitude(orientation.expectedPalmDirection) < 1e-4) {
    return null
  }

  const angle = toDegrees(
    vectorAngle(normalize(palmForward), normalize(orientation.expectedPalmDirection)),
  )
  if (angle <= orientation.toleranceDeg) {
    return null
  }
  return createError(
    'thumb',
    'ROTATION_WRONG',
    'minor',
    angle,
    orientation.toleranceDeg,
    profile.fingers.thumb,
    getCorrectionMessage('thumb', 'ROTATION_WRONG', 'minor'),
  )
}

/**
 * Compare one hand snapshot against a sign's constraints. `isConfirmedMatch`
 * must come from an independent recognizer: this function never reports a
 * match on its own, it only lists what is wrong.
 */
export function evaluateStaticPose(
  profile: ConstraintProfile,
  snapshot: HandSnapshot,
  isConfirmedMatch: boolean,
  options?: Partial<StaticPoseEvaluatorOptions>,
): StaticGestureResult {
  if (isConfirmedMatch) {
    return createSuccessResult()
  }
  const fullOptions = { ...DEFAULT_EVALUATOR_OPTIONS, ...options }

  const errors: FingerError[] = []
  for (const finger of FINGERS) {
    const error = evaluateCurl(finger, profile.fingers[finger], snapshot.curls[finger], fullOptions)
    if (error) {
      errors.push(error)
    }
  }

  errors.push(...evaluateSpread(profile, snapshot))
  errors.push(...evaluateThumbTouch(profile.fingers.thumb, snapshot))

  const thumbPosition = evaluateThumbPosition(profile.fingers.thumb, snapshot)
  if (thumbPosition) {
    errors.push(thumbPosition)
  }

  const rotation = evaluateOrientation(profile, snapshot)
  if (rotation) {
    errors.push(rotation)
  }

  return buildStaticResult(errors, false)
}
