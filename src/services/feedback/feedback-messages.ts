import { magnitude, normalize, type Vector3 } from '@/utils/math'
import type { Finger } from '@/services/hand-tracking/hand-types'
import type {
  FingerError,
  FingerErrorType,
  FingerShapeState,
  Severity,
} from '@/services/pose-analysis/pose-types'
import type {
  DynamicMovementIssue,
  FailureReason,
  GesturePhase,
} from '@/services/dynamic/dynamic-types'
import gestureHints from './data/gesture-hints.json'

export const PERFECT_MESSAGE = 'Perfect! Your hand is in the correct position.'
export const HAND_NOT_TRACKED_MESSAGE = 'Hand not tracked'
export const NOT_RECOGNIZED_MESSAGE = 'Not fully recognized yet, try again'
export const MOVEMENT_RECOGNIZED_MESSAGE = 'Movement recognized!'

const FINGER_NAMES: Record<Finger, string> = {
  thumb: 'thumb',
  index: 'index',
  middle: 'middle',
  ring: 'ring',
  pinky: 'pinky',
}

export function fingerName(finger: Finger): string {
  return FINGER_NAMES[finger]
}

/** "index", "index and middle", "index, middle and ring" */
export function joinFingerNames(fingers: readonly Finger[]): string {
  const names = fingers.map(fingerName)
  if (names.length <= 1) {
    return names.join('')
  }
  return `${names.slice(0, -1).join(', ')} and ${names[names.length - 1]}`
}

/** Softer wording for minor issues, direct wording for major ones. */
export function getCorrectionMessage(
  finger: Finger,
  errorType: FingerErrorType,
  severity: Severity = 'major',
): string {
  const name = fingerName(finger)
  const minor = severity === 'minor'

  switch (errorType) {
    case 'NEEDS_CURVE':
      return minor ? `Curve your ${name} a bit more` : `Curve your ${name} (don't make a fist)`
    case 'NEEDS_FIST':
      return minor ? `Close your ${name} a bit more` : `Close your ${name} into a fist`
    case 'TOO_MUCH_CURL':
      return minor ? `Relax your ${name} a bit` : `Relax your ${name}, don't make a fist`
    case 'NEEDS_EXTEND':
      return minor ? `Straighten your ${name} a bit` : `Straighten your ${name} fully`
    case 'TOO_EXTENDED':
      return minor ? `Bend your ${name} a bit more` : `Bend your ${name}`
    case 'TOO_CURLED':
      return minor ? `Straighten your ${name} a bit` : `Straighten your ${name}`
    case 'SPREAD_TOO_NARROW':
      return minor ? 'Spread your fingers a bit more' : 'Spread your fingers'
    case 'SPREAD_TOO_WIDE':
      return minor ? 'Bring your fingers a bit closer' : 'Bring your fingers together'
    case 'THUMB_POSITION_WRONG':
      return minor ? 'Adjust your thumb slightly' : 'Adjust your thumb position'
    case 'SHOULD_TOUCH':
      return minor ? `Bring your ${name} closer` : `Touch with your ${name}`
    case 'SHOULD_NOT_TOUCH':
      return minor ? `Separate your ${name} slightly` : `Separate your ${name}`
    case 'ROTATION_WRONG':
      return minor ? 'Rotate your hand slightly' : 'Rotate your hand'
  }
}

export function getStateDescription(state: FingerShapeState, finger: Finger): string {
  const name = fingerName(finger)
  switch (state) {
    case 'extended':
      return `${name} straight, like pointing`
    case 'curved':
      return `${name} curved, without touching the palm`
    case 'closed':
      return `${name} closed into a fist`
  }
}

/**
 * Major errors first, at most `maxMessages` lines. Tone depends on the mix:
 * only minor issues read as "almost there", many major ones as "start with".
 */
export function generateSummary(errors: readonly FingerError[], maxMessages = 2): string {
  const major = errors.filter((e) => e.severity === 'major')
  const minor = errors.filter((e) => e.severity === 'minor')
  const sorted = [...major, ...minor]

  if (sorted.length === 0) {
    return PERFECT_MESSAGE
  }

  let prefix = ''
  if (major.length === 0) {
    prefix = 'Almost there: '
  } else if (major.length > 2) {
    prefix = 'Start with: '
  }

  const lines = sorted
    .slice(0, maxMessages)
    .map((e) => e.message)
    .filter((message) => message.length > 0)

  return prefix + lines.join('\n')
}

// --- Dynamic gestures -------------------------------------------------------

interface GestureHint {
  readonly match: 'prefix' | 'contains'
  readonly keywords: readonly string[]
  readonly hint: string
}

function isGestureHint(value: { match: string; keywords: string[]; hint: string }): value is {
  match: 'prefix' | 'contains'
  keywords: string[]
  hint: string
} {
  return value.match === 'prefix' || value.match === 'contains'
}

const GESTURE_HINTS: readonly GestureHint[] = gestureHints.hints.filter(isGestureHint)

/** Trajectory description for well-known gestures, matched in table order. */
export function getGestureDirectionHint(gestureName: string): string | null {
  if (!gestureName) {
    return null
  }
  const upper = gestureName.toUpperCase()
  for (const entry of GESTURE_HINTS) {
    const matched = entry.keywords.some((keyword) =>
      entry.match === 'prefix' ? upper.startsWith(keyword) : upper.includes(keyword),
    )
    if (matched) {
      return entry.hint
    }
  }
  return null
}

const AXIS_THRESHOLD = 0.4

/** "up and to the right", "toward you"; y is up, z points away from the signer. */
export function describeDirection(direction: Vector3): string {
  if (magnitude(direction) < 0.1) {
    return 'in the right direction'
  }
  const dir = normalize(direction)
  const parts: string[] = []

  if (dir.y > AXIS_THRESHOLD) parts.push('up')
  else if (dir.y < -AXIS_THRESHOLD) parts.push('down')

  if (dir.x > AXIS_THRESHOLD) parts.push('to the right')
  else if (dir.x < -AXIS_THRESHOLD) parts.push('to the left')

  if (dir.z > AXIS_THRESHOLD) parts.push('forward')
  else if (dir.z < -AXIS_THRESHOLD) parts.push('toward you')

  if (parts.length === 0) {
    return 'in the right direction'
  }
  return parts.join(' and ')
}

function directionHint(gestureName: string, expectedDirection: Vector3 | null): string {
  const specific = getGestureDirectionHint(gestureName)
  if (specific) {
    return specific
  }
  if (expectedDirection && magnitude(expectedDirection) > 0.1) {
    return `Move your hand ${describeDirection(expectedDirection)}.`
  }
  return 'Adjust the direction of the movement.'
}

export function getIdlePhaseMessage(gestureName: string): string {
  return `Place your hand for '${gestureName}'.`
}

export function getStartDetectedMessage(): string {
  return 'Good! Now start the movement.'
}

export function getInProgressMessage(
  issue: DynamicMovementIssue,
  gestureName: string,
  expectedDirection: Vector3 | null = null,
): string {
  switch (issue) {
    case 'NONE':
      return 'Keep going.'
    case 'DIRECTION_WRONG':
      return directionHint(gestureName, expectedDirection)
    case 'TOO_FAST':
      return 'Slow down.'
    case 'TOO_SLOW':
      return 'Move faster.'
    case 'TOO_SHORT':
      return 'Make the movement bigger.'
    case 'NOT_CONTINUOUS':
      return "Don't stop, keep moving."
    case 'NOT_CIRCULAR':
      return 'Make the movement rounder.'
    case 'NEED_MORE_DIRECTION_CHANGES':
      return 'Move side to side more times.'
    case 'ROTATION_INSUFFICIENT':
      return 'Rotate your wrist more.'
    case 'START_POSE_DEGRADING':
      return 'Keep your hand shape.'
  }
}

export const NEAR_COMPLETION_MESSAGES: readonly string[] = [
  'Almost!',
  'Finish the movement.',
  'Just a little more.',
  'Nearly there.',
]

export function pickNearCompletionMessage(random: () => number): string {
  const index = Math.min(
    NEAR_COMPLETION_MESSAGES.length - 1,
    Math.floor(random() * NEAR_COMPLETION_MESSAGES.length),
  )
  return NEAR_COMPLETION_MESSAGES[index]
}

export function getCompletedMessage(): string {
  return MOVEMENT_RECOGNIZED_MESSAGE
}

function failureExplanation(
  reason: FailureReason,
  phase: GesturePhase,
  gestureName: string,
  expectedDirection: Vector3 | null,
): string {
  switch (reason) {
    case 'DIRECTION_WRONG': {
      const specific = getGestureDirectionHint(gestureName)
      if (specific) {
        return `The direction was not right. ${specific}`
      }
      if (expectedDirection && magnitude(expectedDirection) > 0.1) {
        return `The direction was not right. Move your hand ${describeDirection(expectedDirection)}.`
      }
      return 'The direction of the movement was not right.'
    }
    case 'SPEED_TOO_LOW':
      return 'The gesture was too slow.'
    case 'SPEED_TOO_HIGH':
      return 'The gesture was too fast.'
    case 'DISTANCE_TOO_SHORT':
      return 'The movement was too short.'
    case 'DIRECTION_CHANGES_INSUFFICIENT':
      return 'There were not enough changes of direction.'
    case 'ROTATION_INSUFFICIENT':
      return "You didn't rotate your wrist enough."
    case 'NOT_CIRCULAR':
      return 'The movement was not circular enough.'
    case 'TIMEOUT':
      return 'The gesture took too long.'
    case 'POSE_LOST':
      return phase === 'start'
        ? 'You started moving too early.'
        : 'You lost the hand shape during the movement.'
    case 'END_POSE_MISMATCH':
      return 'The final hand shape was not right.'
    case 'TRACKING_LOST':
      return 'Keep your hand visible to the camera.'
    case 'OUT_OF_ZONE':
      return 'Your hand left the tracking area.'
    case 'UNKNOWN':
      return `The movement for '${gestureName}' was not recognized.`
  }
}

export function getFailedMessage(
  reason: FailureReason,
  phase: GesturePhase,
  gestureName: string,
  expectedDirection: Vector3 | null = null,
): string {
  const explanation = failureExplanation(reason, phase, gestureName, expectedDirection)
  return `${explanation} Try again.`
}
