import { magnitude, toRadians } from '@/utils/math'
import type { DynamicGestureDefinition } from './gesture-definition-registry'
import type { DynamicMetrics, DynamicMovementIssue, FailureReason } from './dynamic-types'

const SPEED_TOO_SLOW_FACTOR = 0.5
const SPEED_TOO_FAST_FACTOR = 1.5
const EXPECTED_MAX_SPEED_FACTOR = 3
const DISTANCE_SHORT_FACTOR = 0.5
const MIN_DURATION_FOR_DISTANCE_CHECK_S = 0.3
const ROTATION_LOW_FACTOR = 0.7
const CIRCULARITY_LOW_FACTOR = 0.7

export interface MovementRequirements {
  readonly expectedMinSpeed: number
  /** 0 disables the too-fast check. */
  readonly expectedMaxSpeed: number
  readonly expectedMinDistance: number
  readonly requiresSpecificDirection: boolean
  readonly minDirectionAlignment: number
  readonly requiresRotation: boolean
  readonly minRotationAngle: number
  readonly requiresCircular: boolean
  readonly minCircularityScore: number
  readonly requiresDirectionChanges: boolean
  readonly requiredChanges: number
}

export function movementRequirementsFor(definition: DynamicGestureDefinition): MovementRequirements {
  return {
    expectedMinSpeed: definition.minSpeed,
    expectedMaxSpeed: definition.minSpeed * EXPECTED_MAX_SPEED_FACTOR,
    expectedMinDistance: definition.minDistance,
    requiresSpecificDirection:
      definition.requiresSpecificDirection && magnitude(definition.primaryDirection) > 0,
    minDirectionAlignment: Math.cos(toRadians(definition.directionTolerance)),
    requiresRotation: definition.requiresRotation,
    minRotationAngle: definition.minRotationAngle,
    requiresCircular: definition.requiresCircularMotion,
    minCircularityScore: definition.minCircularityScore,
    requiresDirectionChanges: definition.requiresDirectionChange,
    requiredChanges: definition.requiredDirectionChanges,
  }
}

/**
 * The single most important problem with the current motion. Checks run in
 * priority order and the first hit wins.
 */
export function detectMovementIssue(
  metrics: DynamicMetrics,
  requirements: MovementRequirements,
): DynamicMovementIssue {
  if (!metrics.handShapeStable) {
    return 'START_POSE_DEGRADING'
  }

  if (metrics.averageSpeed < requirements.expectedMinSpeed * SPEED_TOO_SLOW_FACTOR) {
    return 'TOO_SLOW'
  }

  if (
    requirements.expectedMaxSpeed > 0 &&
    metrics.maxSpeed > requirements.expectedMaxSpeed * SPEED_TOO_FAST_FACTOR
  ) {
    return 'TOO_FAST'
  }

  if (
    requirements.requiresSpecificDirection &&
    metrics.directionAlignment < requirements.minDirectionAlignment
  ) {
    return 'DIRECTION_WRONG'
  }

  if (
    metrics.duration > MIN_DURATION_FOR_DISTANCE_CHECK_S &&
    metrics.totalDistance < requirements.expectedMinDistance * DISTANCE_SHORT_FACTOR
  ) {
    return 'TOO_SHORT'
  }

  if (
    requirements.requiresRotation &&
    metrics.totalRotation < requirements.minRotationAngle * ROTATION_LOW_FACTOR
  ) {
    return 'ROTATION_INSUFFICIENT'
  }

  if (
    requirements.requiresCircular &&
    metrics.circularityScore < requirements.minCircularityScore * CIRCULARITY_LOW_FACTOR
  ) {
    return 'NOT_CIRCULAR'
  }

  if (
    requirements.requiresDirectionChanges &&
    metrics.directionChanges < requirements.requiredChanges
  ) {
    return 'NEED_MORE_DIRECTION_CHANGES'
  }

  return 'NONE'
}

export function mapFailureReasonToIssue(reason: FailureReason): DynamicMovementIssue {
  switch (reason) {
    case 'SPEED_TOO_LOW':
    case 'TIMEOUT':
      return 'TOO_SLOW'
    case 'SPEED_TOO_HIGH':
      return 'TOO_FAST'
    case 'DISTANCE_TOO_SHORT':
      return 'TOO_SHORT'
    case 'DIRECTION_WRONG':
    case 'OUT_OF_ZONE':
      return 'DIRECTION_WRONG'
    case 'DIRECTION_CHANGES_INSUFFICIENT':
      return 'NEED_MORE_DIRECTION_CHANGES'
    case 'ROTATION_INSUFFICIENT':
      return 'ROTATION_INSUFFICIENT'
    case 'NOT_CIRCULAR':
      return 'NOT_CIRCULAR'
    case 'POSE_LOST':
    case 'END_POSE_MISMATCH':
    case 'TRACKING_LOST':
    case 'UNKNOWN':
      return 'NONE'
  }
}
