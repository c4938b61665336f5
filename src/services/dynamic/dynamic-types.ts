import type { Vector3 } from '@/utils/math'

export type DynamicFeedbackPhase =
  | 'idle'
  | 'start-detected'
  | 'in-progress'
  | 'near-completion'
  | 'completed'
  | 'failed'

export type DynamicMovementIssue =
  | 'NONE'
  | 'DIRECTION_WRONG'
  | 'TOO_FAST'
  | 'TOO_SLOW'
  | 'TOO_SHORT'
  | 'NOT_CONTINUOUS'
  | 'NOT_CIRCULAR'
  | 'NEED_MORE_DIRECTION_CHANGES'
  | 'ROTATION_INSUFFICIENT'
  | 'START_POSE_DEGRADING'

export type FailureReason =
  | 'POSE_LOST'
  | 'SPEED_TOO_LOW'
  | 'SPEED_TOO_HIGH'
  | 'DISTANCE_TOO_SHORT'
  | 'DIRECTION_WRONG'
  | 'DIRECTION_CHANGES_INSUFFICIENT'
  | 'ROTATION_INSUFFICIENT'
  | 'NOT_CIRCULAR'
  | 'TIMEOUT'
  | 'END_POSE_MISMATCH'
  | 'TRACKING_LOST'
  | 'OUT_OF_ZONE'
  | 'UNKNOWN'

export type GesturePhase = 'none' | 'start' | 'move' | 'end'

/** Motion summary produced by the external tracker each tick. */
export interface DynamicMetrics {
  /** m/s */
  readonly averageSpeed: number
  readonly maxSpeed: number
  /** m */
  readonly totalDistance: number
  /** s */
  readonly duration: number
  readonly directionChanges: number
  /** degrees */
  readonly totalRotation: number
  readonly circularityScore: number
  readonly netDisplacement: Vector3
  /** Cosine between the motion and the gesture's primary direction. */
  readonly directionAlignment: number
  readonly pathStraightness: number
  readonly handShapeStable: boolean
}

export const EMPTY_METRICS: DynamicMetrics = {
  averageSpeed: 0,
  maxSpeed: 0,
  totalDistance: 0,
  duration: 0,
  directionChanges: 0,
  totalRotation: 0,
  circularityScore: 0,
  netDisplacement: { x: 0, y: 0, z: 0 },
  directionAlignment: 0,
  pathStraightness: 0,
  handShapeStable: true,
}

export interface DynamicGestureResult {
  readonly gestureName: string
  readonly isSuccess: boolean
  readonly failureReason: FailureReason | null
  readonly failedPhase: GesturePhase
  readonly metrics: DynamicMetrics
  readonly timestamp: number
}

export interface DynamicFeedbackResult {
  readonly phase: DynamicFeedbackPhase
  readonly issue: DynamicMovementIssue
  readonly message: string
  readonly gestureName: string
  readonly timestamp: number
}

export function isTerminalPhase(phase: DynamicFeedbackPhase): boolean {
  return phase === 'completed' || phase === 'failed'
}

export function isMotionPhase(phase: DynamicFeedbackPhase): boolean {
  return phase === 'in-progress' || phase === 'near-completion'
}

export function createSuccessGestureResult(
  gestureName: string,
  metrics: DynamicMetrics,
  timestamp: number,
): DynamicGestureResult {
  return { gestureName, isSuccess: true, failureReason: null, failedPhase: 'none', metrics, timestamp }
}

export function createFailureGestureResult(
  gestureName: string,
  failureReason: FailureReason,
  failedPhase: GesturePhase,
  metrics: DynamicMetrics,
  timestamp: number,
): DynamicGestureResult {
  return { gestureName, isSuccess: false, failureReason, failedPhase, metrics, timestamp }
}
