import type { Point3D, Quaternion } from '@/utils/math'

export type Finger = 'thumb' | 'index' | 'middle' | 'ring' | 'pinky'

/** Anatomical order; spread pairs are taken between neighbours in this list. */
export const FINGERS: readonly Finger[] = ['thumb', 'index', 'middle', 'ring', 'pinky']

export type JointSegment = 'proximal' | 'intermediate' | 'distal' | 'tip'

export const JOINT_SEGMENTS: readonly JointSegment[] = ['proximal', 'intermediate', 'distal', 'tip']

export type FingerJointId = `${Finger}-${JointSegment}`

export type JointId = FingerJointId | 'palm' | 'wrist'

export interface JointPose {
  readonly position: Point3D
  readonly rotation: Quaternion
}

/**
 * Live hand telemetry. Positions share one stable frame (meters).
 * `tryGetJointPose` returns null while a joint is not tracked.
 */
export interface HandTrackingSource {
  readonly isTracked: boolean
  tryGetJointPose(jointId: JointId): JointPose | null
}

export function fingerJointId(finger: Finger, segment: JointSegment): FingerJointId {
  return `${finger}-${segment}`
}

export function createFingerRecord<T>(factory: (finger: Finger) => T): Record<Finger, T> {
  return {
    thumb: factory('thumb'),
    index: factory('index'),
    middle: factory('middle'),
    ring: factory('ring'),
    pinky: factory('pinky'),
  }
}
