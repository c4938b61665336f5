import {
  inverseLerp,
  magnitude,
  negate,
  normalize,
  subtract,
  toDegrees,
  vectorAngle,
  type Point3D,
} from '@/utils/math'
import {
  FINGERS,
  createFingerRecord,
  fingerJointId,
  type Finger,
  type HandTrackingSource,
} from '@/services/hand-tracking/hand-types'

/** Curl reported for a finger that has never been observed. */
export const NEUTRAL_CURL = 0.5

const FINGER_STRAIGHT_DEG = 180
const FINGER_FOLDED_DEG = 60
const THUMB_STRAIGHT_DEG = 180
const THUMB_FOLDED_DEG = 50

export interface FingerJointPositions {
  readonly proximal: Point3D
  readonly intermediate: Point3D
  readonly distal: Point3D
  readonly tip: Point3D
}

function jointAngleDeg(incoming: Point3D, joint: Point3D, outgoing: Point3D): number {
  const into = normalize(subtract(joint, incoming))
  const out = normalize(subtract(outgoing, joint))
  return toDegrees(vectorAngle(negate(into), out))
}

/** 0 = straight, 1 = fully folded. */
export function computeFingerCurl(joints: FingerJointPositions): number {
  const pipAngle = jointAngleDeg(joints.proximal, joints.intermediate, joints.distal)
  const dipAngle = jointAngleDeg(joints.intermediate, joints.distal, joints.tip)
  const averageAngle = (pipAngle + dipAngle) / 2
  return inverseLerp(FINGER_STRAIGHT_DEG, FINGER_FOLDED_DEG, averageAngle)
}

/** The thumb compares its first and last segment directly. */
export function computeThumbCurl(joints: FingerJointPositions): number {
  const first = normalize(subtract(joints.intermediate, joints.proximal))
  const last = normalize(subtract(joints.tip, joints.distal))
  const angle = toDegrees(vectorAngle(negate(first), last))
  return inverseLerp(THUMB_STRAIGHT_DEG, THUMB_FOLDED_DEG, angle)
}

/** Two joints reported at the same position leave a bend angle undefined. */
export function hasZeroLengthSegment(joints: FingerJointPositions): boolean {
  return (
    magnitude(subtract(joints.intermediate, joints.proximal)) === 0 ||
    magnitude(subtract(joints.distal, joints.intermediate)) === 0 ||
    magnitude(subtract(joints.tip, joints.distal)) === 0
  )
}

/** Null when a joint is missing or a segment has collapsed. */
export function readFingerJoints(
  source: HandTrackingSource,
  finger: Finger,
): FingerJointPositions | null {
  const proximal = source.tryGetJointPose(fingerJointId(finger, 'proximal'))
  const intermediate = source.tryGetJointPose(fingerJointId(finger, 'intermediate'))
  const distal = source.tryGetJointPose(fingerJointId(finger, 'distal'))
  const tip = source.tryGetJointPose(fingerJointId(finger, 'tip'))

  if (!proximal || !intermediate || !distal || !tip) {
    return null
  }

  const joints: FingerJointPositions = {
    proximal: proximal.position,
    intermediate: intermediate.position,
    distal: distal.position,
    tip: tip.position,
  }
  return hasZeroLengthSegment(joints) ? null : joints
}

/**
 * Per-finger curl with dropout hold: a finger whose joints are missing or
 * collapsed keeps its last valid value.
 */
export class CurlEstimator {
  private lastValid: Record<Finger, number | null> = createFingerRecord(() => null)

  estimate(source: HandTrackingSource): Record<Finger, number> {
    const curls = createFingerRecord(() => NEUTRAL_CURL)

    for (const finger of FINGERS) {
      const joints = source.isTracked ? readFingerJoints(source, finger) : null
      if (joints) {
        const curl = finger === 'thumb' ? computeThumbCurl(joints) : computeFingerCurl(joints)
        this.lastValid[finger] = curl
      }
      curls[finger] = this.lastValid[finger] ?? NEUTRAL_CURL
    }

    return curls
  }

  getLastValid(finger: Finger): number | null {
    return this.lastValid[finger]
  }

  reset(): void {
    this.lastValid = createFingerRecord(() => null)
  }
}
