import type { HandLandmarkerResult } from '@mediapipe/tasks-vision'
import {
  cross,
  FORWARD,
  IDENTITY_ROTATION,
  magnitude,
  midpoint,
  normalize,
  negate,
  quaternionFromTo,
  subtract,
  type Point3D,
} from '@/utils/math'
import {
  FINGERS,
  JOINT_SEGMENTS,
  fingerJointId,
  type Finger,
  type HandTrackingSource,
  type JointId,
  type JointPose,
  type JointSegment,
} from './hand-types'

export const HandLandmarkIndex = {
  WRIST: 0,
  THUMB_CMC: 1,
  THUMB_MCP: 2,
  THUMB_IP: 3,
  THUMB_TIP: 4,
  INDEX_MCP: 5,
  INDEX_PIP: 6,
  INDEX_DIP: 7,
  INDEX_TIP: 8,
  MIDDLE_MCP: 9,
  MIDDLE_PIP: 10,
  MIDDLE_DIP: 11,
  MIDDLE_TIP: 12,
  RING_MCP: 13,
  RING_PIP: 14,
  RING_DIP: 15,
  RING_TIP: 16,
  PINKY_MCP: 17,
  PINKY_PIP: 18,
  PINKY_DIP: 19,
  PINKY_TIP: 20,
} as const

export const TOTAL_HAND_LANDMARKS = 21

// Thumb maps CMC/MCP/IP/TIP onto proximal/intermediate/distal/tip.
const FINGER_LANDMARKS: Record<Finger, Record<JointSegment, number>> = {
  thumb: {
    proximal: HandLandmarkIndex.THUMB_CMC,
    intermediate: HandLandmarkIndex.THUMB_MCP,
    distal: HandLandmarkIndex.THUMB_IP,
    tip: HandLandmarkIndex.THUMB_TIP,
  },
  index: {
    proximal: HandLandmarkIndex.INDEX_MCP,
    intermediate: HandLandmarkIndex.INDEX_PIP,
    distal: HandLandmarkIndex.INDEX_DIP,
    tip: HandLandmarkIndex.INDEX_TIP,
  },
  middle: {
    proximal: HandLandmarkIndex.MIDDLE_MCP,
    intermediate: HandLandmarkIndex.MIDDLE_PIP,
    distal: HandLandmarkIndex.MIDDLE_DIP,
    tip: HandLandmarkIndex.MIDDLE_TIP,
  },
  ring: {
    proximal: HandLandmarkIndex.RING_MCP,
    intermediate: HandLandmarkIndex.RING_PIP,
    distal: HandLandmarkIndex.RING_DIP,
    tip: HandLandmarkIndex.RING_TIP,
  },
  pinky: {
    proximal: HandLandmarkIndex.PINKY_MCP,
    intermediate: HandLandmarkIndex.PINKY_PIP,
    distal: HandLandmarkIndex.PINKY_DIP,
    tip: HandLandmarkIndex.PINKY_TIP,
  },
}

export interface MediaPipeHandSourceConfig {
  /** Index of the hand inside the landmarker result. */
  readonly handIndex: number
  /** Flip the palm normal for mirrored (selfie) input or a left hand. */
  readonly mirrored: boolean
}

export const DEFAULT_MEDIAPIPE_HAND_SOURCE_CONFIG: MediaPipeHandSourceConfig = {
  handIndex: 0,
  mirrored: false,
}

export interface MediaPipeHandSource extends HandTrackingSource {
  /** Replace the current frame with the world landmarks of a new result. */
  update(result: Pick<HandLandmarkerResult, 'worldLandmarks'>): void
  clear(): void
}

const JOINT_LANDMARK_INDEX: ReadonlyMap<JointId, number> = new Map(
  FINGERS.flatMap((finger) =>
    JOINT_SEGMENTS.map((segment): [JointId, number] => [
      fingerJointId(finger, segment),
      FINGER_LANDMARKS[finger][segment],
    ]),
  ),
)

function computePalmPose(points: readonly Point3D[], mirrored: boolean): JointPose {
  const wrist = points[HandLandmarkIndex.WRIST]
  const towardIndex = subtract(points[HandLandmarkIndex.INDEX_MCP], wrist)
  const towardPinky = subtract(points[HandLandmarkIndex.PINKY_MCP], wrist)
  const rawNormal = cross(towardIndex, towardPinky)

  const position = midpoint(wrist, points[HandLandmarkIndex.MIDDLE_MCP])
  if (magnitude(rawNormal) === 0) {
    return { position, rotation: IDENTITY_ROTATION }
  }

  const normal = normalize(mirrored ? negate(rawNormal) : rawNormal)
  return { position, rotation: quaternionFromTo(FORWARD, normal) }
}

/**
 * Adapts MediaPipe HandLandmarker world landmarks to the HandTrackingSource port.
 */
export function createMediaPipeHandSource(
  config?: Partial<MediaPipeHandSourceConfig>,
): MediaPipeHandSource {
  const fullConfig = { ...DEFAULT_MEDIAPIPE_HAND_SOURCE_CONFIG, ...config }
  let points: readonly Point3D[] = []
  let palm: JointPose | null = null

  return {
    get isTracked(): boolean {
      return points.length === TOTAL_HAND_LANDMARKS
    },

    update(result: Pick<HandLandmarkerResult, 'worldLandmarks'>): void {
      const hand = result.worldLandmarks[fullConfig.handIndex]
      if (!hand || hand.length < TOTAL_HAND_LANDMARKS) {
        points = []
        palm = null
        return
      }
      points = hand.map((lm) => ({ x: lm.x, y: lm.y, z: lm.z }))
      palm = computePalmPose(points, fullConfig.mirrored)
    },

    clear(): void {
      points = []
      palm = null
    },

    tryGetJointPose(jointId: JointId): JointPose | null {
      if (points.length !== TOTAL_HAND_LANDMARKS) {
        return null
      }
      if (jointId === 'palm') {
        return palm
      }
      if (jointId === 'wrist') {
        return { position: points[HandLandmarkIndex.WRIST], rotation: IDENTITY_ROTATION }
      }
      const index = JOINT_LANDMARK_INDEX.get(jointId)
      if (index === undefined) {
        return null
      }
      return { position: points[index], rotation: IDENTITY_ROTATION }
    },
  }
}
