import { FORWARD, magnitude, normalize, rotateVector, subtract, type Point3D, type Vector3 } from '@/utils/math'
import {
  FINGERS,
  createFingerRecord,
  fingerJointId,
  type HandTrackingSource,
  type JointId,
} from '@/services/hand-tracking/hand-types'
import type { ProfileRegistry } from '@/services/profiles/profile-registry'
import {
  HAND_NOT_TRACKED_MESSAGE,
  NOT_RECOGNIZED_MESSAGE,
  generateSummary,
} from '@/services/feedback/feedback-messages'
import { CurlEstimator } from './curl-estimator'
import { evaluateStaticPose } from './static-pose-evaluator'
import {
  buildStaticResult,
  createSuccessResult,
  withSummary,
  type HandSnapshot,
  type StaticGestureResult,
} from './pose-types'

export interface HandPoseAnalyzerConfig {
  readonly curlTolerance: number
  readonly debugMode: boolean
  /** Lines kept in the summary message. */
  readonly maxSummaryMessages: number
}

export const DEFAULT_ANALYZER_CONFIG: HandPoseAnalyzerConfig = {
  curlTolerance: 0.1,
  debugMode: false,
  maxSummaryMessages: 2,
}

export interface HandPoseAnalysis {
  readonly result: StaticGestureResult
  readonly handTracked: boolean
  readonly profileFound: boolean
}

function readPosition(source: HandTrackingSource, id: JointId): Point3D | null {
  return source.tryGetJointPose(id)?.position ?? null
}

function fingerDirection(proximal: Point3D | null, tip: Point3D | null): Vector3 | null {
  if (!proximal || !tip) {
    return null
  }
  const direction = subtract(tip, proximal)
  return magnitude(direction) > 0 ? normalize(direction) : null
}

/**
 * Reads every joint once and freezes the result so curl, direction and
 * position checks see the same frame.
 */
export function captureHandSnapshot(
  source: HandTrackingSource,
  estimator: CurlEstimator,
): HandSnapshot {
  const curls = estimator.estimate(source)
  const tipPositions = createFingerRecord((finger) => readPosition(source, fingerJointId(finger, 'tip')))
  const proximalPositions = createFingerRecord((finger) =>
    readPosition(source, fingerJointId(finger, 'proximal')),
  )
  const directions = createFingerRecord((finger) =>
    fingerDirection(proximalPositions[finger], tipPositions[finger]),
  )
  const palm = source.tryGetJointPose('palm')
  const palmForward = palm ? rotateVector(palm.rotation, FORWARD) : null

  return { curls, directions, tipPositions, proximalPositions, palmForward }
}

/**
 * Static analysis for one tick: snapshot → evaluator → summary. The recognizer
 * flag is the only path to a match.
 */
export class HandPoseAnalyzer {
  private readonly source: HandTrackingSource
  private readonly profiles: ProfileRegistry
  private readonly estimator = new CurlEstimator()
  private config: HandPoseAnalyzerConfig
  private readonly warnedMissingProfiles = new Set<string>()
  private lastSnapshot: HandSnapshot | null = null

  constructor(
    source: HandTrackingSource,
    profiles: ProfileRegistry,
    config?: Partial<HandPoseAnalyzerConfig>,
  ) {
    this.source = source
    this.profiles = profiles
    this.config = { ...DEFAULT_ANALYZER_CONFIG, ...config }
  }

  updateConfig(config: Partial<HandPoseAnalyzerConfig>): void {
    this.config = { ...this.config, ...config }
  }

  getLastSnapshot(): HandSnapshot | null {
    return this.lastSnapshot
  }

  analyze(signName: string, isDetectedByRecognizer: boolean): HandPoseAnalysis {
    if (!this.source.isTracked) {
      return {
        result: buildStaticResult([], false, HAND_NOT_TRACKED_MESSAGE),
        handTracked: false,
        profileFound: this.profiles.has(signName),
      }
    }

    const snapshot = captureHandSnapshot(this.source, this.estimator)
    this.lastSnapshot = snapshot

    const profile = this.profiles.get(signName)
    if (!profile) {
      if (!this.warnedMissingProfiles.has(signName)) {
        this.warnedMissingProfiles.add(signName)
        console.warn(`[HandPoseAnalyzer] No constraint profile for '${signName}'`)
      }
      const result = isDetectedByRecognizer
        ? createSuccessResult(`Correct! '${signName}' detected`)
        : buildStaticResult([], false, `Adjust your hand for '${signName}'`)
      return { result, handTracked: true, profileFound: false }
    }

    const evaluated = evaluateStaticPose(profile, snapshot, isDetectedByRecognizer, {
      curlTolerance: this.config.curlTolerance,
      debugMode: this.config.debugMode,
    })

    if (this.config.debugMode) {
      const curls = FINGERS.map((finger) => `${finger}=${snapshot.curls[finger].toFixed(2)}`).join(' ')
      console.log(
        `[HandPoseDebug] ${signName}: ${curls} major=${evaluated.majorErrorCount} minor=${evaluated.minorErrorCount}`,
      )
    }

    return {
      result: withSummary(evaluated, this.summarize(signName, evaluated)),
      handTracked: true,
      profileFound: true,
    }
  }

  reset(): void {
    this.estimator.reset()
    this.lastSnapshot = null
  }

  private summarize(signName: string, result: StaticGestureResult): string {
    if (result.isMatchGlobal) {
      return `Correct! '${signName}' detected`
    }
    if (result.perFingerErrors.length === 0) {
      return NOT_RECOGNIZED_MESSAGE
    }
    return generateSummary(result.perFingerErrors, this.config.maxSummaryMessages)
  }
}
