import { describe, it, expect, beforeEach } from 'vitest'
import { createMediaPipeHandSource, type MediaPipeHandSource } from '@/services/hand-tracking/mediapipe-hand-source'
import { HandPoseAnalyzer } from '@/services/pose-analysis/hand-pose-analyzer'
import { createDefaultProfileRegistry } from '@/services/profiles/profile-loader'
import { createDefaultGestureRegistry } from '@/services/dynamic/gesture-definition-registry'
import { FeedbackOrchestrator } from '@/services/feedback/feedback-orchestrator'
import { ALMOST_THERE_MESSAGE } from '@/services/feedback/message-stabilizer'
import { DEFAULT_SETTINGS } from '@/types/settings'
import type { Point3D } from '@/utils/math'
import { buildMediaPipeLandmarks } from '../helpers/hand-fixtures'

function frame(points: readonly Point3D[]) {
  return { worldLandmarks: [points.map((p) => ({ ...p, visibility: 1 }))] }
}

describe('landmarks to feedback', () => {
  let source: MediaPipeHandSource
  let recognizer: { isPerformed: boolean; targetSign: string | null }
  let orchestrator: FeedbackOrchestrator

  beforeEach(() => {
    source = createMediaPipeHandSource()
    recognizer = { isPerformed: false, targetSign: 'B' }
    orchestrator = new FeedbackOrchestrator({
      analyzer: new HandPoseAnalyzer(source, createDefaultProfileRegistry()),
      staticRecognizers: [recognizer],
      gestureDefinitions: createDefaultGestureRegistry(),
    })
    orchestrator.setCurrentSign({ signName: 'B', requiresMovement: false }, 0)
    orchestrator.setActive(true, 0)
  })

  it('should ask for the thumb across the palm on an open hand', () => {
    source.update(frame(buildMediaPipeLandmarks()))

    orchestrator.tick(0)
    const result = orchestrator.getLastStaticResult()
    expect(result?.perFingerErrors).toHaveLength(1)
    expect(result?.perFingerErrors[0]).toMatchObject({
      finger: 'thumb',
      errorType: 'TOO_EXTENDED',
      severity: 'major',
    })
    expect(orchestrator.getState()).toBe('showing-errors')
    expect(orchestrator.getCurrentMessage()).toBe('Curl your thumb more (0% -> 50%+)')

    orchestrator.tick(300)
    expect(orchestrator.getCurrentMessage()).toBe('Close: thumb\nOnly 1 adjustment left')
  })

  it('should call a half-folded thumb almost there', () => {
    // widened lower bound 0.38
    source.update(frame(buildMediaPipeLandmarks({ thumb: 0.25 })))

    orchestrator.tick(0)
    expect(orchestrator.getLastStaticResult()?.perFingerErrors[0]).toMatchObject({
      finger: 'thumb',
      severity: 'minor',
    })
    expect(orchestrator.getState()).toBe('partial-match')

    orchestrator.tick(300)
    expect(orchestrator.getCurrentMessage()).toBe(
      ['Close: thumb', ALMOST_THERE_MESSAGE, 'Only 1 adjustment left'].join('\n'),
    )
  })

  it('should accept the sign once the thumb is folded', () => {
    source.update(frame(buildMediaPipeLandmarks({ thumb: 0.7 })))

    orchestrator.tick(0)

    expect(orchestrator.getLastStaticResult()?.perFingerErrors).toEqual([])
    expect(orchestrator.getState()).toBe('waiting')
    expect(orchestrator.getCurrentMessage()).toBe('Not fully recognized yet, try again')

    recognizer.isPerformed = true
    orchestrator.tick(200)
    expect(orchestrator.getState()).toBe('success')
    expect(orchestrator.getCurrentMessage()).toBe("Correct! 'B' detected")
  })

  it('should flag folded fingers as major errors', () => {
    source.update(frame(buildMediaPipeLandmarks({ thumb: 0.7, index: 0.9, middle: 0.9 })))

    orchestrator.tick(0)

    expect(orchestrator.getState()).toBe('showing-errors')
    expect(orchestrator.getLastStaticResult()?.majorErrorCount).toBe(2)
    expect(orchestrator.getCurrentMessage()).toBe(
      'Extend your index more (90% -> 45%-)\nExtend your middle more (90% -> 45%-)',
    )
  })

  it('should widen the curl range when the tolerance setting grows', () => {
    source.update(frame(buildMediaPipeLandmarks({ thumb: 0.7, index: 0.65 })))
    const curledIndex = () =>
      orchestrator.getLastStaticResult()?.perFingerErrors.filter(
        (error) => error.finger === 'index' && error.errorType === 'TOO_CURLED',
      )

    orchestrator.tick(0)
    expect(curledIndex()).toHaveLength(1)
    expect(curledIndex()?.[0].severity).toBe('minor')

    orchestrator.updateSettings({
      ...DEFAULT_SETTINGS,
      analysis: { ...DEFAULT_SETTINGS.analysis, curlTolerance: 0.5 },
    })
    orchestrator.tick(200)
    expect(curledIndex()).toEqual([])
  })

  it('should wait for the hand when tracking is lost', () => {
    source.update({ worldLandmarks: [] })

    orchestrator.tick(0)

    expect(orchestrator.getState()).toBe('waiting')
    expect(orchestrator.getCurrentMessage()).toBe('Hand not tracked')
  })
})
