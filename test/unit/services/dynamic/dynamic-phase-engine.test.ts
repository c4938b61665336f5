import { describe, it, expect, beforeEach } from 'vitest'
import { DynamicPhaseEngine } from '@/services/dynamic/dynamic-phase-engine'
import { createGestureDefinition } from '@/services/dynamic/gesture-definition-registry'
import {
  EMPTY_METRICS,
  isMotionPhase,
  isTerminalPhase,
  type DynamicMetrics,
} from '@/services/dynamic/dynamic-types'

const smooth: DynamicMetrics = {
  ...EMPTY_METRICS,
  averageSpeed: 0.2,
  maxSpeed: 0.3,
  totalDistance: 0.1,
  duration: 0.5,
  directionAlignment: 1,
}

const slow: DynamicMetrics = { ...smooth, averageSpeed: 0.01 }

const swipe = createGestureDefinition('Swipe', { primaryDirection: { x: 1, y: 0, z: 0 } })

describe('DynamicPhaseEngine', () => {
  let engine: DynamicPhaseEngine

  beforeEach(() => {
    engine = new DynamicPhaseEngine({ random: () => 0 })
  })

  function startAttempt(now = 0): void {
    engine.notifyIdle('Swipe', now)
    engine.notifyStartDetected('Swipe', now)
  }

  describe('transitions', () => {
    it('should begin idle with an instruction to place the hand', () => {
      const result = engine.notifyIdle('Swipe', 10)

      expect(result).toEqual({
        phase: 'idle',
        issue: 'NONE',
        message: "Place your hand for 'Swipe'.",
        gestureName: 'Swipe',
        timestamp: 10,
      })
    })

    it('should enter start-detected only from idle', () => {
      engine.notifyIdle('Swipe', 0)

      expect(engine.notifyStartDetected('Swipe', 100)?.message).toBe('Good! Now start the movement.')
      expect(engine.notifyStartDetected('Swipe', 200)).toBeNull()
      expect(engine.phaseStartTime).toBe(100)
    })

    it('should ignore progress before the start pose was seen', () => {
      engine.notifyIdle('Swipe', 0)

      expect(engine.analyzeProgress('Swipe', 0.5, smooth, swipe, 100)).toBeNull()
      expect(engine.currentPhase).toBe('idle')
    })

    it('should move into progress and report the first message', () => {
      startAttempt()
      const result = engine.analyzeProgress('Swipe', 0.3, smooth, swipe, 100)

      expect(result?.phase).toBe('in-progress')
      expect(result?.message).toBe('Keep going.')
    })

    it('should switch to near completion above the threshold', () => {
      startAttempt()
      engine.analyzeProgress('Swipe', 0.3, smooth, swipe, 100)
      const result = engine.analyzeProgress('Swipe', 0.85, smooth, swipe, 700)

      expect(result?.phase).toBe('near-completion')
      expect(result?.message).toBe('Almost!')
    })

    it('should complete only from a motion phase', () => {
      startAttempt()
      expect(engine.notifyCompleted('Swipe', 50)).toBeNull()

      engine.analyzeProgress('Swipe', 0.3, smooth, swipe, 100)
      const result = engine.notifyCompleted('Swipe', 900)

      expect(result?.phase).toBe('completed')
      expect(result?.message).toBe('Movement recognized!')
      expect(isTerminalPhase(engine.currentPhase)).toBe(true)
    })

    it('should explain a failure and map it to an issue', () => {
      startAttempt()
      engine.analyzeProgress('Swipe', 0.3, smooth, swipe, 100)
      const result = engine.notifyFailed('Swipe', 'SPEED_TOO_LOW', 'move', swipe, 900)

      expect(result?.phase).toBe('failed')
      expect(result?.issue).toBe('TOO_SLOW')
      expect(result?.message).toBe('The gesture was too slow. Try again.')
    })

    it('should describe the expected direction of a wrong-way failure', () => {
      startAttempt()
      engine.analyzeProgress('Swipe', 0.3, smooth, swipe, 100)
      const result = engine.notifyFailed('Swipe', 'DIRECTION_WRONG', 'move', swipe, 900)

      expect(result?.message).toBe('The direction was not right. Move your hand to the right. Try again.')
    })

    it('should reject a failure outside a motion phase', () => {
      engine.notifyIdle('Swipe', 0)
      expect(engine.notifyFailed('Swipe', 'TIMEOUT', 'start', swipe, 100)).toBeNull()
      expect(engine.currentPhase).toBe('idle')
    })

    it('should resume a failed attempt', () => {
      startAttempt()
      engine.analyzeProgress('Swipe', 0.3, slow, swipe, 100)
      engine.notifyFailed('Swipe', 'SPEED_TOO_LOW', 'move', swipe, 900)

      const result = engine.resumeAttempt(2200)

      expect(result?.phase).toBe('in-progress')
      expect(result?.issue).toBe('NONE')
      expect(result?.message).toBe('Keep going.')
      expect(isMotionPhase(engine.currentPhase)).toBe(true)
    })

    it('should only resume from failed', () => {
      startAttempt()
      expect(engine.resumeAttempt(100)).toBeNull()
      expect(engine.currentPhase).toBe('start-detected')
    })
  })

  describe('message cooldown', () => {
    beforeEach(() => {
      startAttempt()
      engine.analyzeProgress('Swipe', 0.3, smooth, swipe, 100)
    })

    it('should stay quiet while nothing changes', () => {
      expect(engine.analyzeProgress('Swipe', 0.4, smooth, swipe, 200)).toBeNull()
      expect(engine.analyzeProgress('Swipe', 0.5, smooth, swipe, 1000)).toBeNull()
    })

    it('should report a new issue immediately', () => {
      const result = engine.analyzeProgress('Swipe', 0.4, slow, swipe, 150)

      expect(result?.issue).toBe('TOO_SLOW')
      expect(result?.message).toBe('Move faster.')
    })

    it('should still follow a phase change inside the cooldown', () => {
      const result = engine.analyzeProgress('Swipe', 0.9, smooth, swipe, 200)

      expect(result?.phase).toBe('near-completion')
    })

    it('should treat a missing definition as a clean movement', () => {
      engine.analyzeProgress('Swipe', 0.4, slow, swipe, 150)
      const result = engine.analyzeProgress('Swipe', 0.5, slow, null, 200)

      expect(result?.issue).toBe('NONE')
      expect(result?.message).toBe('Keep going.')
    })
  })

  describe('near-completion message', () => {
    it('should reuse the picked line for two seconds', () => {
      const picks = [0, 0.5, 0.9]
      let call = 0
      engine = new DynamicPhaseEngine({ random: () => picks[call++] })
      startAttempt()

      expect(engine.analyzeProgress('Swipe', 0.85, smooth, swipe, 100)?.message).toBe('Almost!')
      engine.analyzeProgress('Swipe', 0.5, slow, swipe, 200)
      expect(engine.analyzeProgress('Swipe', 0.9, smooth, swipe, 300)?.message).toBe('Almost!')
      engine.analyzeProgress('Swipe', 0.5, slow, swipe, 2200)
      expect(engine.analyzeProgress('Swipe', 0.95, smooth, swipe, 2300)?.message).toBe('Just a little more.')
    })
  })

  it('should clear everything on reset', () => {
    startAttempt()
    engine.analyzeProgress('Swipe', 0.3, slow, swipe, 100)
    engine.reset()

    expect(engine.currentPhase).toBe('idle')
    expect(engine.currentIssue).toBe('NONE')
    expect(engine.currentMessage).toBe('')
    expect(engine.activeGestureName).toBe('')
  })
})
