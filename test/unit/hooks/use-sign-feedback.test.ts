// @vitest-environment jsdom
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { renderHook, act } from '@testing-library/react'
import { useSignFeedback } from '@/hooks/useSignFeedback'
import { FeedbackOrchestrator } from '@/services/feedback/feedback-orchestrator'
import { createDefaultGestureRegistry } from '@/services/dynamic/gesture-definition-registry'

describe('useSignFeedback', () => {
  let now: number
  let recognizer: { isPerformed: boolean; targetSign: string | null }
  let orchestrator: FeedbackOrchestrator

  beforeEach(() => {
    vi.useFakeTimers()
    now = 0
    recognizer = { isPerformed: false, targetSign: 'A' }
    orchestrator = new FeedbackOrchestrator({
      analyzer: null,
      staticRecognizers: [recognizer],
      gestureDefinitions: createDefaultGestureRegistry(),
    })
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  function renderFeedback(onAudioCue = vi.fn()) {
    return renderHook(() => useSignFeedback({ orchestrator, clock: () => now, onAudioCue }))
  }

  it('should start inactive', () => {
    const { result } = renderFeedback()

    expect(result.current.state).toBe('inactive')
    expect(result.current.message).toBe('')
    expect(result.current.overlayVisible).toBe(false)
    expect(result.current.lastStaticResult).toBeNull()
  })

  it('should activate the session on start', () => {
    const onAudioCue = vi.fn()
    const { result } = renderFeedback(onAudioCue)

    act(() => {
      result.current.start({ signName: 'A', requiresMovement: false })
    })

    expect(result.current.state).toBe('waiting')
    expect(result.current.message).toBe("Practice 'A'...")
    expect(result.current.overlayVisible).toBe(true)
    expect(onAudioCue).toHaveBeenCalledWith('start-practice')
  })

  it('should tick the orchestrator on an interval', () => {
    const onAudioCue = vi.fn()
    const { result } = renderFeedback(onAudioCue)

    act(() => {
      result.current.start({ signName: 'A', requiresMovement: false })
    })
    act(() => {
      vi.advanceTimersByTime(50)
    })
    expect(result.current.message).toBe("Make the sign 'A'...")

    recognizer.isPerformed = true
    now = 300
    act(() => {
      vi.advanceTimersByTime(50)
    })

    expect(result.current.state).toBe('success')
    expect(result.current.message).toBe("Correct! 'A' detected")
    expect(result.current.lastStaticResult?.isMatchGlobal).toBe(true)
    expect(onAudioCue).toHaveBeenLastCalledWith('success')
  })

  it('should stop the loop on stop', () => {
    const { result } = renderFeedback()

    act(() => {
      result.current.start({ signName: 'A', requiresMovement: false })
    })
    expect(vi.getTimerCount()).toBe(1)

    act(() => {
      result.current.stop()
    })

    expect(vi.getTimerCount()).toBe(0)
    expect(result.current.state).toBe('inactive')
    expect(result.current.message).toBe('')
  })

  it('should stop the loop on unmount', () => {
    const { result, unmount } = renderFeedback()

    act(() => {
      result.current.start({ signName: 'A', requiresMovement: false })
    })
    unmount()

    expect(vi.getTimerCount()).toBe(0)
  })

  it('should follow the dynamic phase when switching to a motion sign', () => {
    const { result } = renderFeedback()

    act(() => {
      result.current.start({ signName: 'A', requiresMovement: false })
    })
    act(() => {
      result.current.changeSign({ signName: 'J', requiresMovement: true })
    })

    expect(result.current.dynamicPhase).toBe('idle')
    expect(result.current.message).toBe("Place your hand for 'J'.")
  })
})
