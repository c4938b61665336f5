import { useState, useRef, useCallback, useEffect } from 'react'
import type { FeedbackOrchestrator } from '@/services/feedback/feedback-orchestrator'
import type { SignTarget } from '@/services/feedback/feedback-ports'
import type { DynamicFeedbackPhase } from '@/services/dynamic/dynamic-types'
import type { StaticGestureResult } from '@/services/pose-analysis/pose-types'
import type { AudioCue, FeedbackEvent, FeedbackState } from '@/types/feedback'

export interface UseSignFeedbackOptions {
  readonly orchestrator: FeedbackOrchestrator
  readonly tickIntervalMs?: number
  readonly clock?: () => number
  /** Called for every audio cue, in order. */
  readonly onAudioCue?: (cue: AudioCue) => void
}

export interface UseSignFeedbackReturn {
  readonly state: FeedbackState
  readonly message: string
  readonly overlayVisible: boolean
  readonly dynamicPhase: DynamicFeedbackPhase
  readonly lastStaticResult: StaticGestureResult | null
  readonly start: (sign: SignTarget) => void
  readonly stop: () => void
  readonly changeSign: (sign: SignTarget | null) => void
}

const DEFAULT_TICK_INTERVAL_MS = 50

export function useSignFeedback({
  orchestrator,
  tickIntervalMs = DEFAULT_TICK_INTERVAL_MS,
  clock = Date.now,
  onAudioCue,
}: UseSignFeedbackOptions): UseSignFeedbackReturn {
  const [state, setState] = useState<FeedbackState>(orchestrator.getState())
  const [message, setMessage] = useState(orchestrator.getCurrentMessage())
  const [overlayVisible, setOverlayVisible] = useState(orchestrator.isOverlayVisible())
  const [dynamicPhase, setDynamicPhase] = useState<DynamicFeedbackPhase>(orchestrator.getDynamicPhase())
  const [lastStaticResult, setLastStaticResult] = useState<StaticGestureResult | null>(
    orchestrator.getLastStaticResult(),
  )

  const intervalRef = useRef<ReturnType<typeof setInterval> | null>(null)
  const clockRef = useRef(clock)
  const audioRef = useRef(onAudioCue)
  clockRef.current = clock
  audioRef.current = onAudioCue

  const applyEvents = useCallback((events: readonly FeedbackEvent[]) => {
    for (const event of events) {
      switch (event.type) {
        case 'state-changed':
          setState(event.state)
          break
        case 'message':
          setMessage(event.message)
          break
        case 'overlay-visibility':
          setOverlayVisible(event.visible)
          break
        case 'dynamic-phase':
          setDynamicPhase(event.result.phase)
          break
        case 'static-result':
          setLastStaticResult(event.result)
          break
        case 'audio-cue':
          audioRef.current?.(event.cue)
          break
        case 'dynamic-result':
        case 'gesture-success':
          break
      }
    }
  }, [])

  const flush = useCallback(() => {
    applyEvents(orchestrator.drainEvents())
  }, [orchestrator, applyEvents])

  const clearLoop = useCallback(() => {
    if (intervalRef.current !== null) {
      clearInterval(intervalRef.current)
      intervalRef.current = null
    }
  }, [])

  const startLoop = useCallback(() => {
    clearLoop()
    intervalRef.current = setInterval(() => {
      orchestrator.tick(clockRef.current())
      flush()
    }, tickIntervalMs)
  }, [orchestrator, tickIntervalMs, clearLoop, flush])

  const start = useCallback(
    (sign: SignTarget) => {
      const now = clockRef.current()
      orchestrator.setCurrentSign(sign, now)
      orchestrator.setActive(true, now)
      flush()
      startLoop()
    },
    [orchestrator, flush, startLoop],
  )

  const stop = useCallback(() => {
    clearLoop()
    orchestrator.setActive(false, clockRef.current())
    flush()
  }, [orchestrator, clearLoop, flush])

  const changeSign = useCallback(
    (sign: SignTarget | null) => {
      orchestrator.setCurrentSign(sign, clockRef.current())
      flush()
    },
    [orchestrator, flush],
  )

  useEffect(() => {
    return () => {
      clearLoop()
    }
  }, [clearLoop])

  return {
    state,
    message,
    overlayVisible,
    dynamicPhase,
    lastStaticResult,
    start,
    stop,
    changeSign,
  }
}
