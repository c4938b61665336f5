import { DEFAULT_SETTINGS, type FeedbackSettings } from '@/types/settings'
import type { AudioCue, FeedbackEvent, FeedbackState } from '@/types/feedback'
import type {
  HandPoseAnalyzer,
  HandPoseAnalyzerConfig,
} from '@/services/pose-analysis/hand-pose-analyzer'
import {
  buildStaticResult,
  createSuccessResult,
  type StaticGestureResult,
} from '@/services/pose-analysis/pose-types'
import {
  DynamicPhaseEngine,
  type DynamicPhaseEngineConfig,
} from '@/services/dynamic/dynamic-phase-engine'
import type { GestureDefinitionRegistry } from '@/services/dynamic/gesture-definition-registry'
import type {
  DynamicFeedbackPhase,
  DynamicFeedbackResult,
  DynamicGestureResult,
  DynamicMetrics,
} from '@/services/dynamic/dynamic-types'
import { MessageStabilizer, type MessageStabilizerConfig } from './message-stabilizer'
import type {
  DynamicGestureRecognizerPort,
  SignTarget,
  StaticGestureRecognizerPort,
} from './feedback-ports'

export type PoseAnalyzer = Pick<HandPoseAnalyzer, 'analyze' | 'reset' | 'updateConfig'>

export interface FeedbackOrchestratorOptions {
  readonly analyzer: PoseAnalyzer | null
  readonly staticRecognizers?: readonly StaticGestureRecognizerPort[]
  readonly dynamicRecognizer?: DynamicGestureRecognizerPort | null
  readonly gestureDefinitions: GestureDefinitionRegistry
  readonly settings?: FeedbackSettings
  readonly random?: () => number
}

// Trajectory hints shown while a motion sign is performed.
const DYNAMIC_HINTS: ReadonlyMap<string, string> = new Map([
  ['J', 'Draw a J with your index finger: move outward and finish down'],
  ['Z', 'Draw a Z with your index finger: three quick strokes'],
])

export function getDynamicHint(gestureName: string): string | null {
  if (!gestureName) {
    return null
  }
  const upper = gestureName.toUpperCase()
  const exact = DYNAMIC_HINTS.get(upper)
  if (exact) {
    return exact
  }
  for (const [key, hint] of DYNAMIC_HINTS) {
    if (upper.startsWith(key)) {
      return hint
    }
  }
  return null
}

type PendingReset = 'after-success' | 'after-error'

/**
 * Tick-driven coordinator for one practice session. Static signs are
 * re-evaluated on a debounce; motion signs are driven by recognizer events
 * with a message latch. Output goes to an event queue the host drains.
 */
export class FeedbackOrchestrator {
  private readonly analyzer: PoseAnalyzer | null
  private readonly staticRecognizers: readonly StaticGestureRecognizerPort[]
  private readonly dynamicRecognizer: DynamicGestureRecognizerPort | null
  private readonly gestureDefinitions: GestureDefinitionRegistry
  private readonly random: () => number
  private settings: FeedbackSettings

  private readonly stabilizer: MessageStabilizer
  private readonly engine: DynamicPhaseEngine

  private active = false
  private disposed = false
  private currentSign: SignTarget | null = null
  private state: FeedbackState = 'inactive'
  private message = ''
  private overlayVisible = false
  private lastStaticResult: StaticGestureResult | null = null
  private lastDynamicResult: DynamicGestureResult | null = null

  private lastAnalysisAt = Number.NEGATIVE_INFINITY
  private successEndsAt = Number.NEGATIVE_INFINITY
  private latchUntil = Number.NEGATIVE_INFINITY
  private pendingReset: PendingReset | null = null

  private readonly warnedMismatches = new Set<string>()
  private events: FeedbackEvent[] = []

  constructor(options: FeedbackOrchestratorOptions) {
    this.analyzer = options.analyzer
    this.staticRecognizers = options.staticRecognizers ?? []
    this.dynamicRecognizer = options.dynamicRecognizer ?? null
    this.gestureDefinitions = options.gestureDefinitions
    this.random = options.random ?? Math.random
    this.settings = options.settings ?? DEFAULT_SETTINGS

    this.stabilizer = new MessageStabilizer(this.stabilizerConfig())
    this.engine = new DynamicPhaseEngine({ ...this.engineConfig(), random: this.random })
    this.analyzer?.updateConfig(this.analyzerConfig())
  }

  // --- Accessors -------------------------------------------------------------

  getState(): FeedbackState {
    return this.state
  }

  isActive(): boolean {
    return this.active
  }

  getCurrentSign(): SignTarget | null {
    return this.currentSign
  }

  getCurrentMessage(): string {
    return this.message
  }

  isOverlayVisible(): boolean {
    return this.overlayVisible
  }

  getDynamicPhase(): DynamicFeedbackPhase {
    return this.engine.currentPhase
  }

  getLastStaticResult(): StaticGestureResult | null {
    return this.lastStaticResult
  }

  getLastDynamicResult(): DynamicGestureResult | null {
    return this.lastDynamicResult
  }

  /** Time until which dynamic messages are pinned. */
  getLatchUntil(): number {
    return this.latchUntil
  }

  drainEvents(): FeedbackEvent[] {
    const drained = this.events
    this.events = []
    return drained
  }

  updateSettings(settings: FeedbackSettings): void {
    this.settings = settings
    this.stabilizer.updateConfig(this.stabilizerConfig())
    this.engine.updateConfig(this.engineConfig())
    this.analyzer?.updateConfig(this.analyzerConfig())
  }

  // --- Lifecycle -------------------------------------------------------------

  setActive(active: boolean, now: number): void {
    if (this.disposed) {
      return
    }
    this.active = active
    this.clearTimers()
    this.engine.reset()
    this.analyzer?.reset()

    if (!active) {
      this.setState('inactive', now)
      this.setMessage('', now)
      this.setOverlayVisible(false, now)
      return
    }

    this.setState('waiting', now)
    this.setOverlayVisible(true, now)
    this.emit({ type: 'audio-cue', cue: 'start-practice', timestamp: now })
    if (this.currentSign?.requiresMovement) {
      this.emitDynamicPhase(this.engine.notifyIdle(this.currentSign.signName, now))
    }
    this.setMessage(this.currentSign ? `Practice '${this.currentSign.signName}'...` : '', now)
  }

  setCurrentSign(sign: SignTarget | null, now: number): void {
    if (this.disposed) {
      return
    }
    this.currentSign = sign
    this.clearTimers()
    this.engine.reset()
    this.analyzer?.reset()
    this.lastStaticResult = null
    this.lastDynamicResult = null

    if (!this.active) {
      return
    }

    this.setState('waiting', now)
    this.setOverlayVisible(true, now)
    if (!sign) {
      this.setMessage('', now)
    } else if (sign.requiresMovement) {
      const result = this.engine.notifyIdle(sign.signName, now)
      this.emitDynamicPhase(result)
      this.setMessage(result.message, now)
    } else {
      this.setMessage(`Make the sign '${sign.signName}'...`, now)
    }
  }

  dispose(): void {
    this.active = false
    this.disposed = true
    this.currentSign = null
    this.clearTimers()
    this.engine.reset()
    this.events = []
  }

  // --- Per-tick update -------------------------------------------------------

  tick(now: number): void {
    if (!this.active || this.disposed) {
      return
    }

    if (this.pendingReset !== null && now >= this.latchUntil) {
      this.handleLatchExpired(now)
    }

    if (this.state === 'success' && now < this.successEndsAt) {
      return
    }

    if (now - this.lastAnalysisAt < this.settings.analysis.intervalMs) {
      return
    }
    this.lastAnalysisAt = now

    const sign = this.currentSign
    if (sign && !sign.requiresMovement) {
      this.analyzeStaticPose(sign.signName, now)
    }
  }

  private analyzeStaticPose(signName: string, now: number): void {
    const detected = this.isDetectedByRecognizer(signName)

    if (!this.analyzer) {
      if (detected) {
        this.lastStaticResult = createSuccessResult(`Correct! '${signName}' detected`)
        this.emit({ type: 'static-result', result: this.lastStaticResult, timestamp: now })
        this.enterStaticSuccess(signName, this.lastStaticResult.summaryMessage, now)
        return
      }
      this.lastStaticResult = buildStaticResult([], false, `Make the sign '${signName}'...`)
      this.emit({ type: 'static-result', result: this.lastStaticResult, timestamp: now })
      this.setState('waiting', now)
      this.setMessage(this.lastStaticResult.summaryMessage, now)
      return
    }

    const { result, handTracked, profileFound } = this.analyzer.analyze(signName, detected)
    this.lastStaticResult = result
    this.emit({ type: 'static-result', result, timestamp: now })

    if (result.isMatchGlobal) {
      this.enterStaticSuccess(signName, result.summaryMessage, now)
      return
    }

    if (!handTracked || !profileFound) {
      this.setState('waiting', now)
      this.setMessage(result.summaryMessage, now)
      return
    }

    const lines = this.stabilizer.stabilize(result, signName, now)
    if (result.majorErrorCount > 0) {
      this.setState('showing-errors', now)
    } else if (result.minorErrorCount > 0) {
      this.setState('partial-match', now)
    } else {
      this.setState('waiting', now)
    }
    this.setMessage(lines.length > 0 ? lines.join('\n') : result.summaryMessage, now)

    if (this.settings.analysis.debugMode) {
      console.log(
        `[FeedbackOrchestrator] ${signName}: state=${this.state} major=${result.majorErrorCount} minor=${result.minorErrorCount}`,
      )
    }
  }

  /**
   * Starts (or extends) the success display. The cue and the success event go
   * out only on entry, whichever path confirmed the match.
   */
  private enterStaticSuccess(signName: string, message: string, now: number): void {
    this.stabilizer.clear()
    if (this.state !== 'success') {
      this.emitAudio('success', now)
      this.emit({ type: 'gesture-success', signName, timestamp: now })
    }
    this.setState('success', now)
    this.setMessage(message, now)
    this.successEndsAt = now + this.settings.timing.successDisplayDurationMs
    this.lastAnalysisAt = Number.NEGATIVE_INFINITY
  }

  private isDetectedByRecognizer(signName: string): boolean {
    let detected = false
    for (const recognizer of this.staticRecognizers) {
      const target = recognizer.targetSign
      if (target === null) {
        continue
      }
      if (target !== signName) {
        const key = `${target}->${signName}`
        if (!this.warnedMismatches.has(key)) {
          this.warnedMismatches.add(key)
          console.warn(
            `[FeedbackOrchestrator] Recognizer targets '${target}' while practicing '${signName}', ignoring it`,
          )
        }
        continue
      }
      detected = detected || recognizer.isPerformed
    }
    return detected
  }

  // --- Static recognizer events ---------------------------------------------

  onStaticGestureDetected(signName: string, now: number): void {
    const sign = this.currentSign
    if (!this.active || !sign || sign.requiresMovement || sign.signName !== signName) {
      return
    }
    if (this.state === 'success' && now < this.successEndsAt) {
      return
    }

    this.stabilizer.clear()
    this.emitAudio('success', now)
    this.emit({ type: 'gesture-success', signName, timestamp: now })
    this.lastStaticResult = createSuccessResult(`Correct! '${signName}' detected`)
    this.emit({ type: 'static-result', result: this.lastStaticResult, timestamp: now })
    this.setState('success', now)
    this.setMessage(this.lastStaticResult.summaryMessage, now)
    this.successEndsAt = now + this.settings.timing.successDisplayDurationMs
    this.lastAnalysisAt = Number.NEGATIVE_INFINITY
  }

  onStaticGestureEnded(signName: string, now: number): void {
    const sign = this.currentSign
    if (!this.active || !sign || sign.signName !== signName) {
      return
    }
    if (this.state !== 'success' || now < this.successEndsAt) {
      return
    }
    this.setState('waiting', now)
    this.setMessage(`Make the sign '${signName}'...`, now)
  }

  // --- Dynamic recognizer events --------------------------------------------

  onDynamicGestureStarted(gestureName: string, now: number): void {
    if (!this.isDynamicTarget(gestureName)) {
      return
    }
    if (this.state === 'success' && now < this.successEndsAt) {
      return
    }
    if (now < this.latchUntil) {
      return
    }

    const result = this.engine.notifyStartDetected(gestureName, now)
    if (!result) {
      return
    }
    this.emitDynamicPhase(result)
    this.setOverlayVisible(false, now)
    this.setState('in-progress', now)
    this.setMessage(getDynamicHint(gestureName) ?? result.message, now)
  }

  onDynamicGestureProgress(
    gestureName: string,
    progress: number,
    metrics: DynamicMetrics,
    now: number,
  ): void {
    if (!this.isDynamicTarget(gestureName)) {
      return
    }

    const canEmit = now >= this.latchUntil
    const definition = this.gestureDefinitions.get(gestureName)
    const update = this.engine.analyzeProgress(gestureName, progress, metrics, definition, now)
    if (update) {
      this.emitDynamicPhase(update)
    }
    if (!this.isInMotion()) {
      return
    }
    this.setOverlayVisible(false, now)
    this.setState('in-progress', now)

    const current = this.engine.getCurrentResult(now)
    let message = current.message
    if (current.issue === 'NONE') {
      const hint = getDynamicHint(gestureName)
      if (hint) {
        message = `${hint} (${Math.round(progress * 100)}%)`
      }
    }

    if (!canEmit) {
      return
    }
    if (current.issue !== 'NONE') {
      // Pin the correction; progress keeps being analyzed underneath.
      this.latchUntil = now + this.randomErrorHold()
      this.pendingReset = null
    }
    this.setMessage(message, now)
  }

  onDynamicGestureNearCompletion(gestureName: string, progress: number, now: number): void {
    if (!this.isDynamicTarget(gestureName) || !this.settings.analysis.debugMode) {
      return
    }
    console.log(
      `[FeedbackOrchestrator] Near completion: ${gestureName} (${Math.round(progress * 100)}%) at ${now}`,
    )
  }

  onDynamicGestureCompleted(result: DynamicGestureResult, now: number): void {
    if (!this.isDynamicTarget(result.gestureName)) {
      return
    }
    const update = this.engine.notifyCompleted(result.gestureName, now)
    if (!update) {
      console.warn(
        `[FeedbackOrchestrator] Ignoring completion of '${result.gestureName}' outside a movement`,
      )
      return
    }

    this.lastDynamicResult = result
    this.emit({ type: 'dynamic-result', result, timestamp: now })
    this.emitDynamicPhase(update)

    const hold = this.settings.timing.dynamicSuccessHoldDurationMs
    this.successEndsAt = now + hold
    this.latchUntil = now + hold
    this.pendingReset = 'after-success'

    this.emitAudio('success', now)
    this.emit({ type: 'gesture-success', signName: result.gestureName, timestamp: now })
    this.setState('success', now)
    this.setMessage(update.message, now)
  }

  onDynamicGestureFailed(result: DynamicGestureResult, now: number): void {
    if (!this.isDynamicTarget(result.gestureName)) {
      return
    }
    const update = this.engine.notifyFailed(
      result.gestureName,
      result.failureReason ?? 'UNKNOWN',
      result.failedPhase,
      this.gestureDefinitions.get(result.gestureName),
      now,
    )
    if (!update) {
      console.warn(
        `[FeedbackOrchestrator] Ignoring failure of '${result.gestureName}' outside a movement`,
      )
      return
    }

    this.lastDynamicResult = result
    this.emit({ type: 'dynamic-result', result, timestamp: now })
    this.emitDynamicPhase(update)

    this.latchUntil = now + this.randomErrorHold()
    this.pendingReset = 'after-error'

    this.emitAudio('error', now)
    this.setState('showing-errors', now)
    this.setMessage(update.message, now)
  }

  private handleLatchExpired(now: number): void {
    const pending = this.pendingReset
    this.pendingReset = null

    if (pending === 'after-error' && this.dynamicRecognizer?.isStartPoseValid) {
      const resumed = this.engine.resumeAttempt(now)
      if (resumed) {
        this.emitDynamicPhase(resumed)
        this.setState('in-progress', now)
        this.setMessage(resumed.message, now)
        return
      }
    }
    this.forceDynamicIdle(now)
  }

  private forceDynamicIdle(now: number): void {
    this.engine.reset()
    this.successEndsAt = Number.NEGATIVE_INFINITY
    this.setOverlayVisible(true, now)
    const sign = this.currentSign
    if (sign) {
      const result = this.engine.notifyIdle(sign.signName, now)
      this.emitDynamicPhase(result)
      this.setMessage(result.message, now)
    }
    this.setState('waiting', now)
  }

  // --- Helpers ---------------------------------------------------------------

  private isDynamicTarget(gestureName: string): boolean {
    const sign = this.currentSign
    return this.active && sign !== null && sign.requiresMovement && sign.signName === gestureName
  }

  private isInMotion(): boolean {
    const phase = this.engine.currentPhase
    return phase === 'in-progress' || phase === 'near-completion'
  }

  private randomErrorHold(): number {
    const { errorMessageHoldMinMs, errorMessageHoldMaxMs } = this.settings.timing
    return errorMessageHoldMinMs + this.random() * (errorMessageHoldMaxMs - errorMessageHoldMinMs)
  }

  private clearTimers(): void {
    this.lastAnalysisAt = Number.NEGATIVE_INFINITY
    this.successEndsAt = Number.NEGATIVE_INFINITY
    this.latchUntil = Number.NEGATIVE_INFINITY
    this.pendingReset = null
    this.stabilizer.clear()
  }

  private stabilizerConfig(): MessageStabilizerConfig {
    const { stability } = this.settings
    return {
      enterDelayMs: stability.messageEnterDelayMs,
      exitDelayMs: stability.messageExitDelayMs,
      maxMessages: stability.maxMessages,
    }
  }

  private analyzerConfig(): Pick<HandPoseAnalyzerConfig, 'curlTolerance' | 'debugMode'> {
    const { curlTolerance, debugMode } = this.settings.analysis
    return { curlTolerance, debugMode }
  }

  private engineConfig(): Pick<DynamicPhaseEngineConfig, 'nearCompletionThreshold' | 'messageCooldownMs'> {
    return {
      nearCompletionThreshold: this.settings.dynamic.nearCompletionThreshold,
      messageCooldownMs: this.settings.dynamic.messageCooldownMs,
    }
  }

  private emit(event: FeedbackEvent): void {
    this.events.push(event)
  }

  private emitAudio(cue: AudioCue, now: number): void {
    this.emit({ type: 'audio-cue', cue, timestamp: now })
  }

  private emitDynamicPhase(result: DynamicFeedbackResult): void {
    this.emit({ type: 'dynamic-phase', result, timestamp: result.timestamp })
  }

  private setState(state: FeedbackState, now: number): void {
    if (this.state === state) {
      return
    }
    const previous = this.state
    this.state = state
    this.emit({ type: 'state-changed', state, previous, timestamp: now })
  }

  private setMessage(message: string, now: number): void {
    if (this.message === message) {
      return
    }
    this.message = message
    this.emit({ type: 'message', message, timestamp: now })
  }

  private setOverlayVisible(visible: boolean, now: number): void {
    if (this.overlayVisible === visible) {
      return
    }
    this.overlayVisible = visible
    this.emit({ type: 'overlay-visibility', visible, timestamp: now })
  }
}
