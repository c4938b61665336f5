import type { Vector3 } from '@/utils/math'
import {
  getCompletedMessage,
  getFailedMessage,
  getIdlePhaseMessage,
  getInProgressMessage,
  getStartDetectedMessage,
  pickNearCompletionMessage,
} from '@/services/feedback/feedback-messages'
import type { DynamicGestureDefinition } from './gesture-definition-registry'
import {
  detectMovementIssue,
  mapFailureReasonToIssue,
  movementRequirementsFor,
} from './movement-issue-detector'
import type {
  DynamicFeedbackPhase,
  DynamicFeedbackResult,
  DynamicMetrics,
  DynamicMovementIssue,
  FailureReason,
  GesturePhase,
} from './dynamic-types'

export interface DynamicPhaseEngineConfig {
  readonly nearCompletionThreshold: number
  /** Minimum gap before the same issue is re-reported. */
  readonly messageCooldownMs: number
  /** How long a picked "almost done" line is reused. */
  readonly nearCompletionMessageTtlMs: number
  readonly random: () => number
}

export const DEFAULT_PHASE_ENGINE_CONFIG: DynamicPhaseEngineConfig = {
  nearCompletionThreshold: 0.8,
  messageCooldownMs: 500,
  nearCompletionMessageTtlMs: 2000,
  random: Math.random,
}

const PROGRESS_SOURCE_PHASES: readonly DynamicFeedbackPhase[] = [
  'start-detected',
  'in-progress',
  'near-completion',
]

/**
 * Feedback state machine for motion gestures:
 * idle → start-detected → in-progress ⇄ near-completion → completed | failed.
 * Calls that would break the transition table are rejected and leave state untouched.
 */
export class DynamicPhaseEngine {
  private config: DynamicPhaseEngineConfig
  private phase: DynamicFeedbackPhase = 'idle'
  private issue: DynamicMovementIssue = 'NONE'
  private message = ''
  private gestureName = ''
  private phaseStartedAt = 0

  private lastReportedIssue: DynamicMovementIssue = 'NONE'
  private lastMessageAt = Number.NEGATIVE_INFINITY

  private nearCompletionMessage: string | null = null
  private nearCompletionPickedAt = Number.NEGATIVE_INFINITY

  constructor(config?: Partial<DynamicPhaseEngineConfig>) {
    this.config = { ...DEFAULT_PHASE_ENGINE_CONFIG, ...config }
  }

  updateConfig(config: Partial<DynamicPhaseEngineConfig>): void {
    this.config = { ...this.config, ...config }
  }

  get currentPhase(): DynamicFeedbackPhase {
    return this.phase
  }

  get currentIssue(): DynamicMovementIssue {
    return this.issue
  }

  get currentMessage(): string {
    return this.message
  }

  get activeGestureName(): string {
    return this.gestureName
  }

  /** Time the current phase was entered. */
  get phaseStartTime(): number {
    return this.phaseStartedAt
  }

  notifyIdle(gestureName: string, now: number): DynamicFeedbackResult {
    this.gestureName = gestureName
    this.issue = 'NONE'
    this.setPhase('idle', getIdlePhaseMessage(gestureName), now)
    return this.getCurrentResult(now)
  }

  notifyStartDetected(gestureName: string, now: number): DynamicFeedbackResult | null {
    if (this.phase !== 'idle') {
      return null
    }
    this.gestureName = gestureName
    this.issue = 'NONE'
    this.setPhase('start-detected', getStartDetectedMessage(), now)
    return this.getCurrentResult(now)
  }

  /**
   * Returns the new result when the phase or message changed, null when the
   * sample was rejected or fell inside the message cooldown.
   */
  analyzeProgress(
    gestureName: string,
    progress: number,
    metrics: DynamicMetrics,
    definition: DynamicGestureDefinition | null,
    now: number,
  ): DynamicFeedbackResult | null {
    if (!PROGRESS_SOURCE_PHASES.includes(this.phase)) {
      return null
    }
    this.gestureName = gestureName

    const targetPhase: DynamicFeedbackPhase =
      progress >= this.config.nearCompletionThreshold ? 'near-completion' : 'in-progress'

    const issue = definition
      ? detectMovementIssue(metrics, movementRequirementsFor(definition))
      : 'NONE'
    this.issue = issue

    const expectedDirection = definition ? definition.primaryDirection : null
    const message =
      targetPhase === 'near-completion'
        ? this.nearCompletion(now)
        : getInProgressMessage(issue, gestureName, expectedDirection)

    if (this.shouldUpdateMessage(issue, targetPhase, now)) {
      this.setPhase(targetPhase, message, now)
      this.lastReportedIssue = issue
      this.lastMessageAt = now
      return this.getCurrentResult(now)
    }

    if (this.phase !== targetPhase) {
      this.setPhase(targetPhase, message, now)
      return this.getCurrentResult(now)
    }

    return null
  }

  notifyCompleted(gestureName: string, now: number): DynamicFeedbackResult | null {
    if (!this.inMotion()) {
      return null
    }
    this.gestureName = gestureName
    this.issue = 'NONE'
    this.setPhase('completed', getCompletedMessage(), now)
    return this.getCurrentResult(now)
  }

  notifyFailed(
    gestureName: string,
    reason: FailureReason,
    failedPhase: GesturePhase,
    definition: DynamicGestureDefinition | null,
    now: number,
  ): DynamicFeedbackResult | null {
    if (!this.inMotion()) {
      return null
    }
    this.gestureName = gestureName
    this.issue = mapFailureReasonToIssue(reason)
    const expectedDirection: Vector3 | null = definition ? definition.primaryDirection : null
    this.setPhase('failed', getFailedMessage(reason, failedPhase, gestureName, expectedDirection), now)
    return this.getCurrentResult(now)
  }

  /** Re-enter the attempt after a failure while the learner still holds the start shape. */
  resumeAttempt(now: number): DynamicFeedbackResult | null {
    if (this.phase !== 'failed') {
      return null
    }
    this.issue = 'NONE'
    this.lastReportedIssue = 'NONE'
    this.lastMessageAt = now
    this.setPhase('in-progress', getInProgressMessage('NONE', this.gestureName), now)
    return this.getCurrentResult(now)
  }

  reset(): void {
    this.phase = 'idle'
    this.issue = 'NONE'
    this.message = ''
    this.gestureName = ''
    this.phaseStartedAt = 0
    this.lastReportedIssue = 'NONE'
    this.lastMessageAt = Number.NEGATIVE_INFINITY
    this.nearCompletionMessage = null
    this.nearCompletionPickedAt = Number.NEGATIVE_INFINITY
  }

  getCurrentResult(now: number): DynamicFeedbackResult {
    return {
      phase: this.phase,
      issue: this.issue,
      message: this.message,
      gestureName: this.gestureName,
      timestamp: now,
    }
  }

  private inMotion(): boolean {
    return this.phase === 'in-progress' || this.phase === 'near-completion'
  }

  private shouldUpdateMessage(
    issue: DynamicMovementIssue,
    targetPhase: DynamicFeedbackPhase,
    now: number,
  ): boolean {
    if (issue !== this.lastReportedIssue) {
      return true
    }
    if (now - this.lastMessageAt < this.config.messageCooldownMs) {
      return false
    }
    return this.phase !== targetPhase
  }

  private nearCompletion(now: number): string {
    if (
      this.nearCompletionMessage === null ||
      now - this.nearCompletionPickedAt >= this.config.nearCompletionMessageTtlMs
    ) {
      this.nearCompletionMessage = pickNearCompletionMessage(this.config.random)
      this.nearCompletionPickedAt = now
    }
    return this.nearCompletionMessage
  }

  private setPhase(phase: DynamicFeedbackPhase, message: string, now: number): void {
    if (this.phase !== phase) {
      this.phaseStartedAt = now
    }
    this.phase = phase
    this.message = message
  }
}
