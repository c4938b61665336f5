import { FINGERS, type Finger } from '@/services/hand-tracking/hand-types'
import { getFingerShapeState } from '@/services/pose-analysis/finger-state'
import {
  getErrorForFinger,
  type FingerError,
  type StaticGestureResult,
} from '@/services/pose-analysis/pose-types'
import { joinFingerNames } from './feedback-messages'

export interface MessageCandidate {
  readonly message: string
  /** 3 when any affected finger is major, 2 when minor only, 1 for supplementary lines. */
  readonly severityWeight: number
  readonly affectedCount: number
  /** Declaration order, lower ranks first on ties. */
  readonly order: number
}

type ActionBucket = 'curve' | 'release' | 'fist' | 'extend' | 'bend' | 'join' | 'separate'

const ACTION_ORDER: Record<ActionBucket, number> = {
  curve: -2,
  release: -1,
  fist: 0,
  extend: 1,
  bend: 2,
  join: 3,
  separate: 4,
}

const ACTION_LABEL: Record<ActionBucket, string> = {
  curve: 'Curve',
  release: 'Relax',
  fist: 'Close',
  extend: 'Extend',
  bend: 'Bend',
  join: 'Join',
  separate: 'Separate',
}

const SINGLE_ORDER = 20
const ALMOST_THERE_ORDER = 40
const PROGRESS_ORDER = 50
const REPEAT_ORDER = 60

export const ALMOST_THERE_MESSAGE = 'Almost there: hold the sign steady'

/** Action an error asks for, or null when it has to be said on its own. */
export function getActionBucket(error: FingerError): ActionBucket | null {
  switch (error.errorType) {
    case 'NEEDS_CURVE':
      return 'curve'
    case 'TOO_MUCH_CURL':
      return 'release'
    case 'NEEDS_FIST':
      return 'fist'
    case 'NEEDS_EXTEND':
      return 'extend'
    case 'TOO_EXTENDED': {
      const expected = getFingerShapeState(error.expectedValue)
      if (expected === 'curved') return 'curve'
      if (expected === 'closed') return 'fist'
      return 'bend'
    }
    case 'TOO_CURLED':
      return getFingerShapeState(error.expectedValue) === 'curved' ? 'release' : 'extend'
    case 'SPREAD_TOO_WIDE':
      return 'join'
    case 'SPREAD_TOO_NARROW':
      return 'separate'
    case 'SHOULD_TOUCH':
    case 'SHOULD_NOT_TOUCH':
    case 'THUMB_POSITION_WRONG':
    case 'ROTATION_WRONG':
      return null
  }
}

/**
 * Groups fingers by the action they need so one line covers several fingers.
 * Custom profile messages are kept verbatim as their own candidates.
 */
export function buildCandidates(result: StaticGestureResult, signName: string): MessageCandidate[] {
  if (result.isMatchGlobal) {
    return []
  }

  const buckets = new Map<ActionBucket, { fingers: Finger[]; major: boolean }>()
  const candidates: MessageCandidate[] = []
  let fingersWithIssues = 0
  let anyMajor = false

  for (const finger of FINGERS) {
    const error = getErrorForFinger(result, finger)
    if (!error) {
      continue
    }
    fingersWithIssues++
    const major = error.severity === 'major'
    anyMajor = anyMajor || major

    const bucket = error.isCustomMessage ? null : getActionBucket(error)
    if (bucket === null) {
      candidates.push({
        message: error.message,
        severityWeight: major ? 3 : 2,
        affectedCount: 1,
        order: SINGLE_ORDER,
      })
      continue
    }

    const entry = buckets.get(bucket)
    if (entry) {
      entry.fingers.push(finger)
      entry.major = entry.major || major
    } else {
      buckets.set(bucket, { fingers: [finger], major })
    }
  }

  for (const [bucket, entry] of buckets) {
    candidates.push({
      message: `${ACTION_LABEL[bucket]}: ${joinFingerNames(entry.fingers)}`,
      severityWeight: entry.major ? 3 : 2,
      affectedCount: entry.fingers.length,
      order: ACTION_ORDER[bucket],
    })
  }

  if (fingersWithIssues === 0) {
    candidates.push({
      message: `Repeat the sign '${signName}' and hold still for a moment`,
      severityWeight: 1,
      affectedCount: 1,
      order: REPEAT_ORDER,
    })
    return candidates
  }

  if (!anyMajor) {
    candidates.push({
      message: ALMOST_THERE_MESSAGE,
      severityWeight: 1,
      affectedCount: fingersWithIssues,
      order: ALMOST_THERE_ORDER,
    })
  }

  candidates.push({
    message:
      fingersWithIssues === 1 ? 'Only 1 adjustment left' : `${fingersWithIssues} fingers left`,
    severityWeight: anyMajor ? 2 : 1,
    affectedCount: fingersWithIssues,
    order: PROGRESS_ORDER,
  })

  return candidates
}

export function rankCandidates(
  candidates: readonly MessageCandidate[],
  maxMessages = 3,
): MessageCandidate[] {
  const sorted = [...candidates].sort(
    (a, b) =>
      b.severityWeight - a.severityWeight ||
      b.affectedCount - a.affectedCount ||
      a.order - b.order,
  )

  const seen = new Set<string>()
  const ranked: MessageCandidate[] = []
  for (const candidate of sorted) {
    if (seen.has(candidate.message)) {
      continue
    }
    seen.add(candidate.message)
    ranked.push(candidate)
    if (ranked.length >= maxMessages) {
      break
    }
  }
  return ranked
}

export interface MessageStabilizerConfig {
  readonly enterDelayMs: number
  readonly exitDelayMs: number
  readonly maxMessages: number
}

export const DEFAULT_STABILIZER_CONFIG: MessageStabilizerConfig = {
  enterDelayMs: 250,
  exitDelayMs: 450,
  maxMessages: 3,
}

interface MessageWindow {
  readonly firstSeen: number
  lastSeen: number
  active: boolean
  rank: number
}

/**
 * Per-message enter/exit windows. A line shows up once the enter delay has
 * passed since it was first proposed, and lingers for the exit delay after it
 * stops being proposed. Windows of either kind are dropped only after the
 * exit delay.
 */
export class MessageStabilizer {
  private config: MessageStabilizerConfig
  private readonly windows = new Map<string, MessageWindow>()
  private lastStable: readonly string[] = []

  constructor(config?: Partial<MessageStabilizerConfig>) {
    this.config = { ...DEFAULT_STABILIZER_CONFIG, ...config }
  }

  updateConfig(config: Partial<MessageStabilizerConfig>): void {
    this.config = { ...this.config, ...config }
  }

  stabilize(result: StaticGestureResult, signName: string, now: number): readonly string[] {
    if (result.isMatchGlobal) {
      this.clear()
      return []
    }
    const ranked = rankCandidates(buildCandidates(result, signName), this.config.maxMessages)
    return this.applyHysteresis(ranked, now)
  }

  applyHysteresis(candidates: readonly MessageCandidate[], now: number): readonly string[] {
    const proposed = new Set<string>()

    candidates.forEach((candidate, rank) => {
      proposed.add(candidate.message)
      let window = this.windows.get(candidate.message)
      if (!window) {
        window = { firstSeen: now, lastSeen: now, active: false, rank }
        this.windows.set(candidate.message, window)
      }
      window.lastSeen = now
      window.rank = rank
      if (!window.active && now - window.firstSeen >= this.config.enterDelayMs) {
        window.active = true
      }
    })

    for (const [message, window] of this.windows) {
      if (proposed.has(message)) {
        continue
      }
      // Pending windows keep their firstSeen through short dropouts.
      if (now - window.lastSeen >= this.config.exitDelayMs) {
        this.windows.delete(message)
      }
    }

    const lingering = [...this.windows.entries()]
      .filter(([message, window]) => window.active && !proposed.has(message))
      .sort((a, b) => a[1].rank - b[1].rank)
      .map(([message]) => message)

    const output = [
      ...candidates.map((c) => c.message).filter((message) => this.windows.get(message)?.active),
      ...lingering,
    ].slice(0, this.config.maxMessages)

    if (output.length === 0 && this.lastStable.length > 0) {
      return this.lastStable
    }
    this.lastStable = output
    return output
  }

  getActiveMessages(): readonly string[] {
    return this.lastStable
  }

  clear(): void {
    this.windows.clear()
    this.lastStable = []
  }
}
