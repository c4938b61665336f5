export interface FeedbackSettings {
  readonly analysis: AnalysisSettings
  readonly stability: StabilitySettings
  readonly timing: TimingSettings
  readonly dynamic: DynamicSettings
}

export interface AnalysisSettings {
  /** Minimum gap between two static evaluations. */
  readonly intervalMs: number
  readonly curlTolerance: number
  readonly debugMode: boolean
}

export interface StabilitySettings {
  readonly messageEnterDelayMs: number
  readonly messageExitDelayMs: number
  readonly maxMessages: number
}

export interface TimingSettings {
  readonly successDisplayDurationMs: number
  readonly errorMessageHoldMinMs: number
  readonly errorMessageHoldMaxMs: number
  readonly dynamicSuccessHoldDurationMs: number
}

export interface DynamicSettings {
  readonly nearCompletionThreshold: number
  readonly messageCooldownMs: number
}

export const DEFAULT_SETTINGS: FeedbackSettings = {
  analysis: {
    intervalMs: 200,
    curlTolerance: 0.1,
    debugMode: false,
  },
  stability: {
    messageEnterDelayMs: 250,
    messageExitDelayMs: 450,
    maxMessages: 3,
  },
  timing: {
    successDisplayDurationMs: 3000,
    errorMessageHoldMinMs: 1000,
    errorMessageHoldMaxMs: 1300,
    dynamicSuccessHoldDurationMs: 3000,
  },
  dynamic: {
    nearCompletionThreshold: 0.8,
    messageCooldownMs: 500,
  },
}
