export * from './utils/math'

export * from './services/hand-tracking/hand-types'
export * from './services/hand-tracking/mediapipe-hand-source'

export * from './services/pose-analysis/pose-types'
export * from './services/pose-analysis/finger-state'
export * from './services/pose-analysis/curl-estimator'
export * from './services/pose-analysis/static-pose-evaluator'
export * from './services/pose-analysis/hand-pose-analyzer'

export * from './services/profiles/constraint-profile'
export * from './services/profiles/profile-schema'
export * from './services/profiles/profile-registry'
export * from './services/profiles/profile-loader'

export * from './services/dynamic/dynamic-types'
export * from './services/dynamic/gesture-definition-registry'
export * from './services/dynamic/movement-issue-detector'
export * from './services/dynamic/dynamic-phase-engine'

export * from './services/feedback/feedback-messages'
export * from './services/feedback/message-stabilizer'
export * from './services/feedback/feedback-ports'
export * from './services/feedback/feedback-orchestrator'

export * from './services/config/config-store'

export * from './types/settings'
export * from './types/feedback'

export * from './hooks/useSignFeedback'
