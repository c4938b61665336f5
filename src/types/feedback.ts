import type { StaticGestureResult } from '@/services/pose-analysis/pose-types'
import type {
  DynamicFeedbackResult,
  DynamicGestureResult,
} from '@/services/dynamic/dynamic-types'

export type FeedbackState =
  | 'inactive'
  | 'waiting'
  | 'showing-errors'
  | 'partial-match'
  | 'success'
  | 'in-progress'

export type AudioCue = 'start-practice' | 'success' | 'error'

export type FeedbackEvent =
  | {
      readonly type: 'state-changed'
      readonly state: FeedbackState
      readonly previous: FeedbackState
      readonly timestamp: number
    }
  | { readonly type: 'message'; readonly message: string; readonly timestamp: number }
  | { readonly type: 'overlay-visibility'; readonly visible: boolean; readonly timestamp: number }
  | { readonly type: 'static-result'; readonly result: StaticGestureResult; readonly timestamp: number }
  | { readonly type: 'dynamic-phase'; readonly result: DynamicFeedbackResult; readonly timestamp: number }
  | { readonly type: 'dynamic-result'; readonly result: DynamicGestureResult; readonly timestamp: number }
  | { readonly type: 'gesture-success'; readonly signName: string; readonly timestamp: number }
  | { readonly type: 'audio-cue'; readonly cue: AudioCue; readonly timestamp: number }

export type FeedbackEventType = FeedbackEvent['type']
