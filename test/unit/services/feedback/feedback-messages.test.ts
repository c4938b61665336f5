import { describe, it, expect } from 'vitest'
import {
  NEAR_COMPLETION_MESSAGES,
  PERFECT_MESSAGE,
  describeDirection,
  generateSummary,
  getCorrectionMessage,
  getFailedMessage,
  getGestureDirectionHint,
  getIdlePhaseMessage,
  getInProgressMessage,
  getStateDescription,
  joinFingerNames,
  pickNearCompletionMessage,
} from '@/services/feedback/feedback-messages'
import type { FingerError } from '@/services/pose-analysis/pose-types'

function error(message: string, severity: FingerError['severity']): FingerError {
  return {
    finger: 'index',
    errorType: 'NEEDS_CURVE',
    severity,
    currentValue: 0,
    expectedValue: 0.6,
    message,
    isCustomMessage: false,
  }
}

describe('joinFingerNames', () => {
  it('should join names naturally', () => {
    expect(joinFingerNames([])).toBe('')
    expect(joinFingerNames(['index'])).toBe('index')
    expect(joinFingerNames(['index', 'middle'])).toBe('index and middle')
    expect(joinFingerNames(['index', 'middle', 'ring'])).toBe('index, middle and ring')
  })
})

describe('getCorrectionMessage', () => {
  it('should soften the wording for minor issues', () => {
    expect(getCorrectionMessage('ring', 'NEEDS_CURVE', 'major')).toBe("Curve your ring (don't make a fist)")
    expect(getCorrectionMessage('ring', 'NEEDS_CURVE', 'minor')).toBe('Curve your ring a bit more')
    expect(getCorrectionMessage('pinky', 'NEEDS_EXTEND')).toBe('Straighten your pinky fully')
    expect(getCorrectionMessage('index', 'SPREAD_TOO_NARROW', 'minor')).toBe('Spread your fingers a bit more')
  })
})

describe('getStateDescription', () => {
  it('should describe each shape', () => {
    expect(getStateDescription('extended', 'index')).toBe('index straight, like pointing')
    expect(getStateDescription('closed', 'middle')).toBe('middle closed into a fist')
  })
})

describe('generateSummary', () => {
  it('should praise a pose without errors', () => {
    expect(generateSummary([])).toBe(PERFECT_MESSAGE)
  })

  it('should put major errors first', () => {
    expect(generateSummary([error('minor one', 'minor'), error('major one', 'major')])).toBe(
      'major one\nminor one',
    )
  })

  it('should sound encouraging with only minor errors', () => {
    expect(generateSummary([error('Rotate your hand slightly', 'minor')])).toBe(
      'Almost there: Rotate your hand slightly',
    )
  })

  it('should focus on the first fixes when many majors remain', () => {
    const errors = [error('one', 'major'), error('two', 'major'), error('three', 'major')]
    expect(generateSummary(errors)).toBe('Start with: one\ntwo')
    expect(generateSummary(errors, 3)).toBe('Start with: one\ntwo\nthree')
  })
})

describe('getGestureDirectionHint', () => {
  it('should match letters by prefix and words by content', () => {
    expect(getGestureDirectionHint('J')).toBe('Draw a J: move your pinky down and curve it toward you.')
    expect(getGestureDirectionHint('z_letter')).toBe('Draw a Z: right, diagonal down-left, then right.')
    expect(getGestureDirectionHint('ThankYou')).toBe('Move your hand forward from your chin.')
  })

  it('should return null for unknown or empty names', () => {
    expect(getGestureDirectionHint('Swipe')).toBeNull()
    expect(getGestureDirectionHint('')).toBeNull()
  })
})

describe('describeDirection', () => {
  it('should name the dominant axes', () => {
    expect(describeDirection({ x: 1, y: 1, z: 0 })).toBe('up and to the right')
    expect(describeDirection({ x: 0, y: 0, z: -2 })).toBe('toward you')
    expect(describeDirection({ x: 0, y: -1, z: 0 })).toBe('down')
  })

  it('should fall back for tiny vectors', () => {
    expect(describeDirection({ x: 0.01, y: 0, z: 0 })).toBe('in the right direction')
  })
})

describe('dynamic phase messages', () => {
  it('should describe the idle and in-progress phases', () => {
    expect(getIdlePhaseMessage('Hello')).toBe("Place your hand for 'Hello'.")
    expect(getInProgressMessage('TOO_FAST', 'Hello')).toBe('Slow down.')
    expect(getInProgressMessage('NONE', 'Hello')).toBe('Keep going.')
  })

  it('should prefer a gesture hint for a wrong direction', () => {
    expect(getInProgressMessage('DIRECTION_WRONG', 'Hello', { x: 1, y: 0, z: 0 })).toBe(
      'Wave your hand side to side, like a greeting.',
    )
    expect(getInProgressMessage('DIRECTION_WRONG', 'Swipe', { x: -1, y: 0, z: 0 })).toBe(
      'Move your hand to the left.',
    )
    expect(getInProgressMessage('DIRECTION_WRONG', 'Swipe')).toBe('Adjust the direction of the movement.')
  })

  it('should pick a near-completion line from the random source', () => {
    expect(pickNearCompletionMessage(() => 0)).toBe(NEAR_COMPLETION_MESSAGES[0])
    expect(pickNearCompletionMessage(() => 0.99)).toBe(NEAR_COMPLETION_MESSAGES[3])
    expect(pickNearCompletionMessage(() => 1)).toBe(NEAR_COMPLETION_MESSAGES[3])
  })

  it('should explain failures and invite another try', () => {
    expect(getFailedMessage('POSE_LOST', 'start', 'Hello')).toBe('You started moving too early. Try again.')
    expect(getFailedMessage('POSE_LOST', 'move', 'Hello')).toBe(
      'You lost the hand shape during the movement. Try again.',
    )
    expect(getFailedMessage('UNKNOWN', 'none', 'Hello')).toBe(
      "The movement for 'Hello' was not recognized. Try again.",
    )
    expect(getFailedMessage('DIRECTION_WRONG', 'move', 'J')).toBe(
      'The direction was not right. Draw a J: move your pinky down and curve it toward you. Try again.',
    )
  })
})
