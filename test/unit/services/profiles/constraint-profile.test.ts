import { describe, it, expect } from 'vitest'
import {
  DEFAULT_CURL_CONSTRAINT,
  createCurlConstraint,
  createFingerConstraint,
  createProfile,
  createThumbConstraint,
  curledConstraint,
  extendedConstraint,
  getCurlMidpoint,
  getCustomMessage,
  getExpectedState,
  getFingerConstraint,
  getThumbTouchTargets,
  partiallyCurledConstraint,
} from '@/services/profiles/constraint-profile'

describe('constraint profile factories', () => {
  it('should accept any curl on unspecified fingers', () => {
    const profile = createProfile({ signName: 'X1' })

    expect(profile.description).toBe('')
    expect(profile.orientation).toBeNull()
    expect(getFingerConstraint(profile, 'ring').curl).toEqual(DEFAULT_CURL_CONSTRAINT)
    expect(profile.fingers.thumb.shouldTouchIndex).toBe(false)
  })

  it('should build the named curl presets', () => {
    expect(extendedConstraint().curl).toMatchObject({ minCurl: 0, maxCurl: 0.25 })
    expect(curledConstraint().curl).toMatchObject({ minCurl: 0.7, maxCurl: 1 })
    expect(partiallyCurledConstraint().curl).toMatchObject({ minCurl: 0.3, maxCurl: 0.7 })
  })

  it('should keep spread disabled by default', () => {
    expect(createFingerConstraint().spread.enabled).toBe(false)
  })
})

describe('getExpectedState', () => {
  it('should prefer the declared state', () => {
    const constraint = createFingerConstraint({
      curl: createCurlConstraint(0, 0.2),
      expectedState: 'curved',
    })
    expect(getExpectedState(constraint)).toBe('curved')
  })

  it('should derive the state from the curl midpoint', () => {
    expect(getCurlMidpoint(createCurlConstraint(0.45, 0.75))).toBeCloseTo(0.6, 6)
    expect(getExpectedState(createFingerConstraint({ curl: createCurlConstraint(0.45, 0.75) }))).toBe('curved')
    expect(getExpectedState(curledConstraint())).toBe('closed')
    expect(getExpectedState(extendedConstraint())).toBe('extended')
  })
})

describe('getThumbTouchTargets', () => {
  it('should list the fingers in hand order', () => {
    const thumb = createThumbConstraint({ shouldTouchPinky: true, shouldTouchMiddle: true })
    expect(getThumbTouchTargets(thumb)).toEqual(['middle', 'pinky'])
  })
})

describe('getCustomMessage', () => {
  it('should prefer the role-specific template', () => {
    const constraint = createFingerConstraint({
      messages: { needsCurve: 'Hook it', tooExtended: 'Fold it' },
    })
    expect(getCustomMessage(constraint, 'NEEDS_CURVE')).toBe('Hook it')
    expect(getCustomMessage(constraint, 'NEEDS_FIST')).toBe('Fold it')
    expect(getCustomMessage(constraint, 'TOO_EXTENDED')).toBe('Fold it')
  })

  it('should not use the generic template for curl errors', () => {
    const constraint = createFingerConstraint({ messages: { generic: 'Check your hand' } })
    expect(getCustomMessage(constraint, 'TOO_CURLED')).toBeNull()
    expect(getCustomMessage(constraint, 'SPREAD_TOO_WIDE')).toBe('Check your hand')
  })
})
