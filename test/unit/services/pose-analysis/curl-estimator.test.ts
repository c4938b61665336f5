import { describe, it, expect, beforeEach } from 'vitest'
import {
  CurlEstimator,
  NEUTRAL_CURL,
  computeFingerCurl,
  computeThumbCurl,
  hasZeroLengthSegment,
  readFingerJoints,
} from '@/services/pose-analysis/curl-estimator'
import { fingerJointId } from '@/services/hand-tracking/hand-types'
import { bentChain, buildHandJoints, createFakeHandSource } from '../../../helpers/hand-fixtures'

function chainJoints(bendDeg: number) {
  const [proximal, intermediate, distal, tip] = bentChain({ x: 0, y: 0, z: 0 }, bendDeg)
  return { proximal, intermediate, distal, tip }
}

describe('computeFingerCurl', () => {
  it('returns 0 for a straight finger', () => {
    expect(computeFingerCurl(chainJoints(0))).toBeCloseTo(0, 6)
  })

  it('maps the average joint angle linearly from 180 to 60 degrees', () => {
    // each joint at 90 degrees: (180 - 90) / 120
    expect(computeFingerCurl(chainJoints(90))).toBeCloseTo(0.75, 6)
    expect(computeFingerCurl(chainJoints(60))).toBeCloseTo(0.5, 6)
  })

  it('clamps fully folded fingers to 1', () => {
    expect(computeFingerCurl(chainJoints(130))).toBe(1)
  })
})

describe('computeThumbCurl', () => {
  it('returns 0 for a straight thumb', () => {
    expect(computeThumbCurl(chainJoints(0))).toBeCloseTo(0, 6)
  })

  it('uses the angle between the first and last segment', () => {
    // two joints at 32.5 degrees: last segment turned 65 degrees, (180 - 115) / 130
    expect(computeThumbCurl(chainJoints(32.5))).toBeCloseTo(0.5, 6)
  })
})

describe('readFingerJoints', () => {
  it('returns null when any joint is missing', () => {
    const joints = buildHandJoints()
    joints.delete(fingerJointId('index', 'distal'))
    const source = createFakeHandSource(joints)
    expect(readFingerJoints(source, 'index')).toBeNull()
    expect(readFingerJoints(source, 'middle')).not.toBeNull()
  })

  it('returns null when two joints share a position', () => {
    const joints = buildHandJoints()
    const intermediate = joints.get(fingerJointId('index', 'intermediate'))
    if (intermediate) {
      joints.set(fingerJointId('index', 'distal'), intermediate)
    }
    const source = createFakeHandSource(joints)

    expect(hasZeroLengthSegment(chainJoints(0))).toBe(false)
    expect(readFingerJoints(source, 'index')).toBeNull()
  })
})

describe('CurlEstimator', () => {
  let estimator: CurlEstimator

  beforeEach(() => {
    estimator = new CurlEstimator()
  })

  it('should estimate each finger from its own joints', () => {
    const source = createFakeHandSource(buildHandJoints({ index: 0.75, ring: 0.5 }))
    const curls = estimator.estimate(source)

    expect(curls.index).toBeCloseTo(0.75, 6)
    expect(curls.ring).toBeCloseTo(0.5, 6)
    expect(curls.middle).toBeCloseTo(0, 6)
  })

  it('should report the neutral value before any observation', () => {
    const source = createFakeHandSource()
    source.isTracked = false

    const curls = estimator.estimate(source)

    expect(curls.index).toBe(NEUTRAL_CURL)
    expect(estimator.getLastValid('index')).toBeNull()
  })

  it('should hold the last valid value during a dropout', () => {
    const source = createFakeHandSource(buildHandJoints({ index: 0.75 }))
    estimator.estimate(source)

    source.joints.delete(fingerJointId('index', 'tip'))
    const curls = estimator.estimate(source)

    expect(curls.index).toBeCloseTo(0.75, 6)
  })

  it('should hold the last valid value when a segment collapses', () => {
    const source = createFakeHandSource(buildHandJoints({ index: 0.25 }))
    estimator.estimate(source)

    const distal = source.joints.get(fingerJointId('index', 'distal'))
    if (distal) {
      source.joints.set(fingerJointId('index', 'tip'), distal)
    }
    const curls = estimator.estimate(source)

    expect(curls.index).toBeCloseTo(0.25, 6)
    expect(estimator.getLastValid('index')).toBeCloseTo(0.25, 6)
  })

  it('should hold every finger while the hand is untracked', () => {
    const source = createFakeHandSource(buildHandJoints({ pinky: 0.5 }))
    estimator.estimate(source)
    source.isTracked = false

    expect(estimator.estimate(source).pinky).toBeCloseTo(0.5, 6)
  })

  it('should forget held values on reset', () => {
    const source = createFakeHandSource(buildHandJoints({ index: 0.75 }))
    estimator.estimate(source)
    estimator.reset()
    source.isTracked = false

    expect(estimator.estimate(source).index).toBe(NEUTRAL_CURL)
  })
})
