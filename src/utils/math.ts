export interface Vector3 {
  readonly x: number
  readonly y: number
  readonly z: number
}

export interface Point3D {
  readonly x: number
  readonly y: number
  readonly z: number
}

export interface Quaternion {
  readonly x: number
  readonly y: number
  readonly z: number
  readonly w: number
}

export const ZERO_VECTOR: Vector3 = { x: 0, y: 0, z: 0 }
export const FORWARD: Vector3 = { x: 0, y: 0, z: 1 }
export const IDENTITY_ROTATION: Quaternion = { x: 0, y: 0, z: 0, w: 1 }

export function dot(v1: Vector3, v2: Vector3): number {
  return v1.x * v2.x + v1.y * v2.y + v1.z * v2.z
}

export function magnitude(v: Vector3): number {
  return Math.sqrt(v.x * v.x + v.y * v.y + v.z * v.z)
}

export function subtract(to: Point3D, from: Point3D): Vector3 {
  return { x: to.x - from.x, y: to.y - from.y, z: to.z - from.z }
}

export function negate(v: Vector3): Vector3 {
  return { x: -v.x, y: -v.y, z: -v.z }
}

export function scale(v: Vector3, factor: number): Vector3 {
  return { x: v.x * factor, y: v.y * factor, z: v.z * factor }
}

export function cross(a: Vector3, b: Vector3): Vector3 {
  return {
    x: a.y * b.z - a.z * b.y,
    y: a.z * b.x - a.x * b.z,
    z: a.x * b.y - a.y * b.x,
  }
}

/** Angle between two vectors in radians; 0 when either is zero-length. */
export function vectorAngle(v1: Vector3, v2: Vector3): number {
  const mag1 = magnitude(v1)
  const mag2 = magnitude(v2)

  if (mag1 === 0 || mag2 === 0) {
    return 0
  }

  const cosTheta = Math.max(-1, Math.min(1, dot(v1, v2) / (mag1 * mag2)))
  return Math.acos(cosTheta)
}

export function toDegrees(radians: number): number {
  return radians * (180 / Math.PI)
}

export function toRadians(degrees: number): number {
  return degrees * (Math.PI / 180)
}

export function distance3D(p1: Point3D, p2: Point3D): number {
  return magnitude(subtract(p2, p1))
}

export function midpoint(p1: Point3D, p2: Point3D): Point3D {
  return {
    x: (p1.x + p2.x) / 2,
    y: (p1.y + p2.y) / 2,
    z: (p1.z + p2.z) / 2,
  }
}

export function normalize(v: Vector3): Vector3 {
  const mag = magnitude(v)

  if (mag === 0) {
    return ZERO_VECTOR
  }

  return {
    x: v.x / mag,
    y: v.y / mag,
    z: v.z / mag,
  }
}

export function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value))
}

/**
 * Position of `value` between `a` and `b`, clamped to [0, 1].
 * Works for descending ranges (a > b), which the curl mapping relies on.
 */
export function inverseLerp(a: number, b: number, value: number): number {
  if (a === b) {
    return 0
  }
  return clamp01((value - a) / (b - a))
}

export function rotateVector(q: Quaternion, v: Vector3): Vector3 {
  // v' = v + 2w(u x v) + 2(u x (u x v)), u = (q.x, q.y, q.z)
  const u: Vector3 = { x: q.x, y: q.y, z: q.z }
  const uv = cross(u, v)
  const uuv = cross(u, uv)
  return {
    x: v.x + 2 * (q.w * uv.x + uuv.x),
    y: v.y + 2 * (q.w * uv.y + uuv.y),
    z: v.z + 2 * (q.w * uv.z + uuv.z),
  }
}

/** Shortest-arc rotation taking direction `from` onto direction `to`. */
export function quaternionFromTo(from: Vector3, to: Vector3): Quaternion {
  const a = normalize(from)
  const b = normalize(to)
  const d = dot(a, b)

  if (d >= 1 - 1e-9) {
    return IDENTITY_ROTATION
  }

  if (d <= -1 + 1e-9) {
    // 180 degrees: any axis orthogonal to `a`
    let axis = cross({ x: 1, y: 0, z: 0 }, a)
    if (magnitude(axis) < 1e-6) {
      axis = cross({ x: 0, y: 1, z: 0 }, a)
    }
    const n = normalize(axis)
    return { x: n.x, y: n.y, z: n.z, w: 0 }
  }

  const c = cross(a, b)
  const w = 1 + d
  const len = Math.sqrt(c.x * c.x + c.y * c.y + c.z * c.z + w * w)
  return { x: c.x / len, y: c.y / len, z: c.z / len, w: w / len }
}
