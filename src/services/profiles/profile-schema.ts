import { z } from 'zod'
import type { ConstraintProfile } from './constraint-profile'

const severitySchema = z.enum(['minor', 'major'])

const curlConstraintSchema = z
  .object({
    minCurl: z.number().min(0).max(1),
    maxCurl: z.number().min(0).max(1),
    enabled: z.boolean().default(true),
    severity: severitySchema.default('major'),
  })
  .refine((curl) => curl.minCurl <= curl.maxCurl, {
    message: 'minCurl must not exceed maxCurl',
  })

const spreadConstraintSchema = z
  .object({
    minAngle: z.number().min(-30).max(30).default(-15),
    maxAngle: z.number().min(-30).max(30).default(15),
    enabled: z.boolean().default(false),
    severity: severitySchema.default('minor'),
  })
  .refine((spread) => spread.minAngle <= spread.maxAngle, {
    message: 'minAngle must not exceed maxAngle',
  })

const fingerMessagesSchema = z
  .object({
    needsCurve: z.string().min(1),
    needsFist: z.string().min(1),
    tooMuchCurl: z.string().min(1),
    needsExtend: z.string().min(1),
    tooExtended: z.string().min(1),
    tooCurled: z.string().min(1),
    generic: z.string().min(1),
  })
  .partial()

const fingerConstraintShape = {
  curl: curlConstraintSchema.default({ minCurl: 0, maxCurl: 1 }),
  spread: spreadConstraintSchema.default({}),
  expectedState: z.enum(['extended', 'curved', 'closed']).optional(),
  messages: fingerMessagesSchema.default({}),
}

export const fingerConstraintSchema = z.object(fingerConstraintShape)

export const thumbConstraintSchema = z.object({
  ...fingerConstraintShape,
  shouldTouchIndex: z.boolean().default(false),
  shouldTouchMiddle: z.boolean().default(false),
  shouldTouchRing: z.boolean().default(false),
  shouldTouchPinky: z.boolean().default(false),
  shouldBeOverFingers: z.boolean().default(false),
  shouldBeBesideFingers: z.boolean().default(false),
})

const vector3Schema = z.object({
  x: z.number(),
  y: z.number(),
  z: z.number(),
})

export const orientationSchema = z.object({
  expectedPalmDirection: vector3Schema.refine(
    (v) => v.x * v.x + v.y * v.y + v.z * v.z > 0.0001,
    { message: 'expectedPalmDirection must not be a zero vector' },
  ),
  toleranceDeg: z.number().positive().max(180).default(45),
})

export const constraintProfileSchema = z.object({
  signName: z.string().min(1),
  description: z.string().default(''),
  fingers: z.object({
    thumb: thumbConstraintSchema.default({}),
    index: fingerConstraintSchema.default({}),
    middle: fingerConstraintSchema.default({}),
    ring: fingerConstraintSchema.default({}),
    pinky: fingerConstraintSchema.default({}),
  }),
  orientation: orientationSchema.nullable().default(null),
})

export const profileSetSchema = z.object({
  profiles: z.array(constraintProfileSchema),
})

export type ConstraintProfileInput = z.input<typeof constraintProfileSchema>

export class ProfileValidationError extends Error {
  readonly issues: readonly z.ZodIssue[]

  constructor(source: string, issues: readonly z.ZodIssue[]) {
    const details = issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    super(`Invalid constraint profile data in ${source}: ${details}`)
    this.name = 'ProfileValidationError'
    this.issues = issues
  }
}

export function parseProfile(raw: unknown, source = 'profile'): ConstraintProfile {
  const parsed = constraintProfileSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ProfileValidationError(source, parsed.error.issues)
  }
  return parsed.data
}

export function parseProfileSet(raw: unknown, source = 'profile set'): ConstraintProfile[] {
  const parsed = profileSetSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ProfileValidationError(source, parsed.error.issues)
  }
  return parsed.data.profiles
}
