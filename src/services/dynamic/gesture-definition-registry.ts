import { z } from 'zod'
import type { Vector3 } from '@/utils/math'
import builtinDefinitions from './data/dynamic-gestures.json'

export interface DynamicGestureDefinition {
  readonly gestureName: string
  readonly description: string
  readonly primaryDirection: Vector3
  /** Only gestures that set this are checked for direction alignment. */
  readonly requiresSpecificDirection: boolean
  /** degrees */
  readonly directionTolerance: number
  /** m/s */
  readonly minSpeed: number
  /** m */
  readonly minDistance: number
  /** s */
  readonly minDuration: number
  readonly maxDuration: number
  readonly requiresDirectionChange: boolean
  readonly requiredDirectionChanges: number
  readonly requiresRotation: boolean
  readonly rotationAxis: Vector3
  /** degrees */
  readonly minRotationAngle: number
  readonly requiresCircularMotion: boolean
  readonly minCircularityScore: number
}

export const DEFAULT_GESTURE_DEFINITION: Omit<DynamicGestureDefinition, 'gestureName'> = {
  description: '',
  primaryDirection: { x: 0, y: 0, z: 0 },
  requiresSpecificDirection: false,
  directionTolerance: 45,
  minSpeed: 0.12,
  minDistance: 0.08,
  minDuration: 0.4,
  maxDuration: 3,
  requiresDirectionChange: false,
  requiredDirectionChanges: 0,
  requiresRotation: false,
  rotationAxis: { x: 0, y: 0, z: 1 },
  minRotationAngle: 30,
  requiresCircularMotion: false,
  minCircularityScore: 0.6,
}

export function createGestureDefinition(
  gestureName: string,
  overrides?: Partial<Omit<DynamicGestureDefinition, 'gestureName'>>,
): DynamicGestureDefinition {
  return { ...DEFAULT_GESTURE_DEFINITION, ...overrides, gestureName }
}

const vector3Schema = z.object({ x: z.number(), y: z.number(), z: z.number() })

const definitionSchema = z
  .object({
    gestureName: z.string().min(1),
    description: z.string(),
    primaryDirection: vector3Schema,
    requiresSpecificDirection: z.boolean(),
    directionTolerance: z.number().positive().max(180),
    minSpeed: z.number().nonnegative(),
    minDistance: z.number().nonnegative(),
    minDuration: z.number().nonnegative(),
    maxDuration: z.number().positive(),
    requiresDirectionChange: z.boolean(),
    requiredDirectionChanges: z.number().int().nonnegative(),
    requiresRotation: z.boolean(),
    rotationAxis: vector3Schema,
    minRotationAngle: z.number().nonnegative(),
    requiresCircularMotion: z.boolean(),
    minCircularityScore: z.number().min(0).max(1),
  })
  .partial()
  .required({ gestureName: true })

const definitionSetSchema = z.object({ gestures: z.array(definitionSchema) })

export function parseGestureDefinitions(raw: unknown): DynamicGestureDefinition[] {
  const { gestures } = definitionSetSchema.parse(raw)
  return gestures.map(({ gestureName, ...overrides }) => createGestureDefinition(gestureName, overrides))
}

/**
 * Explicit name -> definition lookup handed to the orchestrator.
 */
export class GestureDefinitionRegistry {
  private readonly definitions = new Map<string, DynamicGestureDefinition>()

  constructor(definitions: readonly DynamicGestureDefinition[] = []) {
    for (const definition of definitions) {
      this.register(definition)
    }
  }

  register(definition: DynamicGestureDefinition): void {
    this.definitions.set(definition.gestureName, definition)
  }

  get(gestureName: string): DynamicGestureDefinition | null {
    return this.definitions.get(gestureName) ?? null
  }

  has(gestureName: string): boolean {
    return this.definitions.has(gestureName)
  }

  names(): readonly string[] {
    return [...this.definitions.keys()]
  }
}

export function createDefaultGestureRegistry(): GestureDefinitionRegistry {
  return new GestureDefinitionRegistry(parseGestureDefinitions(builtinDefinitions))
}
