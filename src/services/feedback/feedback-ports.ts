/** Independent recognizer whose verdict is the only source of a static match. */
export interface StaticGestureRecognizerPort {
  readonly isPerformed: boolean
  /** Sign this recognizer was configured for; null when unassigned. */
  readonly targetSign: string | null
}

export interface DynamicGestureRecognizerPort {
  readonly isStartPoseValid: boolean
}

export interface SignTarget {
  readonly signName: string
  readonly requiresMovement: boolean
}
