import { IntoError } from '../lib/transform'

export type ContextDetails = Record<string, string | number | boolean>

/**
 * Wraps a failure payload with a context message
 * Recoverability is inherited from the wrapped error, payloads that can't classify themselves
 * (like the `void` failures of the cursor primitives) are recoverable
 */
export class ContextError<S> extends Error {
  constructor(message: string, public readonly cause: S, public readonly details: ContextDetails = {}) {
    super(message)
    this.name = 'ContextError'
  }

  recoverable(): boolean {
    return hasRecoverable(this.cause) ? this.cause.recoverable() : true
  }
}

export function errorContext<S>(message: string, details?: ContextDetails): IntoError<S, ContextError<S>> {
  return { intoError: (source) => new ContextError(message, source, details) }
}

function hasRecoverable(value: unknown): value is { recoverable(): boolean } {
  return (
    typeof value === 'object' && value !== null && 'recoverable' in value && typeof value.recoverable === 'function'
  )
}
