export type WorkflowErrorKind =
  | 'step_failed'
  | 'condition_failed'
  | 'validation'
  | 'max_retries_exceeded'
  | 'browser_not_available'
  | 'serialization'
  | 'io'

export class WorkflowError extends Error {
  readonly kind: WorkflowErrorKind
  /** Step the error belongs to, where there is one */
  readonly step?: string

  constructor(kind: WorkflowErrorKind, message: string, options: { step?: string; cause?: unknown } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined)
    this.name = 'WorkflowError'
    this.kind = kind
    this.step = options.step
  }
}

export function isWorkflowError(error: unknown, kind?: WorkflowErrorKind): error is WorkflowError {
  return error instanceof WorkflowError && (kind === undefined || error.kind === kind)
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export function stepFailed(step: string, error: string): WorkflowError {
  return new WorkflowError('step_failed', `Step execution failed: ${step} - ${error}`, { step })
}

export function conditionFailed(condition: string): WorkflowError {
  return new WorkflowError('condition_failed', `Conditional evaluation failed: ${condition}`)
}

export function validationError(message: string): WorkflowError {
  return new WorkflowError('validation', `Workflow validation error: ${message}`)
}

export function maxRetriesExceeded(step: string, cause?: unknown): WorkflowError {
  return new WorkflowError('max_retries_exceeded', `Max retries exceeded for step: ${step}`, { step, cause })
}

export function browserNotAvailable(): WorkflowError {
  return new WorkflowError('browser_not_available', 'Browser not available')
}

export function serializationError(message: string, cause?: unknown): WorkflowError {
  return new WorkflowError('serialization', `Serialization error: ${message}`, { cause })
}

export function ioError(message: string, cause?: unknown): WorkflowError {
  return new WorkflowError('io', `I/O error: ${message}`, { cause })
}
