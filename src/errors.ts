// The version tag is not one this host build understands
export class UnsupportedVersionError extends Error {
  readonly kind = 'UnsupportedVersion' as const
  readonly version: string

  constructor(version: string, supported: readonly string[]) {
    super(
      `unsupported request version ${version}, expected one of: ${supported.join(', ')}`
    )
    this.name = 'UnsupportedVersionError'
    this.version = version
  }
}

// The payload does not match the shape expected for its version
export class MalformedRequestError extends Error {
  readonly kind = 'MalformedRequest' as const
  readonly variant?: string

  constructor(message: string, variant?: string) {
    super(message)
    this.name = 'MalformedRequestError'
    this.variant = variant
  }
}

// No capability is registered for the namespace and operation
export class UnknownOperationError extends Error {
  readonly kind = 'UnknownOperation' as const
  readonly namespace: string
  readonly operation: string

  constructor(namespace: string, operation: string) {
    super(`unknown operation ${namespace}/${operation}`)
    this.name = 'UnknownOperationError'
    this.namespace = namespace
    this.operation = operation
  }
}

export type CallbackError =
  | UnsupportedVersionError
  | MalformedRequestError
  | UnknownOperationError

export type CallbackErrorKind = CallbackError['kind'] | 'CapabilityFailure'

export function isCallbackError(error: unknown): error is CallbackError {
  return (
    error instanceof UnsupportedVersionError ||
    error instanceof MalformedRequestError ||
    error instanceof UnknownOperationError
  )
}
