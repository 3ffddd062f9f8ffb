export type AutorouteErrorCode =
  | 'MISSING_SCOPE_ARGUMENT'
  | 'MISSING_ROUTE_METADATA'
  | 'INVALID_SYNTHESIZER_ARGUMENTS'
  | 'LOCK_ACQUISITION_FAILURE'
  | 'UNSUPPORTED_HANDLER_DECLARATION'
  | 'INVALID_CONFIGURATION'

/**
 * Base class of every error that aborts a build pass. None of them is
 * retried: the pass stops and writes no generated file.
 */
export class AutorouteError extends Error {
  constructor(
    message: string,
    public readonly code: AutorouteErrorCode
  ) {
    super(message)
    this.name = 'AutorouteError'
  }
}

/** Identifies a handler declaration in messages, e.g. `EventRoutes.search (src/events.ts:4:3)` */
export type HandlerReference = {
  handler: string
  location: string
}

function describe(ref: HandlerReference): string {
  return `"${ref.handler}" (${ref.location})`
}

export class MissingScopeArgument extends AutorouteError {
  constructor(
    public readonly ref: HandlerReference,
    detail: string
  ) {
    super(
      `Handler ${describe(ref)} has no usable scope: ${detail}. Pass the scope as a single string literal, e.g. @autoRegister('/events')`,
      'MISSING_SCOPE_ARGUMENT'
    )
    this.name = 'MissingScopeArgument'
  }
}

export class MissingRouteMetadata extends AutorouteError {
  constructor(
    public readonly ref: HandlerReference,
    detail: string
  ) {
    super(
      `Handler ${describe(ref)} has no valid route metadata: ${detail}. Exactly one verb marker with a string literal path is required, e.g. @get('/search')`,
      'MISSING_ROUTE_METADATA'
    )
    this.name = 'MissingRouteMetadata'
  }
}

export class UnsupportedHandlerDeclaration extends AutorouteError {
  constructor(
    public readonly ref: HandlerReference,
    detail: string
  ) {
    super(`Handler ${describe(ref)} cannot be registered: ${detail}`, 'UNSUPPORTED_HANDLER_DECLARATION')
    this.name = 'UnsupportedHandlerDeclaration'
  }
}

export class InvalidSynthesizerArguments extends AutorouteError {
  constructor(
    public readonly invocation: string,
    detail: string
  ) {
    super(`Invalid service registration request ${invocation}: ${detail}`, 'INVALID_SYNTHESIZER_ARGUMENTS')
    this.name = 'InvalidSynthesizerArguments'
  }
}

export class LockAcquisitionFailure extends AutorouteError {
  constructor(
    public readonly operation: 'read' | 'write',
    detail: string
  ) {
    super(`Could not acquire the registry ${operation} lock: ${detail}`, 'LOCK_ACQUISITION_FAILURE')
    this.name = 'LockAcquisitionFailure'
  }
}

export class InvalidConfiguration extends AutorouteError {
  constructor(
    public readonly source: string,
    detail: string
  ) {
    super(`Invalid configuration in ${source}: ${detail}`, 'INVALID_CONFIGURATION')
    this.name = 'InvalidConfiguration'
  }
}

export function isAutorouteError(error: unknown): error is AutorouteError {
  return error instanceof AutorouteError
}
