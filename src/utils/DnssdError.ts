// MARK: DnssdErrorCode
/**
 * Failure categories surfaced by the bridge.
 *
 * - `InvalidArgument`: malformed or oversized input, unparseable wire type, bad port or address.
 * - `IncorrectState`: a backend or result-dispatcher entry point is not bound.
 * - `OutOfMemory`: a browse session or a TXT buffer could not be allocated.
 * - `BackendFault`: the backend threw across the call boundary.
 * - `Unsupported`: the operation is not available on this bridge.
 * - `UnknownResourceId`: a resolve completed without an address or port.
 */
export type DnssdErrorCode =
  | 'InvalidArgument'
  | 'IncorrectState'
  | 'OutOfMemory'
  | 'BackendFault'
  | 'Unsupported'
  | 'UnknownResourceId'

// MARK: DnssdError
export class DnssdError extends Error {
  override readonly name = 'DnssdError'

  constructor(
    readonly code: DnssdErrorCode,
    message: string = code,
    options?: { cause?: unknown },
  ) {
    super(message, options)
  }
}

export function isDnssdError(value: unknown, code?: DnssdErrorCode): value is DnssdError {
  return value instanceof DnssdError && (code === undefined || value.code === code)
}
