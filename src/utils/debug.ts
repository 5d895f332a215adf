import createDebug from 'debug'

/**
 * Namespaced tracing, enabled with `DEBUG=dnssd-bridge:*`.
 */
export const debug = createDebug('dnssd-bridge')

export const bridgeDebug = debug.extend('bridge')
export const marshalDebug = debug.extend('marshal')
export const backendDebug = debug.extend('backend')
export const responderDebug = debug.extend('responder')
