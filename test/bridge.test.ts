import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import { DnssdBridge, type DnssdError, type DnssdService, isDnssdError } from '../src'
import { catchError, createFakeBackend, type FakeBackend } from './helpers'

function createService(overrides: Partial<DnssdService> = {}): DnssdService {
  return {
    name: 'Node',
    hostName: 'host',
    type: '_matter',
    protocol: 'tcp',
    port: 5540,
    textEntries: [],
    subtypes: [],
    ...overrides,
  }
}

describe('bridge', () => {
  let backend: FakeBackend
  let bridge: DnssdBridge

  beforeEach(() => {
    backend = createFakeBackend()
    bridge = new DnssdBridge()
    bridge.bind({ resolver: backend, browser: backend, textEntries: backend })
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  // MARK: bind
  describe('bind', () => {
    it('should report missing entry points and leave them unbound', () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {})
      const partial = new DnssdBridge()
      partial.bind({ resolver: { resolve: backend.resolve } })

      expect(partial.isBound('resolve')).toBe(true)
      expect(partial.isBound('publish')).toBe(false)
      expect(partial.isBound('browse')).toBe(false)
      expect(spy).toHaveBeenCalledWith("Failed to access Resolver 'publish' entry point")
      expect(spy).toHaveBeenCalledTimes(6)
    })

    it('should fail operations that need an unbound entry point with IncorrectState', () => {
      vi.spyOn(console, 'error').mockImplementation(() => {})
      const unbound = new DnssdBridge()
      unbound.bind({})

      expect(isDnssdError(catchError(() => unbound.browse('_http', 'tcp', 'any', undefined, vi.fn(), null)), 'IncorrectState')).toBe(true)
      expect(isDnssdError(catchError(() => unbound.stopBrowse(1)), 'IncorrectState')).toBe(true)
      expect(isDnssdError(catchError(() => unbound.resolve(createService(), undefined, vi.fn(), null)), 'IncorrectState')).toBe(true)
      expect(isDnssdError(catchError(() => unbound.publishService(createService())), 'IncorrectState')).toBe(true)
      expect(isDnssdError(catchError(() => unbound.removeServices()), 'IncorrectState')).toBe(true)
      expect(unbound.lock.isHeld).toBe(false)
    })
  })

  // MARK: init
  describe('init', () => {
    it('should report success with the context', () => {
      const onSuccess = vi.fn()
      const onError = vi.fn()
      bridge.init(onSuccess, onError, 'ctx')

      expect(onSuccess).toHaveBeenCalledWith('ctx', null)
      expect(onError).not.toHaveBeenCalled()
    })

    it('should require both callbacks', () => {
      expect(isDnssdError(catchError(() => bridge.init(null, vi.fn())), 'InvalidArgument')).toBe(true)
      expect(isDnssdError(catchError(() => bridge.init(vi.fn(), null)), 'InvalidArgument')).toBe(true)
    })
  })

  // MARK: browse
  describe('browse', () => {
    it('should pass the encoded type to the backend with the lock released', () => {
      let heldDuringCall: boolean | undefined
      backend.browse.mockImplementation(() => {
        heldDuringCall = bridge.lock.isHeld
      })
      const callback = vi.fn()

      const id = bridge.browse('_matter._sub.foo', 'tcp', 'any', undefined, callback, 'ctx')

      expect(id).not.toBe(0)
      expect(backend.browse).toHaveBeenCalledWith('foo,_matter._tcp', callback, 'ctx', bridge.dispatcher)
      expect(heldDuringCall).toBe(false)
      expect(bridge.lock.isHeld).toBe(false)
      expect(bridge.sessions.has(id)).toBe(true)
    })

    it('should reject a missing type or callback without calling the backend', () => {
      expect(isDnssdError(catchError(() => bridge.browse(null, 'tcp', 'any', undefined, vi.fn(), null)), 'InvalidArgument')).toBe(true)
      expect(isDnssdError(catchError(() => bridge.browse('', 'tcp', 'any', undefined, vi.fn(), null)), 'InvalidArgument')).toBe(true)
      expect(isDnssdError(catchError(() => bridge.browse('_http', 'tcp', 'any', undefined, null, null)), 'InvalidArgument')).toBe(true)
      expect(backend.browse).not.toHaveBeenCalled()
      expect(bridge.sessions.size).toBe(0)
    })

    it('should fail with OutOfMemory once every session is taken', () => {
      const limited = new DnssdBridge({ limits: { maxBrowseSessions: 1 } })
      limited.bind({ resolver: backend, browser: backend, textEntries: backend })

      limited.browse('_http', 'tcp', 'any', undefined, vi.fn(), null)
      const error = catchError(() => limited.browse('_http', 'tcp', 'any', undefined, vi.fn(), null))

      expect(isDnssdError(error, 'OutOfMemory')).toBe(true)
      expect(backend.browse).toHaveBeenCalledTimes(1)
    })

    it('should surface a backend throw as BackendFault and keep no session', () => {
      vi.spyOn(console, 'error').mockImplementation(() => {})
      backend.browse.mockImplementation(() => {
        throw new Error('socket closed')
      })

      const error = catchError(() => bridge.browse('_http', 'tcp', 'any', undefined, vi.fn(), null))

      expect(isDnssdError(error, 'BackendFault')).toBe(true)
      expect(bridge.sessions.size).toBe(0)
      expect(bridge.lock.isHeld).toBe(false)
    })
  })

  // MARK: stopBrowse
  describe('stopBrowse', () => {
    it('should cancel by callback and reclaim the session', () => {
      const callback = vi.fn()
      const id = bridge.browse('_http', 'tcp', 'any', undefined, callback, null)

      bridge.stopBrowse(id)

      expect(backend.stopBrowse).toHaveBeenCalledWith(callback)
      expect(bridge.sessions.has(id)).toBe(false)
    })

    it('should reject identifier 0', () => {
      expect(isDnssdError(catchError(() => bridge.stopBrowse(0)), 'InvalidArgument')).toBe(true)
      expect(backend.stopBrowse).not.toHaveBeenCalled()
    })

    it('should warn and do nothing for an unknown identifier', () => {
      const spy = vi.spyOn(console, 'warn').mockImplementation(() => {})
      const id = bridge.browse('_http', 'tcp', 'any', undefined, vi.fn(), null)
      bridge.stopBrowse(id)
      bridge.stopBrowse(id)

      expect(backend.stopBrowse).toHaveBeenCalledTimes(1)
      expect(spy).toHaveBeenCalledWith(`stopBrowse called with unknown browse identifier ${id}`)
    })

    it('should tolerate a result arriving after the browse stopped', () => {
      const errors: (DnssdError | null)[] = []
      const callback = vi.fn((_context: unknown, _services: readonly DnssdService[], _final: boolean, error: DnssdError | null) => {
        errors.push(error)
      })
      const id = bridge.browse('_http', 'tcp', 'any', undefined, callback, null)
      bridge.stopBrowse(id)

      bridge.dispatcher.handleBrowse(['Printer'], '_http._tcp', callback, null)

      expect(callback).toHaveBeenCalledTimes(1)
      expect(errors).toEqual([null])
      expect(bridge.sessions.size).toBe(0)
      expect(bridge.lock.isHeld).toBe(false)
    })

    it('should reclaim the session even when the backend fails', () => {
      vi.spyOn(console, 'error').mockImplementation(() => {})
      backend.stopBrowse.mockImplementation(() => {
        throw new Error('busy')
      })
      const id = bridge.browse('_http', 'tcp', 'any', undefined, vi.fn(), null)

      expect(isDnssdError(catchError(() => bridge.stopBrowse(id)), 'BackendFault')).toBe(true)
      expect(bridge.sessions.has(id)).toBe(false)
    })
  })

  // MARK: resolve
  describe('resolve', () => {
    it('should hand the instance and full type to the backend', () => {
      const callback = vi.fn()
      bridge.resolve(createService({ type: '_matterc', protocol: 'udp' }), 'eth0', callback, 'ctx')

      expect(backend.resolve).toHaveBeenCalledWith('Node', '_matterc._udp', callback, 'ctx', bridge.dispatcher)
    })

    it('should reject a missing service or callback', () => {
      expect(isDnssdError(catchError(() => bridge.resolve(null, undefined, vi.fn(), null)), 'InvalidArgument')).toBe(true)
      expect(isDnssdError(catchError(() => bridge.resolve(createService(), undefined, null, null)), 'InvalidArgument')).toBe(true)
      expect(backend.resolve).not.toHaveBeenCalled()
    })

    it('should deliver a result the backend reports synchronously', () => {
      backend.resolve.mockImplementation((name, fullType, callbackHandle, contextHandle, dispatcher) => {
        dispatcher.handleResolve(name, fullType, 'host.local', '192.168.1.20', 5540, null, callbackHandle, contextHandle)
      })
      const received: unknown[] = []
      const callback = vi.fn((_context: unknown, service: DnssdService | null) => {
        received.push(service?.name, service?.port, bridge.lock.isHeld)
      })

      bridge.resolve(createService(), undefined, callback, null)

      expect(callback).toHaveBeenCalledTimes(1)
      expect(received).toEqual(['Node', 5540, true])
      expect(bridge.lock.isHeld).toBe(false)
    })
  })

  // MARK: publish
  describe('publishService', () => {
    it('should publish in one backend call and report once', () => {
      const callback = vi.fn()
      const value = Uint8Array.from([0x31])
      bridge.publishService(
        createService({
          textEntries: [
            { key: 'a', data: value },
            { key: 'b', data: null },
          ],
          subtypes: ['_L3840'],
        }),
        callback,
        'ctx',
      )

      expect(backend.publish).toHaveBeenCalledTimes(1)
      expect(backend.publish).toHaveBeenCalledWith('Node', 'host', '_matter._tcp', 5540, ['a', 'b'], [value, null], ['_L3840'])
      expect(callback).toHaveBeenCalledTimes(1)
      expect(callback).toHaveBeenCalledWith('ctx', '_matter._tcp', 'Node', null)
    })

    it('should publish without a callback', () => {
      bridge.publishService(createService())
      expect(backend.publish).toHaveBeenCalledTimes(1)
    })

    it('should reject lists longer than the publish limit', () => {
      const limited = new DnssdBridge({ limits: { maxPublishCount: 1 } })
      limited.bind({ resolver: backend, browser: backend, textEntries: backend })

      const tooManyEntries = createService({
        textEntries: [
          { key: 'a', data: null },
          { key: 'b', data: null },
        ],
      })
      const tooLongValue = createService({ textEntries: [{ key: 'a', data: Uint8Array.from([1, 2]) }] })
      const tooManySubtypes = createService({ subtypes: ['_A', '_B'] })

      expect(isDnssdError(catchError(() => limited.publishService(tooManyEntries)), 'InvalidArgument')).toBe(true)
      expect(isDnssdError(catchError(() => limited.publishService(tooLongValue)), 'InvalidArgument')).toBe(true)
      expect(isDnssdError(catchError(() => limited.publishService(tooManySubtypes)), 'InvalidArgument')).toBe(true)
      expect(backend.publish).not.toHaveBeenCalled()
    })

    it('should reject an invalid port without calling the backend', () => {
      expect(isDnssdError(catchError(() => bridge.publishService(createService({ port: 0 }))), 'InvalidArgument')).toBe(true)
      expect(isDnssdError(catchError(() => bridge.publishService(createService({ port: 70000 }))), 'InvalidArgument')).toBe(true)
      expect(backend.publish).not.toHaveBeenCalled()
    })

    it('should not report when the backend fails', () => {
      vi.spyOn(console, 'error').mockImplementation(() => {})
      backend.publish.mockImplementation(() => {
        throw new Error('conflict')
      })
      const callback = vi.fn()

      expect(isDnssdError(catchError(() => bridge.publishService(createService(), callback)), 'BackendFault')).toBe(true)
      expect(callback).not.toHaveBeenCalled()
    })

    it('should withdraw services through the backend', () => {
      bridge.removeServices()
      expect(backend.removeServices).toHaveBeenCalledTimes(1)
    })
  })

  // MARK: delivery
  describe('result delivery', () => {
    it('should wait while the host holds the lock', () => {
      const names: string[] = []
      const callback = vi.fn((_context: unknown, services: readonly DnssdService[]) => {
        names.push(...services.map(service => service.name))
      })
      bridge.browse('_http', 'tcp', 'any', undefined, callback, null)

      bridge.lock.lock()
      bridge.dispatcher.handleBrowse(['Printer'], '_http._tcp', callback, null)
      expect(callback).not.toHaveBeenCalled()

      bridge.lock.unlock()
      expect(callback).toHaveBeenCalledTimes(1)
      expect(names).toEqual(['Printer'])
    })

    it('should still call the backend while a throwing delivery waits for the lock', () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {})
      const failure = new Error('callback failed')
      const callback = vi.fn(() => {
        throw failure
      })

      bridge.lock.lock()
      bridge.dispatcher.handleBrowse(['Printer'], '_http._tcp', callback, null)
      bridge.removeServices()

      expect(backend.removeServices).toHaveBeenCalledTimes(1)
      expect(callback).not.toHaveBeenCalled()

      bridge.lock.unlock()
      expect(callback).toHaveBeenCalledTimes(1)
      expect(spy).toHaveBeenCalledWith('Deferred result callback threw:', failure)
      expect(bridge.lock.isHeld).toBe(false)
    })

    it('should let a callback re-enter the bridge', () => {
      let id = 0
      const callback = vi.fn(() => bridge.stopBrowse(id))
      id = bridge.browse('_http', 'tcp', 'any', undefined, callback, null)

      bridge.dispatcher.handleBrowse(['Printer'], '_http._tcp', callback, null)

      expect(backend.stopBrowse).toHaveBeenCalledWith(callback)
      expect(bridge.sessions.size).toBe(0)
      expect(bridge.lock.isHeld).toBe(false)
    })
  })

  // MARK: misc
  it('should not support record reconfirmation', () => {
    const error = catchError(() => bridge.reconfirmRecord('host', { address: '10.0.0.1', family: 'IPv4' }))
    expect(isDnssdError(error, 'Unsupported')).toBe(true)
  })

  it('should accept lifecycle calls that have nothing to do', () => {
    expect(() => {
      bridge.resolveNoLongerNeeded('Node')
      bridge.finalizeServiceUpdate()
      bridge.shutdown()
    }).not.toThrow()
  })
})
