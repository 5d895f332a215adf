import type { SrvAnswer, StringAnswer } from 'dns-packet'
import type { ResponsePacket } from 'multicast-dns'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import {
  DnssdBridge,
  type DnssdBrowseCallback,
  type DnssdError,
  type DnssdService,
  type IPAddress,
  isDnssdError,
  MulticastDNSBackend,
} from '../src'
import { PublishedService } from '../src/backend'
import { MDNSServer } from '../src/utils'

interface FakePeer {
  emit(event: string, ...args: unknown[]): boolean
}

// Every socket created in a test joins one in-process multicast group, loopback included.
const bus = vi.hoisted(() => ({ peers: new Set<FakePeer>() }))

vi.mock('multicast-dns', async () => {
  const { EventEmitter } = await import('events')
  const rinfo = { address: '127.0.0.1', family: 'IPv4', port: 5353, size: 0 }

  class FakeMulticastDNS extends EventEmitter {
    constructor() {
      super()
      bus.peers.add(this)
    }

    query(name: string, type: string) {
      const packet = { type: 'query', questions: [{ name, type }], answers: [], additionals: [], authorities: [] }
      setImmediate(() => {
        for (const peer of bus.peers) peer.emit('query', packet, rinfo)
      })
    }

    respond(records: unknown[] | { answers?: unknown[]; additionals?: unknown[] }, cb?: (error: Error | null) => void) {
      const packet = Array.isArray(records)
        ? { type: 'response', questions: [], answers: records, additionals: [], authorities: [] }
        : { type: 'response', questions: [], answers: records.answers ?? [], additionals: records.additionals ?? [], authorities: [] }
      setImmediate(() => {
        for (const peer of bus.peers) peer.emit('response', packet, rinfo)
        cb?.(null)
      })
    }

    destroy(cb?: () => void) {
      bus.peers.delete(this)
      setImmediate(() => cb?.())
    }
  }

  return { default: () => new FakeMulticastDNS() }
})

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

async function settle(ms = 20) {
  await new Promise(resolve => setTimeout(resolve, ms))
}

describe('multicast backend', () => {
  let publisher: MulticastDNSBackend
  let publisherBridge: DnssdBridge
  let browser: MulticastDNSBackend
  let bridge: DnssdBridge

  let found: string[]
  let onBrowse: DnssdBrowseCallback

  beforeEach(() => {
    publisher = new MulticastDNSBackend({ addresses: ['192.168.1.20'], resolveTimeoutMs: 100 })
    publisherBridge = new DnssdBridge()
    publisherBridge.bind({ resolver: publisher, browser: publisher, textEntries: publisher })

    browser = new MulticastDNSBackend({ resolveTimeoutMs: 100 })
    bridge = new DnssdBridge()
    bridge.bind({ resolver: browser, browser, textEntries: browser })

    found = []
    onBrowse = (_context, services, _finalBrowse, error) => {
      if (error) throw error
      found.push(...services.map(service => `${service.name}.${service.type}.${service.protocol}`))
    }
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await publisher.destroy()
    await browser.destroy()
    bus.peers.clear()
  })

  // MARK: browse
  describe('browse', () => {
    it('should find services of the browsed type only', async () => {
      publisherBridge.publishService(createService())
      publisherBridge.publishService(createService({ name: 'Printer', type: '_ipp' }))
      publisherBridge.publishService(createService({ name: 'Lamp', type: '_matter', protocol: 'udp' }))

      bridge.browse('_matter', 'tcp', 'any', undefined, onBrowse, null)

      await vi.waitFor(() => expect(found).toEqual(['Node._matter.tcp']))
      await settle()
      expect(found).toEqual(['Node._matter.tcp'])
    })

    it('should find services published after the browse started', async () => {
      bridge.browse('_matter', 'tcp', 'any', undefined, onBrowse, null)
      await settle()

      publisherBridge.publishService(createService())

      await vi.waitFor(() => expect(found).toEqual(['Node._matter.tcp']))
    })

    it('should narrow a browse to a subtype', async () => {
      publisherBridge.publishService(createService({ name: 'Commissionable', type: '_matterc', protocol: 'udp', subtypes: ['_L3840'] }))
      publisherBridge.publishService(createService({ name: 'Other', type: '_matterc', protocol: 'udp', subtypes: ['_L1'] }))

      bridge.browse('_matterc._sub._L3840', 'udp', 'any', undefined, onBrowse, null)

      await vi.waitFor(() => expect(found).toEqual(['Commissionable._matterc.udp']))
      await settle()
      expect(found).toEqual(['Commissionable._matterc.udp'])
    })

    it('should report an instance again after it said goodbye', async () => {
      bridge.browse('_matter', 'tcp', 'any', undefined, onBrowse, null)
      publisherBridge.publishService(createService())
      await vi.waitFor(() => expect(found).toEqual(['Node._matter.tcp']))

      publisherBridge.removeServices()
      publisherBridge.publishService(createService())

      await vi.waitFor(() => expect(found).toEqual(['Node._matter.tcp', 'Node._matter.tcp']))
    })

    it('should stop reporting once stopped', async () => {
      const id = bridge.browse('_matter', 'tcp', 'any', undefined, onBrowse, null)
      await settle()
      bridge.stopBrowse(id)

      publisherBridge.publishService(createService())
      await settle(50)

      expect(found).toEqual([])
    })
  })

  // MARK: resolve
  describe('resolve', () => {
    it('should resolve host, address, port and TXT of a published service', async () => {
      publisherBridge.publishService(
        createService({
          textEntries: [
            { key: 'VP', data: Buffer.from('65521+32769') },
            { key: 'flag', data: null },
          ],
        }),
      )
      await settle()

      const results: { service: DnssdService; txt: [string, string | null][]; addresses: IPAddress[] }[] = []
      bridge.resolve(createService({ hostName: '' }), undefined, (_context, service, addresses, error) => {
        if (error || !service) throw error ?? new Error('no service')
        results.push({
          service: { ...service },
          txt: service.textEntries.map(({ key, data }): [string, string | null] => [
            key,
            data && Buffer.from(data).toString(),
          ]),
          addresses: [...addresses],
        })
      }, null)

      await vi.waitFor(() => expect(results).toHaveLength(1))
      const [result] = results
      expect(result?.service).toMatchObject({
        name: 'Node',
        hostName: 'host',
        type: '_matter',
        protocol: 'tcp',
        port: 5540,
      })
      expect(result?.txt).toEqual([
        ['VP', '65521+32769'],
        ['flag', null],
      ])
      expect(result?.addresses).toEqual([{ address: '192.168.1.20', family: 'IPv4' }])
    })

    it('should report UnknownResourceId when nobody answers in time', async () => {
      const errors: (DnssdError | null)[] = []
      bridge.resolve(createService({ name: 'Ghost' }), undefined, (_context, _service, _addresses, error) => {
        errors.push(error)
      }, null)

      await vi.waitFor(() => expect(errors).toHaveLength(1))
      expect(isDnssdError(errors[0], 'UnknownResourceId')).toBe(true)
    })
  })

  // MARK: publish
  describe('publish', () => {
    it('should replace an instance published again', () => {
      publisherBridge.publishService(createService())
      publisherBridge.publishService(createService({ port: 5541 }))

      expect(publisher.publishedServices).toHaveLength(1)
      expect(publisher.publishedServices[0]?.port).toBe(5541)
    })

    it('should send goodbyes when services are removed', async () => {
      const goodbyes: string[] = []
      browser.server.mdns.on('response', (packet: ResponsePacket) => {
        for (const answer of packet.answers) {
          if (answer.type === 'PTR' && answer.ttl === 0) goodbyes.push(answer.name)
        }
      })

      publisherBridge.publishService(createService({ subtypes: ['_L1'] }))
      publisherBridge.removeServices()

      await vi.waitFor(() =>
        expect(goodbyes).toEqual(['_matter._tcp.local', '_services._dns-sd._udp.local', '_L1._sub._matter._tcp.local']),
      )
      expect(publisher.publishedServices).toHaveLength(0)
      expect(publisher.server.recordCount).toBe(0)
    })

    it('should reject an invalid port in the record builder', () => {
      expect(() => new PublishedService({ name: 'Node', fullType: '_matter._tcp', port: 0, addresses: [] })).toThrow(
        'Invalid port number 0',
      )
    })
  })
})

// MARK: MDNSServer
describe('mdns server', () => {
  afterEach(() => {
    bus.peers.clear()
  })

  const ptr: StringAnswer = { type: 'PTR', name: '_http._tcp.local', ttl: 120, data: 'A._http._tcp.local' }
  const srv: SrvAnswer = { type: 'SRV', name: 'A._http._tcp.local', ttl: 120, data: { port: 80, target: 'host.local' } }

  it('should ignore records already registered', async () => {
    const server = new MDNSServer()
    server.register([ptr, srv])
    server.register([{ ...ptr }, { ...srv, name: 'a._HTTP._tcp.local' }])

    expect(server.recordCount).toBe(2)
    await server.destroy()
  })

  it('should match PTR records by target and others by name on unregister', async () => {
    const server = new MDNSServer()
    const other: StringAnswer = { ...ptr, data: 'B._http._tcp.local' }
    server.register([ptr, other, srv])

    server.unregister([ptr, { ...srv, data: { port: 81, target: 'elsewhere.local' } }])

    expect(server.recordCount).toBe(1)
    await server.destroy()
  })

  it('should answer a PTR question with SRV and address additionals', async () => {
    const server = new MDNSServer()
    const address: StringAnswer = { type: 'A', name: 'host.local', ttl: 120, data: '10.0.0.2' }
    server.register([ptr, srv, address])

    const responded = new Promise<{ answers: number; additionals: number }>(resolve => {
      server.once('responded', packet => {
        resolve({ answers: packet.answers?.length ?? 0, additionals: packet.additionals?.length ?? 0 })
      })
    })
    server.mdns.query('_http._tcp.local', 'PTR')

    expect(await responded).toEqual({ answers: 1, additionals: 2 })
    await server.destroy()
  })
})
