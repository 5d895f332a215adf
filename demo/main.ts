import { DnssdBridge, MulticastDNSBackend, type DnssdService } from '../src'
import { delay, DemoSteps } from './DemoSteps'

const backend = new MulticastDNSBackend({ resolveTimeoutMs: 3000 })
const bridge = new DnssdBridge()
bridge.bind({ resolver: backend, browser: backend, textEntries: backend })

const found: DnssdService[] = []
let browseId = 0

function publish(name: string, port: number, txt: Record<string, string>) {
  bridge.publishService({
    name,
    hostName: 'demo-host',
    type: '_http',
    protocol: 'tcp',
    port,
    textEntries: Object.entries(txt).map(([key, value]) => ({ key, data: Buffer.from(value) })),
    subtypes: [],
  })
}

void new DemoSteps()
  .step('Initializing bridge', () => {
    bridge.init(
      () => console.log('✔ Bridge ready'),
      (_context, error) => console.log(`✘ Init failed: ${error?.message}`),
    )
  })
  .step('Publishing service: A', () => {
    publish('Service A', 3000, { path: '/a' })
  })
  .step(2000, 'Browsing _http._tcp', () => {
    browseId = bridge.browse('_http', 'tcp', 'any', undefined, (_context, services, _final, error) => {
      if (error) {
        console.log(`✘ Browse failed: ${error.message}`)
        return
      }
      for (const service of services) {
        console.log(`↑ ${service.name}`)
        found.push({ ...service })
      }
    }, null)
  })
  .step('Publishing services: B and C', () => {
    publish('Service B', 3001, { path: '/b' })
    publish('Service C', 3002, { path: '/c', version: '1' })
  })
  .step(4000, 'Resolving everything found', async () => {
    for (const service of found) {
      bridge.resolve(service, undefined, (_context, resolved, addresses, error) => {
        if (error || !resolved) {
          console.log(`✘ ${service.name}: ${error?.message}`)
          return
        }
        const txt = resolved.textEntries.map(e => `${e.key}=${e.data ? Buffer.from(e.data).toString() : ''}`)
        console.log(`✔ ${resolved.name} → ${addresses[0]?.address}:${resolved.port} [${txt.join(', ')}]`)
      }, null)
    }
    await delay(3500)
  })
  .step('Stopping browse', () => {
    bridge.stopBrowse(browseId)
    console.log('- Discovery stopped')
  })
  .step('Removing all services', () => {
    bridge.removeServices()
  })
  .runForever('Done. Press Ctrl+C to exit.')

process.on('SIGINT', () => {
  console.log('\n[Exit] Cleaning up...')
  void backend.destroy().then(() => {
    console.log('🧹 Clean exit')
    process.exit(0)
  })
})
