import { exit } from 'process'
import util from 'util'
import chalk from 'chalk'
import { program } from 'commander'

import { DnssdBridge, type DnssdService, MulticastDNSBackend } from '../src'

interface CLIOptions {
  resolve: boolean
  verbose: boolean
  protocol: string
  type: string
  subtype?: string
  timeout: string
}

function indent(value: unknown, prefix = '  ') {
  return util
    .inspect(value, { colors: true, depth: null, compact: false })
    .split('\n')
    .map(line => prefix + line)
    .join('\n')
}

function formatTXT(service: DnssdService) {
  return Object.fromEntries(
    service.textEntries.map(({ key, data }) => [key, data === null ? true : Buffer.from(data).toString()]),
  )
}

// MARK: main
async function main() {
  program
    .name(chalk.blue('dnssd-browser'))
    .description('🔍 Browse and resolve DNS-SD services')
    .option('-r, --resolve', 'Resolve every service found')
    .option('-v, --verbose', 'Print verbose data')
    .option('-p, --protocol <protocol>', 'Service protocol (tcp or udp)', 'tcp')
    .option('-t, --type <type>', 'Service type', '_http')
    .option('-s, --subtype <subtype>', 'Only browse instances of this subtype')
    .option('--timeout <ms>', 'How long a resolve waits for answers', '5000')
    .parse(process.argv)

  const opts = program.opts<CLIOptions>()

  if (opts.protocol !== 'tcp' && opts.protocol !== 'udp') {
    console.error(chalk.red('❌ Protocol must be either "tcp" or "udp"'))
    exit(1)
  }
  const protocol = opts.protocol === 'udp' ? 'udp' : 'tcp'

  // MARK: setup bridge
  const backend = new MulticastDNSBackend({ resolveTimeoutMs: parseInt(opts.timeout, 10) || 5000 })
  const bridge = new DnssdBridge()
  bridge.bind({ resolver: backend, browser: backend, textEntries: backend })

  process.on('SIGINT', () => {
    console.log(chalk.yellow('\n⚙️ [Exit] Cleaning up resources...'))
    void (async () => {
      await backend.destroy()
      console.log(chalk.green('✅ Clean exit. Goodbye!'))
      exit(0)
    })()
  })

  // MARK: start browse
  const browseType = opts.subtype ? `${opts.type}._sub.${opts.subtype}` : opts.type
  console.log(chalk.cyan(`🔎 Browsing ${chalk.bold(browseType)} over ${protocol}\n`))

  bridge.browse(browseType, protocol, 'any', undefined, (_context, services, _final, error) => {
    if (error) {
      console.error(chalk.red(`❌ Browse failed: ${error.message}`))
      return
    }

    for (const found of services) {
      console.log(chalk.green(`⬆️  Service UP: ${chalk.bold(found.name)}`))
      if (!opts.resolve) continue

      // Records are only valid during the callback, so resolve from a copy.
      const service: DnssdService = { ...found, textEntries: [], subtypes: [] }
      bridge.resolve(service, undefined, (_ctx, resolved, addresses, resolveError) => {
        if (resolveError || !resolved) {
          console.log(chalk.yellow(`⚠️  ${service.name}: ${resolveError?.message ?? 'not resolved'}`))
          return
        }

        const address = addresses[0]?.address ?? '?'
        console.log(chalk.magenta(`🔄 Resolved ${chalk.bold(resolved.name)} → ${address}:${resolved.port}`))
        if (opts.verbose) {
          const { name, hostName, type, protocol, port, interfaceId } = resolved
          console.log(indent({ name, hostName, type, protocol, port, interfaceId, addresses }))
          console.log(chalk.gray('  📝 TXT Records:'))
          console.log(indent(formatTXT(resolved), '    '))
          console.log()
        }
      }, null)
    }
  }, null)
}

main().catch((err: unknown) => {
  console.error(chalk.red('❌ Unhandled error:'), err instanceof Error ? err.message : err)
  exit(1)
})
