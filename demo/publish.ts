import os from 'os'
import { exit } from 'process'
import util from 'util'
import chalk from 'chalk'
import { program } from 'commander'

import { DnssdBridge, type DnssdService, MulticastDNSBackend } from '../src'

type CLIOptions = {
  verbose: boolean
  protocol: string
  type: string
  subtypes: string
  name: string
  host: string
  port: string
  txt?: Record<string, string>
}

function collectKeyValue(value: string, previous: Record<string, string> = {}) {
  const [key, val] = value.split('=')
  if (key === undefined || key === '') {
    throw new Error(chalk.red(`❌ Invalid data format: "${value}". Use key=value or key`))
  }
  previous[key] = val ?? ''
  return previous
}

// MARK: main
async function main() {
  program
    .name(chalk.blueBright('dnssd-publisher'))
    .description('📡 A DNS-SD service publisher')
    .version('0.1.0')
    .option('-v, --verbose', 'Print verbose data')
    .option('-p, --protocol <type>', 'Service protocol (tcp or udp)', 'tcp')
    .option('-t, --type <type>', 'Service type', '_http')
    .option('-s, --subtypes <items>', 'Comma-separated list of subtypes', '')
    .option('-n, --name <name>', 'Service name', 'My Service')
    .option('--host <host>', 'Host name', os.hostname())
    .option('--port <port>', 'Service port', '8080')
    .option('--txt <key=value>', 'Pass TXT key=value pairs (can be used multiple times)', collectKeyValue)
    .parse(process.argv)

  // MARK: setup bridge
  const backend = new MulticastDNSBackend()
  const bridge = new DnssdBridge()
  bridge.bind({ resolver: backend, browser: backend, textEntries: backend })

  process.on('SIGINT', () => {
    void (async () => {
      console.log(chalk.yellow('\n⚙️ [Exit] Cleaning up resources...'))
      bridge.removeServices()
      await new Promise(resolve => setTimeout(resolve, 100))
      await backend.destroy()
      console.log(chalk.green('✅ Clean exit. Goodbye!'))
      exit(0)
    })()
  })

  // MARK: parse options
  const opts = program.opts<CLIOptions>()

  if (opts.protocol !== 'tcp' && opts.protocol !== 'udp') {
    console.error(chalk.red('❌ Protocol must be either "tcp" or "udp"'))
    exit(1)
  }

  const port = parseInt(opts.port, 10)
  if (isNaN(port) || port < 1 || port > 65535) {
    console.error(chalk.red('❌ Port must be a number between 1 and 65535'))
    exit(1)
  }

  const service: DnssdService = {
    name: opts.name,
    hostName: opts.host,
    type: opts.type,
    protocol: opts.protocol === 'udp' ? 'udp' : 'tcp',
    port,
    textEntries: Object.entries(opts.txt ?? {}).map(([key, value]) => ({
      key,
      data: value === '' ? null : Buffer.from(value),
    })),
    subtypes: opts.subtypes.split(',').filter(s => s),
  }

  console.log(chalk.magenta('📥 Service:\n'))
  console.log(
    util
      .inspect(service, { colors: true, depth: null, compact: false })
      .split('\n')
      .map(line => '  ' + line)
      .join('\n'),
  )
  console.log()

  // MARK: publish service
  console.log(chalk.cyan(`🚀 Publishing service "${chalk.bold(opts.name)}" ...\n`))

  bridge.publishService(service, (_context, type, instanceName) => {
    console.log(chalk.green(`🎉 Published ${chalk.bold(instanceName)} as ${type}`))
    if (opts.verbose) {
      console.log(chalk.gray('\n📝 Records:\n'))
      for (const published of backend.publishedServices) {
        console.log(util.inspect(published.getRecords(), { colors: true, depth: null, compact: false }))
      }
    }
  })
}

main().catch((err: unknown) => {
  console.error(chalk.red('❌ Unhandled error:'), err instanceof Error ? err.message : err)
  exit(1)
})
