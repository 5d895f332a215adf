export * from './debug'
export * from './dns-utils'
export * from './DnssdError'
export * from './MDNSServer'
export * from './ServiceType'
