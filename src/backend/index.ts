export * from './MulticastDNSBackend'
export * from './PublishedService'
export * from './ServiceBrowser'
export * from './ServiceResolver'
