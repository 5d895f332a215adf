export * from './capabilities'
export * from './DispatchCoordinator'
export * from './limits'
export * from './ResultMarshaller'
export * from './SessionRegistry'
export * from './StackLock'
export * from './TextEntryAllocator'
export * from './types'
