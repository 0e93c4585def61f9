export * from './directory'
export * from './chat'
export * from './meta'
export * from './upload'
export * from './sdk-events'
