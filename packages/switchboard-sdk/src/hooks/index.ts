export { XMPPProvider, useXMPPContext, type XMPPProviderProps } from '../provider'
export { useDirectory, type UseDirectoryReturn } from './useDirectory'
export { useThread } from './useThread'
