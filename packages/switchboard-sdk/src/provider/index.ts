export { XMPPProvider, useXMPPContext, type XMPPProviderProps } from './XMPPProvider'
