import { createContext, useContext, useEffect, useMemo, useState, type ReactNode } from 'react'
import { XMPPClient, type XMPPClientConfig } from '../core/XMPPClient'
import { describeError } from '../utils/xmppError'
import { logError } from '../core/logger'

/**
 * Value provided by the XMPP React context.
 *
 * @category Provider
 * @internal
 */
interface XMPPContextValue {
  /** The XMPPClient instance shared across the component tree */
  client: XMPPClient
}

const XMPPContext = createContext<XMPPContextValue | null>(null)

/**
 * Props for the {@link XMPPProvider} component.
 *
 * @category Provider
 */
export interface XMPPProviderProps {
  children: ReactNode
  /**
   * Client to share. When omitted the provider creates one from `config`
   * and destroys it on unmount; a client passed in stays owned by the caller.
   */
  client?: XMPPClient
  config?: XMPPClientConfig
}

/**
 * Makes one XMPPClient available to the hooks below it.
 *
 * @example
 * ```tsx
 * const client = createClientFromConfig(loadConfig())
 *
 * <XMPPProvider client={client}>
 *   <DirectoryColumns />
 * </XMPPProvider>
 * ```
 *
 * @category Provider
 */
export function XMPPProvider({ children, client: providedClient, config }: XMPPProviderProps) {
  // Created once; later config changes do not rebuild the client
  const [ownedClient] = useState(() => (providedClient ? null : new XMPPClient(config)))
  const client = providedClient ?? ownedClient

  useEffect(() => {
    if (!ownedClient) return
    return () => {
      ownedClient.destroy().catch((err: unknown) => {
        logError(`Client teardown failed: ${describeError(err)}`)
      })
    }
  }, [ownedClient])

  const value = useMemo(() => (client ? { client } : null), [client])

  return <XMPPContext.Provider value={value}>{children}</XMPPContext.Provider>
}

/**
 * Hook to access the XMPP context.
 *
 * @throws Error if used outside of XMPPProvider
 *
 * @category Provider
 */
export function useXMPPContext(): XMPPContextValue {
  const context = useContext(XMPPContext)
  if (!context) {
    throw new Error('useXMPPContext must be used within XMPPProvider')
  }
  return context
}
