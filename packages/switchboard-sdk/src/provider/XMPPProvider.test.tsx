/**
 * @vitest-environment happy-dom
 */
import { describe, it, expect, vi } from 'vitest'
import { renderHook } from '@testing-library/react'
import type { ReactNode } from 'react'
import { XMPPProvider, useXMPPContext } from './XMPPProvider'
import { XMPPClient } from '../core/XMPPClient'

describe('XMPPProvider', () => {
  it('should share the client it is given', async () => {
    const client = new XMPPClient()
    const wrapper = ({ children }: { children: ReactNode }) => <XMPPProvider client={client}>{children}</XMPPProvider>

    const { result } = renderHook(() => useXMPPContext().client, { wrapper })

    expect(result.current).toBe(client)
    await client.destroy()
  })

  it('should leave a client it was given running on unmount', async () => {
    const client = new XMPPClient()
    const destroy = vi.spyOn(client, 'destroy')
    const wrapper = ({ children }: { children: ReactNode }) => <XMPPProvider client={client}>{children}</XMPPProvider>

    const { unmount } = renderHook(() => useXMPPContext(), { wrapper })
    unmount()

    expect(destroy).not.toHaveBeenCalled()
    await client.destroy()
  })

  it('should create a client from config and destroy it on unmount', () => {
    const destroy = vi.spyOn(XMPPClient.prototype, 'destroy')
    const wrapper = ({ children }: { children: ReactNode }) => (
      <XMPPProvider config={{ directoryJid: 'directory@example.com/directory' }}>{children}</XMPPProvider>
    )

    const { result, rerender, unmount } = renderHook(() => useXMPPContext().client, { wrapper })
    const created = result.current
    rerender()

    expect(result.current).toBe(created)
    expect(created).toBeInstanceOf(XMPPClient)

    unmount()

    expect(destroy).toHaveBeenCalledTimes(1)
    destroy.mockRestore()
  })

  it('should throw outside a provider', () => {
    expect(() => renderHook(() => useXMPPContext())).toThrow('useXMPPContext must be used within XMPPProvider')
  })
})
