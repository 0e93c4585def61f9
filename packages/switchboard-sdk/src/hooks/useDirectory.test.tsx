/**
 * @vitest-environment happy-dom
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { renderHook, act } from '@testing-library/react'
import type { ReactNode } from 'react'
import { useDirectory } from './useDirectory'
import { XMPPProvider } from '../provider'
import { XMPPClient } from '../core/XMPPClient'
import { createDirectoryEntry } from '../core/types'
import { NS_DISCO_ITEMS } from '../core/namespaces'
import { MockXmppClient, createMockElement, flushPromises } from '../core/test-utils'

vi.mock('@xmpp/client', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@xmpp/client')>()
  return { ...actual, client: vi.fn() }
})

// Import after mocking
import { client as xmppClientFactory, xml, type Element } from '@xmpp/client'

const DIRECTORY = 'directory@example.com/directory'
const D1 = 'ops@agents.example.com'
const D2 = 'build@agents.example.com'
const S1 = 's1@agents.example.com'
const S2 = 's2@agents.example.com'

describe('useDirectory hook', () => {
  let client: XMPPClient

  function wrapper({ children }: { children: ReactNode }) {
    return <XMPPProvider client={client}>{children}</XMPPProvider>
  }

  const publishDirectory = () => {
    client.emitSDK('directory:dispatchers', {
      dispatchers: [createDirectoryEntry(D1, { displayName: 'Ops' }), createDirectoryEntry(D2, { displayName: 'Build' })],
    })
    client.emitSDK('directory:session-index', { dispatcherId: D1, sessionIds: [S1, S2] })
    client.emitSDK('directory:sessions', { dispatcherId: D1, sessions: [createDirectoryEntry(S1)] })
    client.emitSDK('directory:selection', {
      dispatcherId: D1,
      sessionId: null,
      chatTarget: { kind: 'dispatcher', address: D1 },
    })
  }

  beforeEach(() => {
    client = new XMPPClient({ directoryJid: DIRECTORY, dispatcherHotkeys: ['ops'] })
  })

  afterEach(async () => {
    await client.destroy()
  })

  describe('state', () => {
    it('should start empty', () => {
      const { result } = renderHook(() => useDirectory(), { wrapper })

      expect(result.current.dispatchers).toEqual([])
      expect(result.current.sessions).toEqual([])
      expect(result.current.selectedDispatcherId).toBeNull()
      expect(result.current.chatTarget).toBeNull()
      expect(result.current.unreadByDispatcher.size).toBe(0)
    })

    it('should reflect published directory state', () => {
      const { result } = renderHook(() => useDirectory(), { wrapper })

      act(() => publishDirectory())

      expect(result.current.dispatchers.map((d) => d.displayName)).toEqual(['Ops', 'Build'])
      expect(result.current.sessions.map((s) => s.id)).toEqual([S1])
      expect(result.current.selectedDispatcherId).toBe(D1)
      expect(result.current.chatTarget).toEqual({ kind: 'dispatcher', address: D1 })
    })

    it('should aggregate unread counts per dispatcher', () => {
      const { result } = renderHook(() => useDirectory(), { wrapper })
      act(() => publishDirectory())

      act(() => {
        client.emitSDK('chat:message', {
          message: { id: 'm1', threadId: S1, direction: 'incoming', body: 'done', timestamp: new Date() },
        })
        client.emitSDK('chat:message', {
          message: { id: 'm2', threadId: S2, direction: 'incoming', body: 'queued', timestamp: new Date() },
        })
      })

      expect(result.current.unreadByDispatcher.get(D1)).toBe(2)
      expect(result.current.unreadByDispatcher.has(D2)).toBe(false)
    })

    it('should flag dispatchers with a composing session', () => {
      const { result } = renderHook(() => useDirectory(), { wrapper })
      act(() => publishDirectory())

      act(() => client.emitSDK('chat:typing', { jid: S1, isTyping: true }))
      expect([...result.current.composingDispatchers]).toEqual([D1])

      act(() => client.emitSDK('chat:typing', { jid: S1, isTyping: false }))
      expect(result.current.composingDispatchers.size).toBe(0)
    })

    it('should show the loading placeholder only before the first list', () => {
      const { result } = renderHook(() => useDirectory(), { wrapper })

      act(() => client.emitSDK('directory:loading', { isLoading: true, loadedOnce: false }))
      expect(result.current.showsLoadingPlaceholder).toBe(true)
      expect(result.current.isLoadingSessions).toBe(true)
      expect(result.current.individualsLoadedOnce).toBe(false)

      act(() => client.emitSDK('directory:loading', { isLoading: true, loadedOnce: true }))
      expect(result.current.showsLoadingPlaceholder).toBe(false)
      expect(result.current.individualsLoadedOnce).toBe(true)
    })

    it('should report awaiting only for the selected dispatcher', () => {
      const { result } = renderHook(() => useDirectory(), { wrapper })
      act(() => publishDirectory())

      act(() => client.emitSDK('directory:awaiting-session', { dispatcherId: D2 }))
      expect(result.current.isAwaitingSession).toBe(false)

      act(() => client.emitSDK('directory:awaiting-session', { dispatcherId: D1 }))
      expect(result.current.isAwaitingSession).toBe(true)
    })
  })

  describe('actions while offline', () => {
    it('should do nothing without a directory engine', () => {
      const { result } = renderHook(() => useDirectory(), { wrapper })

      expect(result.current.selectNextSession()).toBe(false)
      expect(result.current.selectPreviousSession()).toBe(false)
      expect(result.current.focusOldestWaitingSession()).toBe(false)
      expect(result.current.selectDispatcherHotkey(0)).toBeNull()
      expect(result.current.resumeSession(createDirectoryEntry(S1, { isClosed: true }))).toBe(false)
    })

    it('should keep action identities across renders', () => {
      const { result, rerender } = renderHook(() => useDirectory(), { wrapper })
      const { sendChat, selectDispatcher } = result.current

      rerender()

      expect(result.current.sendChat).toBe(sendChat)
      expect(result.current.selectDispatcher).toBe(selectDispatcher)
    })
  })

  describe('actions while online', () => {
    let xmpp: MockXmppClient

    beforeEach(async () => {
      xmpp = new MockXmppClient()
      xmpp.iqCaller.request.mockImplementation(async (iq: Element) => {
        const node = iq.getChild('query', NS_DISCO_ITEMS)?.attrs.node
        const jid = node === 'dispatchers' ? D1 : node === `sessions:${D1}` ? S1 : null
        return jid
          ? xml('iq', { type: 'result' }, xml('query', { xmlns: NS_DISCO_ITEMS }, xml('item', { jid })))
          : createMockElement('iq', { type: 'result' })
      })
      vi.mocked(xmppClientFactory).mockReturnValue(xmpp)
    })

    const goOnline = async () => {
      await act(async () => {
        await client.connect({ jid: 'me@example.com', password: 'test-secret', service: 'wss://chat.example.com/ws' })
        xmpp.goOnline('me@example.com/web')
        await flushPromises(100)
      })
    }

    it('should select a session as chat target', async () => {
      const { result } = renderHook(() => useDirectory(), { wrapper })
      await goOnline()
      expect(result.current.sessions.map((s) => s.id)).toEqual([S1])

      act(() => result.current.selectSession(result.current.sessions[0]))

      expect(result.current.selectedSessionId).toBe(S1)
      expect(result.current.chatTarget).toEqual({ kind: 'individual', address: S1 })
    })

    it('should send chat to the chat target', async () => {
      const { result } = renderHook(() => useDirectory(), { wrapper })
      await goOnline()
      act(() => result.current.navigate({ kind: 'individual', id: S1 }))

      act(() => result.current.sendChat('status?'))

      const [stanza] = xmpp.send.mock.calls[0]
      expect(stanza.attrs.to).toBe(S1)
      expect(stanza.getChildText('body')).toBe('status?')
    })

    it('should select a dispatcher by hotkey slot', async () => {
      const { result } = renderHook(() => useDirectory(), { wrapper })
      await goOnline()

      let selected: string | null = null
      act(() => {
        selected = result.current.selectDispatcherHotkey(0)
      })

      expect(selected).toBe(D1)
      expect(result.current.chatTarget).toEqual({ kind: 'dispatcher', address: D1 })
    })
  })
})
