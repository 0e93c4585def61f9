import { xml, type Element } from '@xmpp/client'
import { BaseModule, type ModuleDependencies } from './BaseModule'
import { getBareJid } from '../jid'
import { generateUUID } from '../../utils/uuid'
import { NS_CHATSTATES, NS_DELAY, NS_OOB, NS_SWITCHBOARD_SUBAGENT } from '../namespaces'
import type { ChatMessage, MessageAttachment, MessageMeta, OutgoingAttachment, QuestionReply, SubagentWork, UploadSlot } from '../types'
import { buildAttachmentMeta, buildQuestionReplyMeta, parseMessageMeta } from '../messageMeta'
import { logInfo } from '../logger'

/** Source of upload slots, normally the Discovery module. */
export interface UploadSlotProvider {
  requestUploadSlot(filename: string, size: number, contentType: string): Promise<UploadSlot>
}

const STOPPED_STATES = ['active', 'paused', 'inactive', 'gone']

interface SendOptions {
  extra?: Element[]
  attachmentUrl?: string
  meta?: MessageMeta
}

/**
 * One-to-one chat module.
 *
 * Incoming `chat`/`normal` messages become `chat:message` events and
 * XEP-0085 chat states become `chat:typing` events. Agent metadata travels
 * on the message as `meta`. Every send emits the outgoing message as
 * `chat:message` too, so the ledger sees both sides.
 *
 * @example
 * ```typescript
 * await client.chat.sendMessage('dispatcher@agents.example.com', 'status?')
 * ```
 *
 * @category Modules
 */
export class Chat extends BaseModule {
  constructor(
    deps: ModuleDependencies,
    private readonly uploads: UploadSlotProvider
  ) {
    super(deps)
  }

  handle(stanza: Element): boolean {
    if (!stanza.is('message')) return false
    const type = stanza.attrs.type ?? 'normal'
    if (type !== 'chat' && type !== 'normal') return false

    const from = stanza.attrs.from
    if (!from) return false
    const threadId = getBareJid(from)

    const body = stanza.getChildText('body')
    const chatState = this.parseChatState(stanza)

    if (chatState === 'composing') {
      this.deps.emitSDK('chat:typing', { jid: threadId, isTyping: true })
    } else if (chatState !== null || body) {
      this.deps.emitSDK('chat:typing', { jid: threadId, isTyping: false })
    }

    if (!body) return chatState !== null

    const attachmentUrl = stanza.getChild('x', NS_OOB)?.getChildText('url') || undefined
    const meta = parseMessageMeta(stanza)
    const message: ChatMessage = {
      id: stanza.attrs.id || generateUUID(),
      threadId,
      direction: 'incoming',
      body,
      timestamp: this.parseDelay(stanza) ?? new Date(),
      ...(attachmentUrl ? { attachmentUrl } : {}),
      ...(meta ? { meta } : {}),
    }
    this.deps.emitSDK('chat:message', { message })
    return true
  }

  /**
   * Send a plain chat message.
   * @returns the stanza id
   */
  async sendMessage(to: string, body: string): Promise<string> {
    return this.send(to, body)
  }

  /**
   * Answer questions an agent asked. The display text is the body; the
   * answers travel in a `question-reply` meta payload.
   */
  async sendQuestionReply(to: string, reply: QuestionReply): Promise<string> {
    return this.send(to, reply.displayText, {
      extra: [buildQuestionReplyMeta(reply)],
      meta: { type: 'question-reply', tool: 'question', requestId: reply.requestId },
    })
  }

  /**
   * Send work to a subagent. The body travels as-is; the envelope names the
   * task and the session the subagent reports back to.
   */
  async sendSubagentWork(to: string, work: SubagentWork): Promise<string> {
    return this.send(to, work.body, {
      extra: [xml('work', { xmlns: NS_SWITCHBOARD_SUBAGENT, task_id: work.taskId, parent_jid: work.parentJid })],
    })
  }

  /**
   * Upload a file (XEP-0363) and share its URL. The body is the URL, after
   * the caption when there is one; an XEP-0066 element carries the URL too,
   * and an `attachment` meta payload describes the file.
   */
  async sendAttachment(to: string, attachment: OutgoingAttachment): Promise<string> {
    const { data, filename, mime } = attachment
    const slot = await this.uploads.requestUploadSlot(filename, data.byteLength, mime)

    const response = await fetch(slot.putUrl, {
      method: 'PUT',
      headers: { 'Content-Type': mime, ...slot.headers },
      body: data,
    })
    if (!response.ok) {
      throw new Error(`Upload failed: HTTP ${response.status}`)
    }
    logInfo(`Uploaded ${filename} (${data.byteLength} bytes)`)

    const caption = attachment.caption?.trim()
    const body = caption ? `${caption}\n${slot.getUrl}` : slot.getUrl
    const oob = xml(
      'x',
      { xmlns: NS_OOB },
      xml('url', {}, slot.getUrl),
      ...(caption ? [xml('desc', {}, caption)] : [])
    )
    const described: MessageAttachment = {
      id: generateUUID(),
      kind: mime.startsWith('image/') ? 'image' : 'file',
      mime,
      publicUrl: slot.getUrl,
      filename,
      sizeBytes: data.byteLength,
    }
    return this.send(to, body, {
      extra: [oob, buildAttachmentMeta([described])],
      attachmentUrl: slot.getUrl,
      meta: { type: 'attachment', attachments: [described] },
    })
  }

  /** Send an XEP-0085 chat state. */
  async sendChatState(to: string, state: 'composing' | 'paused' | 'active'): Promise<void> {
    await this.deps.sendStanza(xml('message', { to: getBareJid(to), type: 'chat' }, xml(state, { xmlns: NS_CHATSTATES })))
  }

  private async send(to: string, body: string, { extra = [], attachmentUrl, meta }: SendOptions = {}): Promise<string> {
    const id = generateUUID()
    const recipient = getBareJid(to)
    await this.deps.sendStanza(
      xml('message', { to: recipient, type: 'chat', id }, xml('body', {}, body), xml('active', { xmlns: NS_CHATSTATES }), ...extra)
    )

    this.deps.emitSDK('chat:message', {
      message: {
        id,
        threadId: recipient,
        direction: 'outgoing',
        body,
        timestamp: new Date(),
        ...(attachmentUrl ? { attachmentUrl } : {}),
        ...(meta ? { meta } : {}),
      },
    })
    return id
  }

  private parseChatState(stanza: Element): string | null {
    if (stanza.getChild('composing', NS_CHATSTATES)) return 'composing'
    return STOPPED_STATES.find((state) => stanza.getChild(state, NS_CHATSTATES)) ?? null
  }

  private parseDelay(stanza: Element): Date | null {
    const stamp = stanza.getChild('delay', NS_DELAY)?.attrs.stamp
    if (!stamp) return null
    const date = new Date(stamp)
    return Number.isNaN(date.getTime()) ? null : date
  }
}
