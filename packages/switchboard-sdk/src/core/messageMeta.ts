/**
 * Agent message metadata.
 *
 * Agents annotate chat messages with a `<meta/>` element: tool calls and
 * their output, end-of-run statistics, questions waiting for an answer and
 * structured attachments. Questions and attachments carry a JSON payload:
 *
 * ```xml
 * <meta xmlns="urn:switchboard:message-meta:0" type="question" request_id="r1">
 *   <payload format="json">{"request_id":"r1","questions":[…]}</payload>
 * </meta>
 * ```
 *
 * @module Core/MessageMeta
 */
import { xml, type Element } from '@xmpp/client'
import { z } from 'zod'
import { NS_SWITCHBOARD_META } from './namespaces'
import { logWarn } from './logger'
import type {
  MessageAttachment,
  MessageMeta,
  MessageMetaType,
  QuestionReply,
  QuestionRequest,
  RunStats,
} from './types'

const META_TYPES: readonly MessageMetaType[] = [
  'tool',
  'tool-result',
  'run-stats',
  'question',
  'question-reply',
  'attachment',
]

const RUN_STATS_ATTRS: ReadonlyArray<readonly [keyof RunStats, string]> = [
  ['engine', 'engine'],
  ['model', 'model'],
  ['tokensIn', 'tokens_in'],
  ['tokensOut', 'tokens_out'],
  ['tokensReasoning', 'tokens_reasoning'],
  ['tokensCacheRead', 'tokens_cache_read'],
  ['tokensCacheWrite', 'tokens_cache_write'],
  ['tokensTotal', 'tokens_total'],
  ['contextWindow', 'context_window'],
  ['turns', 'turns'],
  ['toolCount', 'tool_count'],
  ['costUsd', 'cost_usd'],
  ['durationS', 'duration_s'],
  ['summary', 'summary'],
]

// Agents may send null for absent fields
const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined)

const questionRequestSchema = z
  .object({
    version: z.number().int().nullish(),
    engine: optionalString,
    request_id: z.string().min(1),
    questions: z.array(
      z.object({
        header: optionalString,
        question: optionalString,
        options: z
          .array(z.object({ label: z.string(), description: optionalString }))
          .nullish()
          .transform((value) => value ?? undefined),
        multiple: z
          .boolean()
          .nullish()
          .transform((value) => value ?? undefined),
      })
    ),
  })
  .transform(
    (payload): QuestionRequest => ({
      ...(payload.version == null ? {} : { version: payload.version }),
      ...(payload.engine ? { engine: payload.engine } : {}),
      requestId: payload.request_id,
      questions: payload.questions,
    })
  )

const attachmentSchema = z
  .object({
    id: z.string().min(1),
    kind: z.string().min(1),
    mime: optionalString,
    public_url: optionalString,
    filename: optionalString,
    size_bytes: z.number().int().nonnegative().nullish(),
    sha256: optionalString,
  })
  .transform(
    (attachment): MessageAttachment => ({
      id: attachment.id,
      kind: attachment.kind,
      ...(attachment.mime ? { mime: attachment.mime } : {}),
      ...(attachment.public_url ? { publicUrl: attachment.public_url } : {}),
      ...(attachment.filename ? { filename: attachment.filename } : {}),
      ...(attachment.size_bytes == null ? {} : { sizeBytes: attachment.size_bytes }),
      ...(attachment.sha256 ? { sha256: attachment.sha256 } : {}),
    })
  )

const attachmentsPayloadSchema = z.object({
  version: z.number().int().nullish(),
  attachments: z.array(attachmentSchema),
})

function toMetaType(raw: string): MessageMetaType {
  return META_TYPES.find((type) => type === raw) ?? 'unknown'
}

function parseJsonPayload<S extends z.ZodTypeAny>(meta: Element, schema: S, what: string): z.output<S> | undefined {
  const payload = meta.getChild('payload')
  if (!payload || payload.attrs.format?.toLowerCase() !== 'json') return undefined

  let json: unknown
  try {
    json = JSON.parse(payload.getText().trim())
  } catch (err) {
    logWarn(`Unreadable ${what} payload: ${err instanceof Error ? err.message : String(err)}`)
    return undefined
  }
  const result = schema.safeParse(json)
  if (!result.success) {
    logWarn(`Invalid ${what} payload: ${result.error.issues.map((issue) => issue.message).join(', ')}`)
    return undefined
  }
  return result.data
}

function parseRunStats(meta: Element): RunStats {
  const stats: RunStats = {}
  for (const [key, attr] of RUN_STATS_ATTRS) {
    const value = meta.attrs[attr]
    if (value !== undefined) stats[key] = value
  }
  return stats
}

/**
 * Read the metadata of a chat message, live or archived.
 *
 * @returns null when the message has no `<meta/>` in our namespace, or when
 * it has no `type`. A payload that fails to decode is logged and left out;
 * the rest of the metadata is still returned.
 */
export function parseMessageMeta(message: Element): MessageMeta | null {
  const meta = message.getChild('meta', NS_SWITCHBOARD_META)
  const rawType = meta?.attrs.type
  if (!meta || !rawType) return null

  const type = toMetaType(rawType)
  const { tool, request_id: requestId } = meta.attrs
  const parsed: MessageMeta = {
    type,
    ...(tool ? { tool } : {}),
    ...(requestId ? { requestId } : {}),
  }

  if (type === 'run-stats') parsed.runStats = parseRunStats(meta)

  if (type === 'question') {
    const question = parseJsonPayload(meta, questionRequestSchema, 'question')
    if (question) parsed.question = question
  }

  if (type === 'attachment') {
    const payload = parseJsonPayload(meta, attachmentsPayloadSchema, 'attachment')
    if (payload) parsed.attachments = payload.attachments
  }

  return parsed
}

export interface MetaElementOptions {
  tool?: string
  attrs?: Record<string, string>
  /** Serialized as the JSON `<payload/>` */
  payload?: unknown
}

/** Build a `<meta/>` element to attach to an outgoing message. */
export function buildMetaElement(type: MessageMetaType, options: MetaElementOptions = {}): Element {
  const { tool, attrs = {}, payload } = options
  return xml(
    'meta',
    { ...attrs, xmlns: NS_SWITCHBOARD_META, type, ...(tool ? { tool } : {}) },
    ...(payload === undefined ? [] : [xml('payload', { format: 'json' }, JSON.stringify(payload))])
  )
}

/** `<meta type="question-reply"/>` for an answer to an agent's questions. */
export function buildQuestionReplyMeta(reply: QuestionReply): Element {
  return buildMetaElement('question-reply', {
    tool: 'question',
    attrs: { version: '1', request_id: reply.requestId },
    payload: {
      version: 1,
      request_id: reply.requestId,
      ...(reply.answers ? { answers: reply.answers } : {}),
      ...(reply.text ? { text: reply.text } : {}),
    },
  })
}

/** `<meta type="attachment"/>` describing uploaded files. */
export function buildAttachmentMeta(attachments: MessageAttachment[]): Element {
  return buildMetaElement('attachment', {
    attrs: { version: '1' },
    payload: {
      version: 1,
      attachments: attachments.map((attachment) => ({
        id: attachment.id,
        kind: attachment.kind,
        ...(attachment.mime ? { mime: attachment.mime } : {}),
        ...(attachment.publicUrl ? { public_url: attachment.publicUrl } : {}),
        ...(attachment.filename ? { filename: attachment.filename } : {}),
        ...(attachment.sizeBytes === undefined ? {} : { size_bytes: attachment.sizeBytes }),
        ...(attachment.sha256 ? { sha256: attachment.sha256 } : {}),
      })),
    },
  })
}
