/**
 * Message metadata attached by agents to their chat messages.
 *
 * @packageDocumentation
 * @module Types/Meta
 */

export type MessageMetaType =
  | 'tool'
  | 'tool-result'
  | 'run-stats'
  | 'question'
  | 'question-reply'
  | 'attachment'
  | 'unknown'

/**
 * Usage figures reported at the end of an agent run. Values are kept as the
 * agent sent them.
 */
export interface RunStats {
  engine?: string
  model?: string
  tokensIn?: string
  tokensOut?: string
  tokensReasoning?: string
  tokensCacheRead?: string
  tokensCacheWrite?: string
  tokensTotal?: string
  contextWindow?: string
  turns?: string
  toolCount?: string
  costUsd?: string
  durationS?: string
  summary?: string
}

export interface QuestionOption {
  label: string
  description?: string
}

export interface Question {
  header?: string
  question?: string
  options?: QuestionOption[]
  /** More than one option may be picked */
  multiple?: boolean
}

/** Questions an agent asks before it carries on. */
export interface QuestionRequest {
  version?: number
  engine?: string
  requestId: string
  questions: Question[]
}

/** Answer to a {@link QuestionRequest}. */
export interface QuestionReply {
  requestId: string
  /** Picked option labels, one list per question */
  answers?: string[][]
  /** Free-text answer */
  text?: string
  /** Body shown in the thread */
  displayText: string
}

export interface MessageAttachment {
  id: string
  /** `image` or `file` */
  kind: string
  mime?: string
  publicUrl?: string
  filename?: string
  sizeBytes?: number
  sha256?: string
}

export interface MessageMeta {
  type: MessageMetaType
  tool?: string
  requestId?: string
  runStats?: RunStats
  question?: QuestionRequest
  attachments?: MessageAttachment[]
}

export const isToolMeta = (meta: MessageMeta | undefined): boolean =>
  meta?.type === 'tool' || meta?.type === 'tool-result'

export const isQuestionMeta = (meta: MessageMeta | undefined): boolean =>
  meta?.type === 'question' || meta?.type === 'question-reply'
