/**
 * Startup configuration.
 *
 * Read once from the process environment and two optional `.env` files,
 * validated with zod, and never re-read. Sources merge with increasing
 * precedence: environment, `<cwd>/.env`, the file named by
 * `SWITCHBOARD_DOTENV_PATH`.
 *
 * @module Core/Config
 */
import { existsSync, readFileSync } from 'node:fs'
import { resolve } from 'node:path'
import { parse as parseDotEnv } from 'dotenv'
import { z } from 'zod'
import { createDirectoryEntry, UNORDERED, type DirectoryEntry } from './types'
import { getDomain, getLocalPart, withDefaultResource } from './jid'

/** Resource added to a bare directory address so disco reaches the connected directory client */
export const DIRECTORY_RESOURCE = 'directory'

export const DEFAULT_XMPP_PORT = 5222

export const CONFIG_LIMITS = {
  prefetchHistoryThreads: { fallback: 0, min: 0, max: 50 },
  recencyProbeThreads: { fallback: 5000, min: 0, max: 5000 },
  mamLastItems: { fallback: 50, min: 10, max: 500 },
  mamRecencyLastItems: { fallback: 1, min: 1, max: 5 },
} as const

export interface AppConfig {
  /** Connection URL: `ws(s)://…` as given, or `xmpp://host:port` */
  service: string
  jid: string
  password: string
  /** Directory service address, null when no directory is configured */
  directoryJid: string | null
  /** Notification service, explicit or `pubsub.<account domain>` */
  pubSubJid: string | null
  convenienceDispatchers: DirectoryEntry[]
  prefetchHistoryThreads: number
  recencyProbeThreads: number
  mamLastItems: number
  mamRecencyLastItems: number
  /** Lookup tokens for the four dispatcher hotkey slots */
  dispatcherHotkeys: Array<string | null>
}

export class ConfigError extends Error {
  constructor(message: string, readonly key?: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

type Env = Record<string, string | undefined>

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max))
}

function parseInteger(raw: string | undefined): number | null {
  if (raw === undefined || !/^[+-]?\d+$/.test(raw)) return null
  return Number.parseInt(raw, 10)
}

const required = (key: string) =>
  z.string({ required_error: `Missing required setting: ${key}` }).min(1, `Missing required setting: ${key}`)

const clampedInt = ({ fallback, min, max }: { fallback: number; min: number; max: number }) =>
  z
    .string()
    .optional()
    .transform((raw) => clamp(parseInteger(raw) ?? fallback, min, max))

const EnvSchema = z.object({
  XMPP_SERVICE: required('XMPP_SERVICE'),
  XMPP_JID: required('XMPP_JID'),
  XMPP_PASSWORD: required('XMPP_PASSWORD'),
  SWITCHBOARD_DIRECTORY_JID: z.string().optional(),
  SWITCHBOARD_PUBSUB_JID: z.string().optional(),
  SWITCHBOARD_CONVENIENCE_DISPATCHERS: z.string().optional(),
  SWITCHBOARD_PREFETCH_HISTORY_THREADS: clampedInt(CONFIG_LIMITS.prefetchHistoryThreads),
  SWITCHBOARD_RECENCY_PROBE_THREADS: clampedInt(CONFIG_LIMITS.recencyProbeThreads),
  SWITCHBOARD_MAM_LAST_ITEMS: clampedInt(CONFIG_LIMITS.mamLastItems),
  SWITCHBOARD_MAM_RECENCY_LAST_ITEMS: clampedInt(CONFIG_LIMITS.mamRecencyLastItems),
  SWITCHBOARD_DISPATCHER_HOTKEY_1: z.string().optional(),
  SWITCHBOARD_DISPATCHER_HOTKEY_2: z.string().optional(),
  SWITCHBOARD_DISPATCHER_HOTKEY_3: z.string().optional(),
  SWITCHBOARD_DISPATCHER_HOTKEY_4: z.string().optional(),
})

/**
 * Parse `host[:port]`. A missing or non-numeric port yields the default.
 */
export function parseHostPort(raw: string, defaultPort = DEFAULT_XMPP_PORT): { host: string; port: number } {
  const trimmed = raw.trim()
  const colon = trimmed.lastIndexOf(':')
  if (colon > 0) {
    const port = parseInteger(trimmed.slice(colon + 1))
    if (port !== null) return { host: trimmed.slice(0, colon), port }
  }
  return { host: trimmed, port: defaultPort }
}

/**
 * Connection URL for @xmpp/client. URLs pass through; `host[:port]`
 * becomes a plain XMPP (STARTTLS) URL.
 */
export function resolveServiceUrl(service: string): string {
  if (/^(wss?|xmpps?):\/\//i.test(service)) return service
  const { host, port } = parseHostPort(service)
  return `xmpp://${host}:${port}`
}

/**
 * Parse `label=address` / `address` entries separated by commas. The label
 * defaults to the address local part; repeated addresses are ignored.
 */
export function parseConvenienceDispatchers(raw: string | undefined): DirectoryEntry[] {
  if (!raw) return []

  const seen = new Set<string>()
  const result: DirectoryEntry[] = []
  for (const token of raw.split(',')) {
    const entry = token.trim()
    if (!entry) continue

    const eq = entry.indexOf('=')
    const label = eq >= 0 ? entry.slice(0, eq).trim() : ''
    const jid = eq >= 0 ? entry.slice(eq + 1).trim() : entry
    if (!jid || seen.has(jid)) continue
    seen.add(jid)

    result.push(
      createDirectoryEntry(jid, {
        displayName: label || getLocalPart(jid),
        isDirect: true,
        sortOrder: UNORDERED,
      })
    )
  }
  return result
}

/** `pubsub.<domain>` for an account address with a domain, else null. */
export function inferPubSubJid(accountJid: string): string | null {
  const domain = getDomain(accountJid)
  return domain ? `pubsub.${domain}` : null
}

function readDotEnvFile(path: string): Env {
  if (!existsSync(path)) return {}
  try {
    return parseDotEnv(readFileSync(path, 'utf8'))
  } catch (err) {
    throw new ConfigError(`Unable to read ${path}: ${err instanceof Error ? err.message : String(err)}`)
  }
}

/** Trim every value; drop the empty ones. */
function cleanEnv(env: Env): Record<string, string> {
  const cleaned: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    const trimmed = value?.trim()
    if (trimmed) cleaned[key] = trimmed
  }
  return cleaned
}

export interface LoadConfigOptions {
  /** Defaults to `process.env` */
  env?: Env
  /** Directory holding the `.env` file; defaults to `process.cwd()` */
  cwd?: string
}

/**
 * Load and validate configuration.
 *
 * @throws ConfigError when a required setting is missing or a `.env` file cannot be read
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env
  const cwd = options.cwd ?? process.cwd()

  const overridePath = env.SWITCHBOARD_DOTENV_PATH?.trim()
  const merged = cleanEnv({
    ...env,
    ...readDotEnvFile(resolve(cwd, '.env')),
    ...(overridePath ? readDotEnvFile(resolve(cwd, overridePath)) : {}),
  })

  const parsed = EnvSchema.safeParse(merged)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const key = issue.path.length > 0 ? String(issue.path[0]) : undefined
    throw new ConfigError(issue.message, key)
  }

  const values = parsed.data
  const directory = values.SWITCHBOARD_DIRECTORY_JID
  return {
    service: resolveServiceUrl(values.XMPP_SERVICE),
    jid: values.XMPP_JID,
    password: values.XMPP_PASSWORD,
    directoryJid: directory ? withDefaultResource(directory, DIRECTORY_RESOURCE) : null,
    pubSubJid: values.SWITCHBOARD_PUBSUB_JID ?? inferPubSubJid(values.XMPP_JID),
    convenienceDispatchers: parseConvenienceDispatchers(values.SWITCHBOARD_CONVENIENCE_DISPATCHERS),
    prefetchHistoryThreads: values.SWITCHBOARD_PREFETCH_HISTORY_THREADS,
    recencyProbeThreads: values.SWITCHBOARD_RECENCY_PROBE_THREADS,
    mamLastItems: values.SWITCHBOARD_MAM_LAST_ITEMS,
    mamRecencyLastItems: values.SWITCHBOARD_MAM_RECENCY_LAST_ITEMS,
    dispatcherHotkeys: [
      values.SWITCHBOARD_DISPATCHER_HOTKEY_1 ?? null,
      values.SWITCHBOARD_DISPATCHER_HOTKEY_2 ?? null,
      values.SWITCHBOARD_DISPATCHER_HOTKEY_3 ?? null,
      values.SWITCHBOARD_DISPATCHER_HOTKEY_4 ?? null,
    ],
  }
}
