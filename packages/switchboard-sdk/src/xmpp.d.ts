declare module '@xmpp/client' {
  export interface Element {
    name: string
    attrs: Record<string, string | undefined>
    children: (string | Element)[]
    is(name: string, xmlns?: string): boolean
    getChild(name: string, xmlns?: string): Element | undefined
    getChildren(name: string, xmlns?: string): Element[]
    getChildText(name: string, xmlns?: string): string | null
    getText(): string
    text(): string
    toString(): string
  }

  export interface JID {
    local: string
    domain: string
    resource: string
    bare(): JID
    toString(): string
  }

  export interface IQCaller {
    request(element: Element, timeout?: number): Promise<Element>
  }

  export interface Client {
    on(event: 'online', handler: (address: JID) => void): void
    on(event: 'offline', handler: () => void): void
    on(event: 'error', handler: (err: Error) => void): void
    on(event: 'stanza', handler: (stanza: Element) => void): void
    on(event: 'status', handler: (status: string) => void): void
    start(): Promise<unknown>
    stop(): Promise<unknown>
    send(element: Element): Promise<void>
    iqCaller: IQCaller
  }

  export interface ClientOptions {
    service: string
    domain: string
    username?: string
    password?: string
    resource?: string
    lang?: string
  }

  export function client(options: ClientOptions): Client
  export function xml(name: string, attrs?: Record<string, string | undefined>, ...children: unknown[]): Element
}
