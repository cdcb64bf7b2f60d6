import type { Socket } from 'node:net'

/**
 * Transport-neutral capability a connection handler works against.
 *
 * `readLine` resolves with `null` once the peer is gone. `writeLine` never
 * blocks: it returns false when the line was dropped because the transport is
 * closed or still draining earlier output. `onEnd` listeners run as soon as
 * the peer is gone, even while nobody is reading.
 */
export interface LineSocket {
  readonly remoteAddress: string
  readLine(): Promise<string | null>
  writeLine(line: string): boolean
  onEnd(listener: () => void): void
  close(): void
}

export const MAX_LINE_LENGTH = 4096
export const MAX_PENDING_LINES = 256

// How long a closing TCP socket may spend flushing before it is destroyed.
const CLOSE_GRACE_MS = 1000

/**
 * Inbound line queue shared by the transports. Subclasses push decoded lines
 * and signal the end of input; anything past the limits closes the peer.
 */
export abstract class QueuedLineSocket implements LineSocket {
  private lines: string[] = []
  private waiters: Array<(line: string | null) => void> = []
  private endListeners: Array<() => void> = []
  private ended = false

  abstract readonly remoteAddress: string
  abstract writeLine(line: string): boolean
  abstract close(): void

  readLine(): Promise<string | null> {
    const next = this.lines.shift()
    if (next !== undefined) return Promise.resolve(next)
    if (this.ended) return Promise.resolve(null)
    return new Promise((resolve) => this.waiters.push(resolve))
  }

  /** Runs `listener` once input ends; at once if it already has. */
  onEnd(listener: () => void) {
    if (this.ended) listener()
    else this.endListeners.push(listener)
  }

  protected pushLine(line: string) {
    if (this.ended) return
    if (line.length > MAX_LINE_LENGTH || this.lines.length >= MAX_PENDING_LINES) {
      this.endInput()
      this.close()
      return
    }
    const waiter = this.waiters.shift()
    if (waiter) waiter(line)
    else this.lines.push(line)
  }

  protected endInput() {
    if (this.ended) return
    this.ended = true
    this.lines = []
    for (const waiter of this.waiters.splice(0)) waiter(null)
    for (const listener of this.endListeners.splice(0)) listener()
  }
}

/** Newline-delimited UTF-8 over a TCP socket; `\r\n` is accepted. */
export class TcpLineSocket extends QueuedLineSocket {
  readonly remoteAddress: string
  private buffer = ''
  private closing = false

  constructor(private readonly socket: Socket) {
    super()
    this.remoteAddress = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`
    socket.setEncoding('utf8')
    socket.setNoDelay(true)
    socket.on('data', (chunk: string) => this.onData(chunk))
    socket.on('end', () => this.endInput())
    socket.on('close', () => this.endInput())
    // 'close' follows every error; the read loop sees null there
    socket.on('error', () => this.endInput())
  }

  writeLine(line: string): boolean {
    if (this.socket.destroyed || !this.socket.writable) return false
    if (this.socket.writableNeedDrain) return false
    this.socket.write(`${line}\n`)
    return true
  }

  // Flushes pending output, then destroys the socket whether or not the peer
  // has sent its FIN.
  close() {
    if (this.closing || this.socket.destroyed) return
    this.closing = true
    this.socket.end(() => this.socket.destroy())
    setTimeout(() => this.socket.destroy(), CLOSE_GRACE_MS).unref()
  }

  private onData(chunk: string) {
    this.buffer += chunk
    let newline = this.buffer.indexOf('\n')
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline).replace(/\r$/, '')
      this.buffer = this.buffer.slice(newline + 1)
      this.pushLine(line)
      newline = this.buffer.indexOf('\n')
    }
    if (this.buffer.length > MAX_LINE_LENGTH) {
      this.buffer = ''
      this.endInput()
      this.socket.destroy()
    }
  }
}
