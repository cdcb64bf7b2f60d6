import { WebSocket, type RawData } from 'ws'
import { QueuedLineSocket } from './lineSocket'

// Above this many queued bytes a snapshot is dropped instead of buffered.
const MAX_BUFFERED_BYTES = 64 * 1024

const rawToString = (data: RawData): string => {
  if (Buffer.isBuffer(data)) return data.toString('utf8')
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8')
  return Buffer.from(data).toString('utf8')
}

/** One protocol line per WebSocket text message. */
export class WsLineSocket extends QueuedLineSocket {
  constructor(
    private readonly ws: WebSocket,
    readonly remoteAddress: string
  ) {
    super()
    ws.on('message', (data) => this.pushLine(rawToString(data).replace(/\r?\n$/, '')))
    ws.on('close', () => this.endInput())
    ws.on('error', () => this.endInput())
  }

  writeLine(line: string): boolean {
    if (this.ws.readyState !== WebSocket.OPEN) return false
    if (this.ws.bufferedAmount > MAX_BUFFERED_BYTES) return false
    this.ws.send(line)
    return true
  }

  close() {
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close()
    }
  }
}
