import { once } from 'node:events'
import net from 'node:net'
import type { AddressInfo } from 'node:net'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { createTestHarness } from '../testing/fakes'
import { createLogger } from '../utils/logger'
import { closeTcp, listenTcp } from './tcpServer'

type Harness = Awaited<ReturnType<typeof createTestHarness>>

function lineClient(port: number, allowHalfOpen = false) {
  const socket = net.connect({ port, host: '127.0.0.1', allowHalfOpen })
  socket.setEncoding('utf8')
  const lines: string[] = []
  const waiting: Array<(line: string | null) => void> = []
  let buffer = ''
  socket.on('data', (chunk: string) => {
    buffer += chunk
    let i = buffer.indexOf('\n')
    while (i !== -1) {
      const line = buffer.slice(0, i)
      buffer = buffer.slice(i + 1)
      const next = waiting.shift()
      if (next) next(line)
      else lines.push(line)
      i = buffer.indexOf('\n')
    }
  })
  socket.on('close', () => {
    for (const next of waiting.splice(0)) next(null)
  })
  return {
    socket,
    send: (line: string) => socket.write(line),
    next: (): Promise<string | null> => {
      const line = lines.shift()
      if (line !== undefined) return Promise.resolve(line)
      if (socket.destroyed) return Promise.resolve(null)
      return new Promise((resolve) => waiting.push(resolve))
    }
  }
}

describe('listenTcp', () => {
  let h: Harness
  let server: net.Server
  let port: number

  beforeEach(async () => {
    h = await createTestHarness()
    server = await listenTcp(h.manager, { host: '127.0.0.1', port: 0 }, createLogger('silent'))
    const address: AddressInfo | string | null = server.address()
    if (typeof address === 'object' && address) port = address.port
  })

  afterEach(async () => {
    h.manager.stop()
    if (server.listening) await closeTcp(server)
    await h.cleanup()
  })

  it('runs handshake and authentication over newline-delimited lines', async () => {
    const a = lineClient(port)
    expect(await a.next()).toBe('640 480 left')
    a.send('register alice pw1\r\n')
    expect(await a.next()).toBe('OK registered')
    a.socket.destroy()
  })

  it('reassembles lines split across packets', async () => {
    const a = lineClient(port)
    expect(await a.next()).toBe('640 480 left')
    a.send('regis')
    a.send('ter alice pw1\nlogin')
    expect(await a.next()).toBe('OK registered')
    a.socket.destroy()
  })

  it('finishes closing once stopped, even if the client never hangs up', async () => {
    const a = lineClient(port, true)
    expect(await a.next()).toBe('640 480 left')
    const ended = once(a.socket, 'end')

    h.manager.stop()
    await closeTcp(server)
    await ended
    a.socket.destroy()
  })

  it('closes the connection after a malformed request', async () => {
    const a = lineClient(port)
    expect(await a.next()).toBe('640 480 left')
    a.send('hello\n')
    expect(await a.next()).toBe('ERR malformed request')
    expect(await a.next()).toBeNull()
  })
})
