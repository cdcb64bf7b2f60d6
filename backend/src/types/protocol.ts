/**
 * Line protocol shared by every transport.
 *
 * Handshake and auth lines travel in plaintext. After authentication a
 * player's lines are Secure Channel envelopes wrapping the payloads parsed
 * here; observers receive plaintext state lines and are never answered.
 */

import { ProtocolError } from '../errors'
import type { GameOverMarker, Intent, PeerRole } from '../game/types'

export type WireRole = 'left' | 'right' | 'spectator'

export const toWireRole = (role: PeerRole): WireRole => (role === 'observer' ? 'spectator' : role)

export function formatHandshake(width: number, height: number, role: PeerRole): string {
  return `${width} ${height} ${toWireRole(role)}`
}

/* ===== Authentication ===== */
export type AuthAction = 'register' | 'login'

export interface AuthRequest {
  action: AuthAction
  username: string
  password: string
}

export function parseAuthRequest(line: string): AuthRequest {
  const parts = line.trim().split(/\s+/)
  if (parts.length !== 3) {
    throw new ProtocolError('expected "<register|login> <user> <pass>"')
  }
  const [action, username, password] = parts
  if (action !== 'register' && action !== 'login') {
    throw new ProtocolError(`unknown auth action "${action}"`)
  }
  return { action, username, password }
}

export const formatAuthOk = (action: AuthAction): string =>
  action === 'register' ? 'OK registered' : 'OK logged-in'

export const formatAuthError = (reason: string): string => `ERR ${reason}`

export const MALFORMED_REQUEST = formatAuthError('malformed request')

/* ===== Gameplay ===== */
export type GameplayCommand = { kind: 'move'; intent: Intent } | { kind: 'ready' }

export function parseGameplayPayload(payload: string): GameplayCommand {
  switch (payload.trim()) {
    case '':
      return { kind: 'move', intent: 'none' }
    case 'up':
      return { kind: 'move', intent: 'up' }
    case 'down':
      return { kind: 'move', intent: 'down' }
    case 'ready':
    case 'reset':
      return { kind: 'ready' }
    default:
      throw new ProtocolError('unknown gameplay command')
  }
}

export interface StateLineFields {
  leftY: number
  rightY: number
  ballX: number
  ballY: number
  leftScore: number
  rightScore: number
  gameOver?: GameOverMarker
}

/** `<leftY> <rightY> <ballX> <ballY> <leftScore> <rightScore>[ gameover <side> <winScore> <reason>]` */
export function formatStateLine(s: StateLineFields): string {
  const base = `${s.leftY} ${s.rightY} ${s.ballX} ${s.ballY} ${s.leftScore} ${s.rightScore}`
  if (!s.gameOver) return base
  const { winner, winScore, reason } = s.gameOver
  return `${base} gameover ${winner} ${winScore} ${reason}`
}
