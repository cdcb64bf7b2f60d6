/**
 * Error taxonomy for the session server.
 *
 * AuthError is recovered on the same connection (the client sees `ERR ...`).
 * ProtocolError, CryptoError and ConnectionLost drop the offending peer only.
 * SimulationFault ends the current session but never the tick loop.
 */

export class GameError extends Error {
  readonly code: string

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options)
    this.code = code
    this.name = new.target.name
  }
}

export class ProtocolError extends GameError {
  constructor(message: string, options?: ErrorOptions) {
    super('PROTOCOL', message, options)
  }
}

export type AuthErrorCode =
  | 'USERNAME_TAKEN'
  | 'UNKNOWN_USER'
  | 'BAD_PASSWORD'
  | 'INVALID_USERNAME'
  | 'INVALID_PASSWORD'
  | 'ALREADY_PLAYING'

const AUTH_MESSAGES: Record<AuthErrorCode, string> = {
  USERNAME_TAKEN: 'username taken',
  UNKNOWN_USER: 'unknown user',
  BAD_PASSWORD: 'bad password',
  INVALID_USERNAME: 'invalid username',
  INVALID_PASSWORD: 'invalid password',
  ALREADY_PLAYING: 'already playing'
}

export class AuthError extends GameError {
  declare readonly code: AuthErrorCode

  constructor(code: AuthErrorCode) {
    super(code, AUTH_MESSAGES[code])
  }
}

export class CryptoError extends GameError {
  constructor(message: string, options?: ErrorOptions) {
    super('CRYPTO', message, options)
  }
}

export class ConnectionLost extends GameError {
  constructor(message = 'peer closed the connection') {
    super('CONNECTION_LOST', message)
  }
}

export class SimulationFault extends GameError {
  constructor(message: string) {
    super('SIMULATION_FAULT', message)
  }
}
