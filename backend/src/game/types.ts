export type Side = 'left' | 'right'
export type PeerRole = Side | 'observer'

export const SIDES: readonly Side[] = ['left', 'right']

export const opponentOf = (side: Side): Side => (side === 'left' ? 'right' : 'left')

export type GamePhase = 'AWAITING_PLAYERS' | 'IN_PROGRESS' | 'GAME_OVER' | 'AWAITING_REMATCH'

export type FinishReason = 'score' | 'forfeit'

/** Directional intent sampled once per tick; `none` means no movement. */
export type Intent = 'up' | 'down' | 'none'

export type Intents = Record<Side, Intent>

export interface GameConfig {
  width: number;
  height: number;
  paddleHeight: number;
  paddleWidth: number;
  /** Gap between a side boundary and its paddle. */
  paddleInset: number;
  paddleSpeed: number;
  ballSize: number;
  /** Horizontal serve speed in units per tick. */
  ballSpeed: number;
  /** Largest vertical speed a paddle hit can produce. */
  maxBounceSpeed: number;
  winScore: number;
}

export interface BallState {
  x: number;
  y: number;
  vx: number;
  vy: number;
}

export interface MatchState {
  tick: number;
  phase: GamePhase;
  paddles: Record<Side, number>; // top edge y
  ball: BallState; // top-left corner
  score: Record<Side, number>;
  winner?: Side;
  finishReason?: FinishReason;
}

export interface GameOverMarker {
  readonly winner: Side;
  readonly winScore: number;
  readonly reason: FinishReason;
}

/** Immutable projection of one tick, with its rendered wire line. */
export interface StateSnapshot {
  readonly tick: number;
  readonly phase: GamePhase;
  readonly leftY: number;
  readonly rightY: number;
  readonly ballX: number;
  readonly ballY: number;
  readonly leftScore: number;
  readonly rightScore: number;
  readonly gameOver?: GameOverMarker;
  readonly line: string;
}

export const DEFAULT_CONFIG: GameConfig = {
  width: 640,
  height: 480,
  paddleHeight: 50,
  paddleWidth: 10,
  paddleInset: 10,
  paddleSpeed: 5,
  ballSize: 5,
  ballSpeed: 5,
  maxBounceSpeed: 5,
  winScore: 5,
};
