import { SimulationFault } from '../errors';
import { formatStateLine } from '../types/protocol';
import { DEFAULT_CONFIG, SIDES, opponentOf } from './types';
import type {
  FinishReason,
  GameConfig,
  GamePhase,
  Intent,
  Intents,
  MatchState,
  Side,
  StateSnapshot,
} from './types';

const TRANSITIONS: Record<GamePhase, readonly GamePhase[]> = {
  AWAITING_PLAYERS: ['IN_PROGRESS'],
  IN_PROGRESS: ['GAME_OVER'],
  GAME_OVER: ['AWAITING_REMATCH'],
  AWAITING_REMATCH: ['IN_PROGRESS'],
};

export function createInitialState(config: GameConfig, phase: GamePhase = 'AWAITING_PLAYERS'): MatchState {
  const paddleY = Math.floor((config.height - config.paddleHeight) / 2);
  return {
    tick: 0,
    phase,
    paddles: { left: paddleY, right: paddleY },
    ball: centeredBall(config, 'left'),
    score: { left: 0, right: 0 },
  };
}

// Serve from the centre toward `toward`, flat.
function centeredBall(config: GameConfig, toward: Side) {
  return {
    x: Math.floor(config.width / 2),
    y: Math.floor(config.height / 2),
    vx: toward === 'left' ? -config.ballSpeed : config.ballSpeed,
    vy: 0,
  };
}

/**
 * Authoritative, deterministic Pong simulation.
 *
 * The engine never reads the clock or a random source: the same starting
 * state and the same intent trace always yield the same snapshots. The tick
 * scheduler lives in GameManager.
 */
export class GameEngine {
  private state: MatchState;

  constructor(
    private readonly config: GameConfig = DEFAULT_CONFIG,
    initial?: MatchState,
  ) {
    this.state = initial ? structuredClone(initial) : createInitialState(config);
  }

  get phase(): GamePhase {
    return this.state.phase;
  }

  get winScore(): number {
    return this.config.winScore;
  }

  /** Advances one tick. Outside IN_PROGRESS everything stays frozen. */
  step(intents: Intents): GamePhase {
    if (this.state.phase !== 'IN_PROGRESS') return this.state.phase;

    const before = { ...this.state.score };
    this.state.tick++;
    for (const side of SIDES) {
      this.movePaddle(side, intents[side]);
    }
    this.updatePhysics();
    this.assertInvariants(before);
    return this.state.phase;
  }

  begin() {
    this.transition('IN_PROGRESS');
    this.state = createInitialState(this.config, 'IN_PROGRESS');
  }

  /** Ends an in-progress game; the opponent of `loser` wins. */
  forfeit(loser: Side) {
    if (this.state.phase !== 'IN_PROGRESS') {
      throw new SimulationFault(`cannot forfeit during ${this.state.phase}`);
    }
    this.finish(opponentOf(loser), 'forfeit');
  }

  awaitRematch() {
    this.transition('AWAITING_REMATCH');
  }

  /** Resets score, ball and paddles and resumes play. */
  restart() {
    this.transition('IN_PROGRESS');
    this.state = createInitialState(this.config, 'IN_PROGRESS');
  }

  /** Drops the current match and waits for a fresh pair of players. */
  reset() {
    this.state = createInitialState(this.config);
  }

  snapshot(): StateSnapshot {
    const { paddles, ball, score, winner, finishReason } = this.state;
    const gameOver =
      winner && finishReason ? { winner, winScore: this.config.winScore, reason: finishReason } : undefined;
    const fields = {
      leftY: paddles.left,
      rightY: paddles.right,
      ballX: ball.x,
      ballY: ball.y,
      leftScore: score.left,
      rightScore: score.right,
      gameOver,
    };
    return Object.freeze({
      tick: this.state.tick,
      phase: this.state.phase,
      ...fields,
      line: formatStateLine(fields),
    });
  }

  private transition(to: GamePhase) {
    const from = this.state.phase;
    if (!TRANSITIONS[from].includes(to)) {
      throw new SimulationFault(`illegal phase transition ${from} -> ${to}`);
    }
    this.state.phase = to;
  }

  private movePaddle(side: Side, intent: Intent) {
    if (intent === 'none') return;
    const delta = intent === 'up' ? -this.config.paddleSpeed : this.config.paddleSpeed;
    const maxY = this.config.height - this.config.paddleHeight;
    this.state.paddles[side] = Math.max(0, Math.min(maxY, this.state.paddles[side] + delta));
  }

  private updatePhysics() {
    const { ball } = this.state;
    const { width, height, ballSize } = this.config;

    ball.x += ball.vx;
    ball.y += ball.vy;

    // Top/bottom walls
    if (ball.y <= 0) {
      ball.y = 0;
      ball.vy = Math.abs(ball.vy);
    } else if (ball.y + ballSize >= height) {
      ball.y = height - ballSize;
      ball.vy = -Math.abs(ball.vy);
    }

    // Paddles
    if (ball.vx < 0 && this.overlapsPaddle('left')) {
      ball.vx = -ball.vx;
      ball.x = this.paddleX('left') + this.config.paddleWidth;
      ball.vy = this.deflection('left');
    } else if (ball.vx > 0 && this.overlapsPaddle('right')) {
      ball.vx = -ball.vx;
      ball.x = this.paddleX('right') - ballSize;
      ball.vy = this.deflection('right');
    }

    // Side boundaries
    if (ball.x + ballSize < 0) {
      this.score('right');
    } else if (ball.x > width) {
      this.score('left');
    }
  }

  private paddleX(side: Side): number {
    return side === 'left'
      ? this.config.paddleInset
      : this.config.width - this.config.paddleInset - this.config.paddleWidth;
  }

  private overlapsPaddle(side: Side): boolean {
    const { ball } = this.state;
    const { ballSize, paddleWidth, paddleHeight } = this.config;
    const px = this.paddleX(side);
    const py = this.state.paddles[side];
    return ball.x < px + paddleWidth && ball.x + ballSize > px && ball.y < py + paddleHeight && ball.y + ballSize > py;
  }

  // Outgoing vertical speed grows with the distance between the ball centre
  // and the paddle centre. Doubled coordinates keep the arithmetic integral.
  private deflection(side: Side): number {
    const { ballSize, paddleHeight, maxBounceSpeed } = this.config;
    const offset = 2 * this.state.ball.y + ballSize - (2 * this.state.paddles[side] + paddleHeight);
    const vy = Math.trunc((offset * maxBounceSpeed) / paddleHeight);
    return Math.max(-maxBounceSpeed, Math.min(maxBounceSpeed, vy));
  }

  private score(scorer: Side) {
    this.state.score[scorer]++;
    this.state.ball = centeredBall(this.config, scorer);
    if (this.state.score[scorer] >= this.config.winScore) {
      this.finish(scorer, 'score');
    }
  }

  private finish(winner: Side, reason: FinishReason) {
    this.transition('GAME_OVER');
    this.state.winner = winner;
    this.state.finishReason = reason;
  }

  private assertInvariants(before: Record<Side, number>) {
    const maxY = this.config.height - this.config.paddleHeight;
    for (const side of SIDES) {
      const score = this.state.score[side];
      if (!Number.isInteger(score) || score < before[side]) {
        throw new SimulationFault(`score for ${side} went from ${before[side]} to ${score}`);
      }
      const y = this.state.paddles[side];
      if (!(y >= 0 && y <= maxY)) {
        throw new SimulationFault(`${side} paddle left the court (y=${y})`);
      }
    }
    const { ball } = this.state;
    if (!Number.isFinite(ball.x) || !(ball.y >= 0 && ball.y <= this.config.height - this.config.ballSize)) {
      throw new SimulationFault(`ball left the court (${ball.x}, ${ball.y})`);
    }
  }
}
