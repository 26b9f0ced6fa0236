import type { CanvasAccumulator } from '../canvas/accumulator.js';
import type { StreamfallConfig } from '../config/types.js';
import type { Faucet } from '../faucets/faucetSet.js';
import { fieldAt, type ForceField } from '../field/forceField.js';
import {
  addVec,
  clamp,
  clampColor,
  clampVec,
  maxAbsComponent,
  scaleColor,
  vec,
  type Color3,
  type Vec2,
} from '../geometry/vec.js';
import { sampleDistribution } from '../random/distributions.js';
import type { RandomSource } from '../random/prng.js';

export type TerminationReason = 'outOfBounds' | 'decayed';

export type StreamStatus =
  | { readonly kind: 'active' }
  | { readonly kind: 'terminated'; readonly reason: TerminationReason };

export type StreamState = {
  position: Vec2;
  velocity: Vec2;
  color: Color3;
  /** E-folding length of the color, in pixels of travel. */
  readonly decayFactor: number;
  /** Pixels the stream may deposit before it counts as decayed. */
  readonly maxAge: number;
  age: number;
  stepsTaken: number;
  deposits: number;
  status: StreamStatus;
};

export type StreamOutcome = {
  readonly reason: TerminationReason;
  readonly steps: number;
  readonly deposits: number;
};

export type IntegratorConfig = Pick<
  StreamfallConfig,
  | 'size'
  | 'decayDist'
  | 'maxDecayFactor'
  | 'velocityCap'
  | 'colorCap'
  | 'decayCutoff'
  | 'escapeMargin'
>;

/** Below this, a stream's color no longer changes the image. */
export const NEGLIGIBLE_COLOR = 1e-9;

const ACTIVE: StreamStatus = Object.freeze({ kind: 'active' });

export const decayBudget = (decayFactor: number, decayCutoff: number): number =>
  Math.floor(decayCutoff * decayFactor);

/**
 * Hard upper bound on the transitions any stream can take: every step that does
 * not terminate spends at least one pixel of the decay budget.
 */
export const maxStreamSteps = (
  config: Pick<StreamfallConfig, 'maxDecayFactor' | 'decayCutoff'>,
): number => decayBudget(config.maxDecayFactor, config.decayCutoff) + 1;

export const initStream = (
  faucet: Faucet,
  config: IntegratorConfig,
  rng: RandomSource,
): StreamState => {
  const position = vec(
    faucet.position.x + faucet.positionJitter * rng.normal(),
    faucet.position.y + faucet.positionJitter * rng.normal(),
  );
  const velocity = clampVec(
    vec(
      faucet.velocity.x + faucet.velocityJitter * rng.normal(),
      faucet.velocity.y + faucet.velocityJitter * rng.normal(),
    ),
    config.velocityCap,
  );
  const decayFactor = clamp(sampleDistribution(config.decayDist, rng), 0, config.maxDecayFactor);
  return {
    position,
    velocity,
    color: clampColor(faucet.color, config.colorCap),
    decayFactor,
    maxAge: decayBudget(decayFactor, config.decayCutoff),
    age: 0,
    stepsTaken: 0,
    deposits: 0,
    status: ACTIVE,
  };
};

const terminate = (state: StreamState, reason: TerminationReason) => {
  state.status = { kind: 'terminated', reason };
};

const isInside = (p: Vec2, size: number, margin: number) =>
  p.x >= -margin && p.y >= -margin && p.x < size + margin && p.y < size + margin;

/**
 * Advances an active stream by one transition. Deposits land on the segment
 * from the current position to the next one, one sample per pixel of travel,
 * the last sample being the post-step position.
 */
export const stepStream = (
  state: StreamState,
  field: ForceField,
  canvas: CanvasAccumulator,
  config: IntegratorConfig,
): StreamStatus => {
  if (state.status.kind !== 'active') {
    return state.status;
  }
  state.stepsTaken += 1;
  if (state.age >= state.maxAge || maxAbsComponent(state.color) < NEGLIGIBLE_COLOR) {
    terminate(state, 'decayed');
    return state.status;
  }

  const force = fieldAt(field, state.position);
  state.velocity = clampVec(addVec(state.velocity, force), config.velocityCap);

  const { x: vx, y: vy } = state.velocity;
  const samples = Math.max(1, Math.floor(Math.max(Math.abs(vx), Math.abs(vy))));
  const falloff = Math.exp(-1 / state.decayFactor);
  for (let k = 1; k <= samples && state.age < state.maxAge; k++) {
    const t = k / samples;
    const px = Math.floor(state.position.x + vx * t);
    const py = Math.floor(state.position.y + vy * t);
    if (canvas.add(px, py, state.color)) {
      state.deposits += 1;
    }
    state.color = clampColor(scaleColor(state.color, falloff), config.colorCap);
    state.age += 1;
  }

  state.position = addVec(state.position, state.velocity);
  if (!isInside(state.position, config.size, config.escapeMargin)) {
    terminate(state, 'outOfBounds');
  }
  return state.status;
};

export type IntegrateOptions = {
  /** Called after every transition, terminal ones included. */
  onStep?: (state: Readonly<StreamState>) => void;
};

export const integrateStream = (
  state: StreamState,
  field: ForceField,
  canvas: CanvasAccumulator,
  config: IntegratorConfig,
  options: IntegrateOptions = {},
): StreamOutcome => {
  const limit = maxStreamSteps(config);
  while (state.status.kind === 'active' && state.stepsTaken < limit) {
    stepStream(state, field, canvas, config);
    options.onStep?.(state);
  }
  if (state.status.kind === 'active') {
    terminate(state, 'decayed');
  }
  const reason = state.status.kind === 'terminated' ? state.status.reason : 'decayed';
  return { reason, steps: state.stepsTaken, deposits: state.deposits };
};
