import type { ForceKindName, StreamfallConfig } from '../config/types.js';
import { sampleDistribution } from '../random/distributions.js';
import type { RandomSource } from '../random/prng.js';
import { fromAngle, vec, type Vec2 } from '../geometry/vec.js';

export type ForceKind =
  | { readonly kind: 'inward' }
  | { readonly kind: 'outward' }
  | { readonly kind: 'linear'; readonly direction: Vec2 };

export type Force = {
  readonly position: Vec2;
  readonly strength: number;
  readonly spread: number;
  readonly kind: ForceKind;
};

export type ForceField = {
  readonly forces: readonly Force[];
};

const sampleForceKind = (kinds: readonly ForceKindName[], rng: RandomSource): ForceKind => {
  const name = kinds[Math.min(kinds.length - 1, Math.floor(rng.next() * kinds.length))];
  if (name === 'linear') {
    return { kind: 'linear', direction: fromAngle(rng.next() * 2 * Math.PI) };
  }
  return { kind: name };
};

export const createForceField = (
  config: Pick<
    StreamfallConfig,
    'size' | 'numForces' | 'forceKinds' | 'forceStrengthDist' | 'forceSpreadDist'
  >,
  rng: RandomSource,
): ForceField => {
  const forces: Force[] = [];
  for (let i = 0; i < config.numForces; i++) {
    const position = vec(rng.next() * config.size, rng.next() * config.size);
    const kind = sampleForceKind(config.forceKinds, rng);
    const strength = sampleDistribution(config.forceStrengthDist, rng);
    const spread = sampleDistribution(config.forceSpreadDist, rng);
    forces.push(Object.freeze({ position, strength, spread, kind }));
  }
  return Object.freeze({ forces: Object.freeze(forces) });
};

/** Gaussian falloff, peaking at strength / spread on the force's own position. */
export const forceMagnitude = (force: Force, distance: number): number => {
  const numDevs = distance / force.spread;
  return (force.strength / force.spread) * Math.exp(-(numDevs * numDevs) / 2);
};

export const forceAt = (force: Force, p: Vec2): Vec2 => {
  const dx = force.position.x - p.x;
  const dy = force.position.y - p.y;
  const distance = Math.hypot(dx, dy);
  const push = forceMagnitude(force, distance);
  switch (force.kind.kind) {
    case 'linear':
      return vec(force.kind.direction.x * push, force.kind.direction.y * push);
    case 'inward':
    case 'outward': {
      if (distance === 0) {
        return vec(0, 0);
      }
      const sign = force.kind.kind === 'inward' ? 1 : -1;
      const k = (sign * push) / distance;
      return vec(dx * k, dy * k);
    }
  }
};

/** Net force at `p`: the plain sum over every force in the field. */
export const fieldAt = (field: ForceField, p: Vec2): Vec2 => {
  let x = 0;
  let y = 0;
  for (const force of field.forces) {
    const f = forceAt(force, p);
    x += f.x;
    y += f.y;
  }
  return vec(x, y);
};
