export type Vec2 = { readonly x: number; readonly y: number };

export type Color3 = { readonly r: number; readonly g: number; readonly b: number };

export const vec = (x: number, y: number): Vec2 => ({ x, y });

export const addVec = (a: Vec2, b: Vec2): Vec2 => ({ x: a.x + b.x, y: a.y + b.y });

export const fromAngle = (angle: number, length = 1): Vec2 => ({
  x: Math.cos(angle) * length,
  y: Math.sin(angle) * length,
});

export const clamp = (value: number, min: number, max: number): number =>
  value < min ? min : value > max ? max : value;

/** Componentwise saturation; direction changes when only one axis saturates. */
export const clampVec = (v: Vec2, cap: number): Vec2 => ({
  x: clamp(v.x, -cap, cap),
  y: clamp(v.y, -cap, cap),
});

export const scaleColor = (c: Color3, k: number): Color3 => ({
  r: c.r * k,
  g: c.g * k,
  b: c.b * k,
});

export const clampColor = (c: Color3, cap: number): Color3 => ({
  r: clamp(c.r, -cap, cap),
  g: clamp(c.g, -cap, cap),
  b: clamp(c.b, -cap, cap),
});

export const maxAbsComponent = (c: Color3): number =>
  Math.max(Math.abs(c.r), Math.abs(c.g), Math.abs(c.b));
