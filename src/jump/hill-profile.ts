/**
 * Hill geometry — landing-hill profile and in-run ramp.
 *
 * Two coordinate systems meet here:
 *   - world (x right towards the outrun, y up), used for the landing hill
 *     and the flight phase
 *   - slope-distance d, the distance travelled along the in-run surface,
 *     used while the skier is still on the track
 *
 * Pure functions over a HillGeometry value.  The default geometry is the
 * Whistler HS140 jumping hill certificate.
 */

import { ModelDomainError } from './errors.ts'

// ─── Types ───────────────────────────────────────────────────────────────────

/** y = intercept + slope·x */
export interface LineShape {
  kind: 'line'
  intercept: number
  slope: number
}

/** y = sign·sqrt(r² − (x − cx)²) + cy */
export interface ArcShape {
  kind: 'arc'
  cx: number
  cy: number
  r2: number
  sign: 1 | -1
}

export type HillShape = LineShape | ArcShape

/** Profile piece valid for x up to and including `upTo`. */
export interface HillSegment {
  upTo: number
  shape: HillShape
}

/** Straight in-run piece at a fixed angle. */
export interface StraightRamp {
  kind: 'straight'
  upTo: number    // slope-distance bound [m]
  d0: number      // slope-distance where the piece starts [m]
  x0: number      // x where the piece starts [m]
  angle: number   // [rad], negative = descending
}

/**
 * Circular transition between two straights.
 * x = cx − R·cos(phase0 + (d − d0)/R), angle = angle0 + (d − d0)/R
 */
export interface TransitionRamp {
  kind: 'transition'
  upTo: number
  d0: number
  cx: number
  radius: number
  phase0: number  // [rad]
  angle0: number  // [rad]
}

export type RampSegment = StraightRamp | TransitionRamp

export interface HillGeometry {
  name: string
  /** Left edge of the modelled profile [m] */
  xMin: number
  /** Ordered by `upTo`; the last bound is the right edge of the profile */
  segments: readonly HillSegment[]
  /** Ordered by `upTo`; the last bound is the end of the in-run */
  ramp: readonly RampSegment[]
  /** x the skier is pinned to once past the ramp end [m] */
  lipX: number
  /** Surface angle past the ramp end (flat table lip) [rad] */
  lipAngle: number
  /** Point the jump distance is measured from [m] */
  takeoffPoint: { x: number; y: number }
}

/**
 * What `hillAltitude` does right of the last segment.
 * 'legacy-zero' returns 0 m right of the profile instead of failing.
 */
export type HillAltitudePolicy = 'strict' | 'legacy-zero'

// ─── Whistler HS140 ──────────────────────────────────────────────────────────

export const WHISTLER_HS140: HillGeometry = {
  name: 'Whistler',
  xMin: 0,
  segments: [
    { upTo: 44.32,  shape: { kind: 'line', intercept: 136.63, slope: -0.7 } },
    { upTo: 82.17,  shape: { kind: 'arc', cx: 101.68, cy: 187.52, r2: 10000, sign: -1 } },
    { upTo: 88.642, shape: { kind: 'line', intercept: 105.87, slope: -0.2 } },
    { upTo: 142.55, shape: { kind: 'arc', cx: 88.64, cy: -5.14, r2: 8047.18, sign: 1 } },
    { upTo: 186.96, shape: { kind: 'line', intercept: 174.04, slope: -0.754 } },
    { upTo: 208.67, shape: { kind: 'arc', cx: 389.47, cy: 301.81, r2: 113232.25, sign: -1 } },
    { upTo: 270.46, shape: { kind: 'arc', cx: 270.46, cy: 115, r2: 13225, sign: -1 } },
  ],
  ramp: [
    { kind: 'straight', upTo: 54.1, d0: 0, x0: 0, angle: -0.611 },
    { kind: 'transition', upTo: 95.55, d0: 54.1, cx: 44.32 + 57.36, radius: 100, phase0: 0.96, angle0: -0.611 },
    { kind: 'straight', upTo: 102.15, d0: 95.55, x0: 82.17, angle: -0.196 },
  ],
  lipX: 88.642,
  lipAngle: 0,
  takeoffPoint: { x: 88.64, y: 88.15 },
}

// ─── Landing Hill ────────────────────────────────────────────────────────────

function evaluateShape(shape: HillShape, x: number): number {
  switch (shape.kind) {
    case 'line':
      return shape.intercept + shape.slope * x
    case 'arc':
      return shape.sign * Math.sqrt(shape.r2 - (x - shape.cx) ** 2) + shape.cy
  }
}

/** Right edge of the modelled profile [m] */
export function hillEnd(hill: HillGeometry = WHISTLER_HS140): number {
  const last = hill.segments[hill.segments.length - 1]
  return last ? last.upTo : hill.xMin
}

/**
 * Hill altitude y [m] at horizontal position x [m].
 * Throws ModelDomainError outside [xMin, hillEnd] unless the legacy policy
 * is selected, which returns 0 right of the profile.
 */
export function hillAltitude(
  x: number,
  hill: HillGeometry = WHISTLER_HS140,
  policy: HillAltitudePolicy = 'strict',
): number {
  if (Number.isNaN(x)) {
    throw new ModelDomainError('x', x, 'hill altitude requested for a non-numeric position')
  }
  if (x < hill.xMin) {
    throw new ModelDomainError('x', x, `position is left of the ${hill.name} profile (starts at ${hill.xMin} m)`)
  }
  const segment = hill.segments.find(s => x <= s.upTo)
  if (segment) return evaluateShape(segment.shape, x)

  if (policy === 'legacy-zero') return 0
  throw new ModelDomainError('x', x, `position is right of the ${hill.name} profile (ends at ${hillEnd(hill)} m)`)
}

/**
 * Sample the profile for drawing: every `step` metres across the domain,
 * always including the right edge.
 */
export function hillOutline(
  hill: HillGeometry = WHISTLER_HS140,
  step: number = 0.01,
): { x: number; y: number }[] {
  if (!(step > 0)) throw new ModelDomainError('step', step, 'outline step must be positive')
  const end = hillEnd(hill)
  const points: { x: number; y: number }[] = []
  for (let i = 0; hill.xMin + i * step < end; i++) {
    const x = hill.xMin + i * step
    points.push({ x, y: hillAltitude(x, hill) })
  }
  points.push({ x: end, y: hillAltitude(end, hill) })
  return points
}

// ─── In-Run Ramp ─────────────────────────────────────────────────────────────

function rampSegmentAt(d: number, hill: HillGeometry): RampSegment | undefined {
  if (Number.isNaN(d)) {
    throw new ModelDomainError('slopeDistance', d, 'slope distance is not a number')
  }
  return hill.ramp.find(r => d <= r.upTo)
}

/** Slope-distance at which the in-run ends and the skier leaves the table [m] */
export function rampEnd(hill: HillGeometry = WHISTLER_HS140): number {
  const last = hill.ramp[hill.ramp.length - 1]
  return last ? last.upTo : 0
}

/**
 * Horizontal position for a distance travelled along the in-run.
 * Past the ramp end the position is pinned to the table lip.
 */
export function positionForSlopeDistance(d: number, hill: HillGeometry = WHISTLER_HS140): number {
  const r = rampSegmentAt(d, hill)
  if (!r) return hill.lipX
  switch (r.kind) {
    case 'straight':
      return r.x0 + Math.cos(r.angle) * (d - r.d0)
    case 'transition':
      return r.cx - Math.cos(r.phase0 + (d - r.d0) / r.radius) * r.radius
  }
}

/**
 * In-run surface angle relative to +x [rad] at slope-distance d.
 * Constant on the straights, increasing linearly through the transition
 * curve, and the lip angle once the ramp has ended.
 */
export function slopeAngle(d: number, hill: HillGeometry = WHISTLER_HS140): number {
  const r = rampSegmentAt(d, hill)
  if (!r) return hill.lipAngle
  switch (r.kind) {
    case 'straight':
      return r.angle
    case 'transition':
      return r.angle0 + (d - r.d0) / r.radius
  }
}

/** Ramp angle at the very end of the in-run, before the lip [rad] */
export function rampExitAngle(hill: HillGeometry = WHISTLER_HS140): number {
  return slopeAngle(rampEnd(hill), hill)
}
