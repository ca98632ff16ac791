/**
 * Integration policy — the choices the integrator makes per step that
 * change results: how velocity direction is computed in flight, and the
 * order of the position update.
 *
 * Defaults are the calibrated choices.
 */

import { ModelDomainError } from './errors.ts'

// ─── Velocity Direction ──────────────────────────────────────────────────────

/**
 * 'atan'  — atan(vy/vx): quadrant-naive, always in (−π/2, π/2).  Calibrated.
 * 'atan2' — full four-quadrant direction.
 */
export type DirectionStrategy = 'atan' | 'atan2'

/** Velocity direction relative to +x [rad]. Purely vertical velocity is a domain error. */
export function velocityDirection(vx: number, vy: number, strategy: DirectionStrategy = 'atan'): number {
  if (vx === 0 || !Number.isFinite(vx) || !Number.isFinite(vy)) {
    throw new ModelDomainError('vx', vx, `flight direction undefined for velocity (${vx}, ${vy})`)
  }
  return strategy === 'atan2' ? Math.atan2(vy, vx) : Math.atan(vy / vx)
}

// ─── Position Update ─────────────────────────────────────────────────────────

/**
 * Both orders use the velocity *after* this step's Euler update.
 *   'first-order'  p + v·dt
 *   'second-order' p + v·dt + ½·a·dt²
 */
export type PositionUpdate = 'first-order' | 'second-order'

export interface PhasePolicy {
  position: PositionUpdate
}

export function advancePosition(p: number, v: number, a: number, dt: number, order: PositionUpdate): number {
  return order === 'second-order'
    ? p + (v * dt + 0.5 * a * dt ** 2)
    : p + v * dt
}

// ─── Takeoff ─────────────────────────────────────────────────────────────────

/**
 * Angle the takeoff impulse is resolved against.
 * 'lip'  — surface angle where the skier actually is when the in-run loop
 *          exits (already past the ramp, so the flat lip).  Calibrated.
 * 'ramp' — last in-run angle, with velocity kept tangent to the ramp and
 *          the push applied along its normal.
 */
export type TakeoffAnglePolicy = 'lip' | 'ramp'
