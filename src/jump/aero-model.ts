/**
 * In-flight aerodynamics — attack angles, empirical CL/CD fits, forces.
 *
 * The skier is modelled as two flat bodies (skis and torso) whose angles
 * to the airflow follow a fixed schedule measured from competition video.
 * Each schedule window applies a constant offset to the current velocity
 * direction.
 *
 * Pure functions of (v, θ, t).  No state, no side effects.
 *
 * Reference: Stathopoulos, e-JST issue 16; Müller et al., CERN p269.
 */

import type { SkierParameters } from './skier-params.ts'
import { ModelDomainError } from './errors.ts'

// ─── Types ───────────────────────────────────────────────────────────────────

/** Attack-angle schedule row, active while flight time ≤ `until` */
export interface AttackAngleWindow {
  until: number       // [s]
  skiOffset: number   // [rad]
  bodyOffset: number  // body-to-ski offset, added before skiOffset [rad]
}

export interface AttackAngles {
  ski: number   // skis relative to velocity [rad]
  body: number  // torso relative to velocity [rad]
}

export interface AeroForces {
  lift: number  // [N], ⊥ velocity
  drag: number  // [N], opposing velocity
}

// ─── Constants ───────────────────────────────────────────────────────────────

/**
 * Degrees per radian as used when the coefficient curves were fitted.
 * Deliberately 180/3.14, not 180/π.
 */
export const FIT_DEG_PER_RAD = 180 / 3.14

export const ATTACK_ANGLE_WINDOWS: readonly AttackAngleWindow[] = [
  { until: 0.04,     skiOffset:  0.209, bodyOffset:  1.187 },
  { until: 0.21,     skiOffset:  0.087, bodyOffset: -1.047 },
  { until: 0.63,     skiOffset: -0.209, bodyOffset: -0.349 },
  { until: 1.05,     skiOffset: -0.122, bodyOffset: -0.349 },
  { until: 1.43,     skiOffset: -0.105, bodyOffset: -0.349 },
  { until: 2.04,     skiOffset: -0.035, bodyOffset: -0.349 },
  { until: 2.26,     skiOffset: -0.017, bodyOffset: -0.349 },
  { until: 2.71,     skiOffset: -0.017, bodyOffset: -0.349 },
  { until: 3.26,     skiOffset: -0.017, bodyOffset: -0.349 },
  { until: Infinity, skiOffset: -0.035, bodyOffset: -0.349 },
]

// ─── Attack Angles ───────────────────────────────────────────────────────────

export function attackAngleWindow(flightTime: number): AttackAngleWindow {
  if (!(flightTime >= 0)) {
    throw new ModelDomainError('flightTime', flightTime, 'attack angles are scheduled from takeoff onwards')
  }
  const window = ATTACK_ANGLE_WINDOWS.find(w => flightTime <= w.until)
  if (!window) {
    throw new ModelDomainError('flightTime', flightTime, 'no attack-angle window covers this time')
  }
  return window
}

/**
 * Ski and body attack angles for a velocity direction θ [rad]
 * at `flightTime` seconds after takeoff.
 */
export function attackAngles(theta: number, flightTime: number): AttackAngles {
  const w = attackAngleWindow(flightTime)
  return {
    ski: Math.abs(theta + w.skiOffset),
    body: Math.abs(theta + w.bodyOffset + w.skiOffset),
  }
}

// ─── Coefficients ────────────────────────────────────────────────────────────

/** CD = 0.0103 · α_ski[deg] */
export function dragCoefficient(skiAngle: number): number {
  return 0.0103 * skiAngle * FIT_DEG_PER_RAD
}

/** CL = |−0.00025 · α² + 0.0228 · α − 0.092|, α in degrees */
export function liftCoefficient(skiAngle: number): number {
  const deg = skiAngle * FIT_DEG_PER_RAD
  return Math.abs(-0.00025 * deg ** 2 + 0.0228 * deg - 0.092)
}

// ─── Forces ──────────────────────────────────────────────────────────────────

/** Drag magnitude [N]; area projected with sin of each attack angle. */
export function dragForce(v: number, theta: number, flightTime: number, params: SkierParameters): number {
  const att = attackAngles(theta, flightTime)
  const cd = dragCoefficient(att.ski)
  const area = params.frontalAreaSkis * Math.sin(att.ski) + params.frontalAreaBody * Math.sin(att.body)
  return Math.abs(0.5 * params.airDensity * area * cd * v ** 2)
}

/** Lift magnitude [N]; area projected with cos of each attack angle. */
export function liftForce(v: number, theta: number, flightTime: number, params: SkierParameters): number {
  const att = attackAngles(theta, flightTime)
  const cl = liftCoefficient(att.ski)
  const area = params.frontalAreaSkis * Math.cos(att.ski) + params.frontalAreaBody * Math.cos(att.body)
  return Math.abs(0.5 * params.airDensity * area * cl * v ** 2)
}

export function aeroForces(v: number, theta: number, flightTime: number, params: SkierParameters): AeroForces {
  return {
    lift: liftForce(v, theta, flightTime, params),
    drag: dragForce(v, theta, flightTime, params),
  }
}
