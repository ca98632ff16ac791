/**
 * Three-phase jump integrator.
 *
 *   1. Track   — explicit Euler on speed along the in-run surface
 *   2. Takeoff — instantaneous jump impulse normal to the surface
 *   3. Flight  — explicit Euler on (vx, vy) under weight, lift and drag
 *
 * The run ends at the first flight step whose CG is closer to the hill
 * than the landing clearance; that step is not recorded.
 *
 * Pure math.  All state lives in the arguments and return values.
 */

import type { KinematicState, TrajectorySample, SimulationResult, JumpTrajectory } from './sim-state.ts'
import type { SkierParameters } from './skier-params.ts'
import type { HillGeometry, HillAltitudePolicy } from './hill-profile.ts'
import type { DirectionStrategy, PhasePolicy, TakeoffAnglePolicy } from './integration.ts'
import {
  WHISTLER_HS140,
  hillAltitude,
  positionForSlopeDistance,
  slopeAngle,
  rampEnd,
  rampExitAngle,
} from './hill-profile.ts'
import { aeroForces } from './aero-model.ts'
import { velocityDirection, advancePosition } from './integration.ts'
import { ConfigurationError, ModelDomainError, SimulationError } from './errors.ts'

// ─── Options ─────────────────────────────────────────────────────────────────

export interface SimulationOptions {
  hill: HillGeometry
  direction: DirectionStrategy
  takeoffAngle: TakeoffAnglePolicy
  altitudePolicy: HillAltitudePolicy
  track: PhasePolicy
  flight: PhasePolicy
  /** Per-phase step budget; exceeding it is a domain error */
  maxSteps: number
}

/** Calibrated against the 2011 Whistler jump. */
export const DEFAULT_OPTIONS: SimulationOptions = {
  hill: WHISTLER_HS140,
  direction: 'atan',
  takeoffAngle: 'lip',
  altitudePolicy: 'strict',
  track: { position: 'second-order' },
  flight: { position: 'second-order' },
  maxSteps: 1_000_000,
}

export function resolveOptions(options: Partial<SimulationOptions> = {}): SimulationOptions {
  return { ...DEFAULT_OPTIONS, ...options }
}

/** Receives each recorded sample as soon as it is produced. */
export type SampleListener = (sample: TrajectorySample) => void

function checkStepBudget(steps: number, options: SimulationOptions, phase: string): void {
  if (steps > options.maxSteps) {
    throw new ModelDomainError('steps', steps, `${phase} phase did not finish within ${options.maxSteps} steps`)
  }
}

// ─── Phase 1: Track ──────────────────────────────────────────────────────────

/** Where the skier is on the in-run between steps. */
export interface TrackCursor {
  t: number
  slopeDistance: number
  v: number
}

/**
 * One in-run step.  Acceleration is along the surface:
 *
 *   a = g·(sin(−θ) − μ·cos(−θ)) − ½·ρ·A_takeoff·½·v² / m
 */
export function trackStep(
  cursor: TrackCursor,
  params: SkierParameters,
  options: SimulationOptions = DEFAULT_OPTIONS,
): TrajectorySample {
  const { g, frictionCoeff, airDensity, frontalAreaTakeoff, mass, dt } = params
  const theta = slopeAngle(cursor.slopeDistance, options.hill)

  const a = g * (Math.sin(-theta) - frictionCoeff * Math.cos(-theta))
    - (0.5 * airDensity * frontalAreaTakeoff * 0.5 * cursor.v ** 2) / mass
  const ax = a * Math.cos(theta)
  const ay = a * Math.sin(theta)

  const v = cursor.v + a * dt
  const slopeDistance = advancePosition(cursor.slopeDistance, v, a, dt, options.track.position)
  const x = positionForSlopeDistance(slopeDistance, options.hill)
  const y = hillAltitude(x, options.hill, options.altitudePolicy)

  return {
    phase: 'track',
    state: {
      t: cursor.t + dt,
      x, y,
      vx: v * Math.cos(theta),
      vy: v * Math.sin(theta),
      v,
      theta,
      ax, ay,
      a: Math.abs(a),
    },
    slopeDistance,
    hillAltitude: y,
    forceAngle: theta,
  }
}

export interface TrackPhaseResult {
  samples: TrajectorySample[]
  /** Last in-run sample; the skier is past the ramp end here */
  exit: TrajectorySample
}

/** Throws ConfigurationError when the start lies past the end of the in-run. */
export function checkStartPosition(startPosition: number, hill: HillGeometry = WHISTLER_HS140): void {
  const end = rampEnd(hill)
  if (startPosition > end) {
    throw new ConfigurationError('startPosition', `${startPosition} m is past the end of the ${hill.name} in-run (${end} m)`)
  }
}

/** Integrate from the start position until the slope-distance passes the ramp end. */
export function simulateTrackPhase(
  params: SkierParameters,
  options: SimulationOptions = DEFAULT_OPTIONS,
  onSample?: SampleListener,
): TrackPhaseResult {
  checkStartPosition(params.startPosition, options.hill)
  const end = rampEnd(options.hill)

  const samples: TrajectorySample[] = []
  let cursor: TrackCursor = { t: 0, slopeDistance: params.startPosition, v: 0 }
  let exit: TrajectorySample | undefined

  while (cursor.slopeDistance <= end) {
    checkStepBudget(samples.length + 1, options, 'track')
    const sample = trackStep(cursor, params, options)
    samples.push(sample)
    onSample?.(sample)
    exit = sample
    cursor = { t: sample.state.t, slopeDistance: sample.slopeDistance, v: sample.state.v }
  }

  if (!exit) throw new SimulationError('in-run produced no samples')
  return { samples, exit }
}

// ─── Phase 2: Takeoff ────────────────────────────────────────────────────────

/**
 * Add the jump push to the in-run exit velocity.
 *
 * The push is the speed that would lift the CG by `jumpHeight`:
 * J = sqrt(2·g·h).  The returned state is not recorded, so its
 * acceleration fields are zero.
 */
export function applyTakeoffImpulse(
  exit: TrajectorySample,
  params: SkierParameters,
  options: SimulationOptions = DEFAULT_OPTIONS,
): KinematicState {
  const { v } = exit.state
  const push = Math.sqrt(2 * params.g * params.jumpHeight)

  let vx: number
  let vy: number
  if (options.takeoffAngle === 'ramp') {
    const theta = rampExitAngle(options.hill)
    vx = v * Math.cos(theta) - push * Math.sin(theta)
    vy = v * Math.sin(theta) + push * Math.cos(theta)
  } else {
    const theta = slopeAngle(exit.slopeDistance, options.hill)
    vx = v * Math.cos(theta) + push * Math.sin(theta)
    vy = v * -Math.sin(theta) + push * Math.cos(theta)
  }

  return {
    t: exit.state.t,
    x: exit.state.x,
    y: exit.state.y,
    vx, vy,
    v: Math.sqrt(vx * vx + vy * vy),
    theta: velocityDirection(vx, vy, options.direction),
    ax: 0, ay: 0, a: 0,
  }
}

// ─── Phase 3: Flight ─────────────────────────────────────────────────────────

/**
 * One flight step.  Forces are resolved against the direction of the
 * incoming velocity; θ in the returned state is the direction of the
 * updated velocity.
 *
 *   ax = (L·(−sinθ) + D·(−cosθ)) / m
 *   ay = −g + (L·cosθ + D·(−sinθ)) / m
 */
export function flightStep(
  state: KinematicState,
  flightStart: number,
  params: SkierParameters,
  options: SimulationOptions = DEFAULT_OPTIONS,
): KinematicState {
  const { g, mass, dt } = params
  const theta = velocityDirection(state.vx, state.vy, options.direction)
  const { lift, drag } = aeroForces(state.v, theta, state.t - flightStart, params)

  const ax = (lift * -Math.sin(theta) + drag * -Math.cos(theta)) / mass
  const ay = -g + (lift * Math.cos(theta) + drag * -Math.sin(theta)) / mass

  const vx = state.vx + ax * dt
  const vy = state.vy + ay * dt

  return {
    t: state.t + dt,
    x: advancePosition(state.x, vx, ax, dt, options.flight.position),
    y: advancePosition(state.y, vy, ay, dt, options.flight.position),
    vx, vy,
    v: Math.sqrt(vx * vx + vy * vy),
    theta: velocityDirection(vx, vy, options.direction),
    ax, ay,
    a: Math.sqrt(ax * ax + ay * ay),
  }
}

export interface FlightPhaseResult {
  samples: TrajectorySample[]
  /** First state below the landing clearance (not recorded) */
  landing: KinematicState
}

/**
 * Integrate from the airborne state until the landing test fails.
 * `slopeDistance` is carried unchanged into every flight sample.
 */
export function simulateFlightPhase(
  start: KinematicState,
  slopeDistance: number,
  params: SkierParameters,
  options: SimulationOptions = DEFAULT_OPTIONS,
  onSample?: SampleListener,
): FlightPhaseResult {
  const flightStart = start.t
  const samples: TrajectorySample[] = []
  let state = start

  for (let steps = 1; ; steps++) {
    checkStepBudget(steps, options, 'flight')
    const forceAngle = velocityDirection(state.vx, state.vy, options.direction)
    const next = flightStep(state, flightStart, params, options)
    const ground = hillAltitude(next.x, options.hill, options.altitudePolicy)

    if (next.y < ground + params.landingClearance) {
      return { samples, landing: next }
    }

    const sample: TrajectorySample = {
      phase: 'flight',
      state: next,
      slopeDistance,
      hillAltitude: ground,
      forceAngle,
    }
    samples.push(sample)
    onSample?.(sample)
    state = next
  }
}

// ─── Full Run ────────────────────────────────────────────────────────────────

/** Straight-line distance from the hill's takeoff point to (x, y) [m] */
export function jumpDistance(x: number, y: number, hill: HillGeometry = WHISTLER_HS140): number {
  const { takeoffPoint } = hill
  return Math.sqrt((x - takeoffPoint.x) ** 2 + (takeoffPoint.y - y) ** 2)
}

/**
 * Run all three phases.  Samples are delivered to `onSample` in order as
 * they are produced and returned together with the summary.
 */
export function simulateJump(
  params: SkierParameters,
  options: Partial<SimulationOptions> = {},
  onSample?: SampleListener,
): JumpTrajectory {
  const opts = resolveOptions(options)

  const track = simulateTrackPhase(params, opts, onSample)
  const airborne = applyTakeoffImpulse(track.exit, params, opts)
  const flight = simulateFlightPhase(airborne, track.exit.slopeDistance, params, opts, onSample)
  const { landing } = flight

  const result: SimulationResult = {
    mass: params.mass,
    height: params.height,
    startPosition: params.startPosition,
    takeoffSpeed: track.exit.state.v,
    finalDistance: jumpDistance(landing.x, landing.y, opts.hill),
    landing: { t: landing.t, x: landing.x, y: landing.y },
    flightTime: landing.t - airborne.t,
    trackSteps: track.samples.length,
    flightSteps: flight.samples.length,
  }

  return { samples: [...track.samples, ...flight.samples], result }
}
