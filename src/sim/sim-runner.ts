/**
 * Simulation runner.
 *
 * Owns the configuration for a run, drives the jump integrator and
 * forwards samples and the summary to whatever consumes them (chart
 * data, readout, export).  No rendering or file dependencies.
 */

import type { SkierInputs, SkierParameters } from '../jump/skier-params.ts'
import type { SimulationOptions } from '../jump/trajectory.ts'
import type { TrajectorySample, SimulationResult, JumpTrajectory } from '../jump/sim-state.ts'
import { makeSkierParameters } from '../jump/skier-params.ts'
import { DEFAULT_OPTIONS, resolveOptions, checkStartPosition, simulateJump } from '../jump/trajectory.ts'

// ─── Callbacks ──────────────────────────────────────────────────────────────

export interface SimRunnerCallbacks {
  /** Called once per recorded integration step, in order */
  onSample?: (sample: TrajectorySample) => void
  /** Called once when the skier has landed */
  onResult?: (result: SimulationResult) => void
}

// ─── Policy Warnings ────────────────────────────────────────────────────────

/**
 * Describe every option that departs from the settings calibrated
 * against the 2011 Whistler jump.
 */
export function uncalibratedSettings(options: SimulationOptions): string[] {
  const notes: string[] = []
  if (options.hill !== DEFAULT_OPTIONS.hill) notes.push(`hill geometry '${options.hill.name}'`)
  if (options.direction !== DEFAULT_OPTIONS.direction) notes.push(`direction strategy '${options.direction}'`)
  if (options.takeoffAngle !== DEFAULT_OPTIONS.takeoffAngle) notes.push(`takeoff angle '${options.takeoffAngle}'`)
  if (options.altitudePolicy !== DEFAULT_OPTIONS.altitudePolicy) notes.push(`altitude policy '${options.altitudePolicy}'`)
  if (options.track.position !== DEFAULT_OPTIONS.track.position) notes.push(`track position update '${options.track.position}'`)
  if (options.flight.position !== DEFAULT_OPTIONS.flight.position) notes.push(`flight position update '${options.flight.position}'`)
  return notes
}

function warnIfUncalibrated(options: SimulationOptions): void {
  const notes = uncalibratedSettings(options)
  if (notes.length > 0) {
    console.warn(`Running with uncalibrated settings: ${notes.join(', ')}`)
  }
}

// ─── Sim Runner ─────────────────────────────────────────────────────────────

export class SimulationRunner {
  readonly params: SkierParameters
  readonly options: SimulationOptions
  private callbacks: SimRunnerCallbacks
  private last: JumpTrajectory | null = null

  /** Throws ConfigurationError before anything is integrated. */
  constructor(
    inputs: Partial<SkierInputs> = {},
    options: Partial<SimulationOptions> = {},
    callbacks: SimRunnerCallbacks = {},
  ) {
    this.params = makeSkierParameters(inputs)
    this.options = resolveOptions(options)
    checkStartPosition(this.params.startPosition, this.options.hill)
    this.callbacks = callbacks
  }

  /** Most recent completed run, if any */
  get trajectory(): JumpTrajectory | null { return this.last }

  run(): JumpTrajectory {
    warnIfUncalibrated(this.options)
    const trajectory = simulateJump(this.params, this.options, this.callbacks.onSample)
    this.last = trajectory
    this.callbacks.onResult?.(trajectory.result)
    return trajectory
  }
}

// ─── Batch ──────────────────────────────────────────────────────────────────

/**
 * Run one independent simulation per start position.
 * Every position is validated before the first run; results are returned
 * in the order of `positions`.
 */
export function sweepStartPositions(
  positions: readonly number[],
  inputs: Partial<SkierInputs> = {},
  options: Partial<SimulationOptions> = {},
): SimulationResult[] {
  const opts = resolveOptions(options)
  const params = positions.map(startPosition => makeSkierParameters({ ...inputs, startPosition }))
  for (const p of params) checkStartPosition(p.startPosition, opts.hill)

  warnIfUncalibrated(opts)
  return params.map(p => simulateJump(p, opts).result)
}
