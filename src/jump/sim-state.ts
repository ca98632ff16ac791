/**
 * Trajectory state types.
 *
 * Pure types with no logic.
 */

// ─── Kinematics ──────────────────────────────────────────────────────────────

/**
 * Skier CG kinematics at one instant.  World frame: x right (down the
 * hill), y up.  Angles relative to +x.
 */
export interface KinematicState {
  readonly t: number      // [s]
  readonly x: number      // [m]
  readonly y: number      // [m]
  readonly vx: number     // [m/s]
  readonly vy: number
  readonly v: number      // |v|
  readonly theta: number  // velocity direction, atan2(vy, vx) [rad]
  readonly ax: number     // [m/s²]
  readonly ay: number
  readonly a: number      // |a|
}

export type Phase = 'track' | 'flight'

/** One recorded integration step. */
export interface TrajectorySample {
  readonly phase: Phase
  readonly state: KinematicState
  /** Distance along the in-run [m]; frozen at its takeoff value in flight */
  readonly slopeDistance: number
  /** Hill altitude below the skier [m] */
  readonly hillAltitude: number
  /**
   * Direction the step's forces were resolved against [rad].  The slope
   * angle on track; in flight, the velocity direction at the start of the
   * step, so it trails `state.theta` by one step.
   */
  readonly forceAngle: number
}

// ─── Results ─────────────────────────────────────────────────────────────────

export interface SimulationResult {
  readonly mass: number           // [kg]
  readonly height: number         // [m]
  readonly startPosition: number  // slope-distance [m]
  readonly takeoffSpeed: number   // speed at the end of the in-run [m/s]
  readonly finalDistance: number  // takeoff point → landing point [m]
  readonly landing: { readonly t: number; readonly x: number; readonly y: number }
  readonly flightTime: number     // [s]
  readonly trackSteps: number
  readonly flightSteps: number    // recorded samples, landing step excluded
}

export interface JumpTrajectory {
  readonly samples: readonly TrajectorySample[]
  readonly result: SimulationResult
}
