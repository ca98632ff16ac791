/**
 * Jump module — public API.
 *
 * Barrel export for the trajectory engine.  Everything in this directory
 * is UI-independent: no DOM, no charts, no file I/O.
 */

export { SimulationError, ConfigurationError, ModelDomainError } from './errors.ts'
export { DEFAULT_SKIER, makeSkierParameters } from './skier-params.ts'
export type { SkierInputs, SkierParameters } from './skier-params.ts'
export {
  WHISTLER_HS140,
  hillAltitude, hillEnd, hillOutline,
  positionForSlopeDistance, slopeAngle, rampEnd, rampExitAngle,
} from './hill-profile.ts'
export type {
  HillGeometry, HillSegment, HillShape, LineShape, ArcShape,
  RampSegment, StraightRamp, TransitionRamp, HillAltitudePolicy,
} from './hill-profile.ts'
export {
  ATTACK_ANGLE_WINDOWS, FIT_DEG_PER_RAD,
  attackAngleWindow, attackAngles, dragCoefficient, liftCoefficient,
  dragForce, liftForce, aeroForces,
} from './aero-model.ts'
export type { AttackAngleWindow, AttackAngles, AeroForces } from './aero-model.ts'
export { velocityDirection, advancePosition } from './integration.ts'
export type { DirectionStrategy, PositionUpdate, PhasePolicy, TakeoffAnglePolicy } from './integration.ts'
export {
  DEFAULT_OPTIONS, resolveOptions, checkStartPosition,
  trackStep, simulateTrackPhase, applyTakeoffImpulse, flightStep, simulateFlightPhase,
  jumpDistance, simulateJump,
} from './trajectory.ts'
export type { SimulationOptions, SampleListener, TrackCursor, TrackPhaseResult, FlightPhaseResult } from './trajectory.ts'
export type { KinematicState, Phase, TrajectorySample, SimulationResult, JumpTrajectory } from './sim-state.ts'
