/**
 * Skier body model and run constants.
 *
 * Base values describe the athlete and the conditions on the day; the
 * masses and frontal areas derived from height follow the FIS equipment
 * rules (ski length 145% of body height, 10 cm ski width).
 */

import { ConfigurationError } from './errors.ts'

// ─── Types ───────────────────────────────────────────────────────────────────

/** Values a caller may override. Everything else is derived from these. */
export interface SkierInputs {
  bodyMass: number        // [kg]
  equipmentMass: number   // clothes, bindings, boots [kg]
  height: number          // [m]
  frictionCoeff: number   // waxed ski on snow
  airDensity: number      // [kg/m³]
  g: number               // [m/s²]
  dt: number              // integration step [s]
  startPosition: number   // distance along the in-run [m]
  jumpHeight: number      // height the takeoff push alone would reach [m]
}

export interface SkierParameters extends Readonly<SkierInputs> {
  readonly skiMass: number             // [kg]
  readonly mass: number                // total [kg]
  readonly frontalAreaBody: number     // standing [m²]
  readonly frontalAreaTakeoff: number  // crouched in-run stance [m²]
  readonly frontalAreaSkis: number     // both skis [m²]
  /** CG height above the ski soles in the flight stance [m] */
  readonly landingClearance: number
}

// ─── Defaults ────────────────────────────────────────────────────────────────

/** Wolfgang Loitzl, Whistler HS140, 22 Feb 2011 */
export const DEFAULT_SKIER: SkierInputs = {
  bodyMass: 63,
  equipmentMass: 2,
  height: 1.8,
  frictionCoeff: 0.05,
  airDensity: 1.13,
  g: 9.81,
  dt: 0.001,
  startPosition: 6.25,
  jumpHeight: 0.4,
}

// ─── Construction ────────────────────────────────────────────────────────────

function requirePositive(field: keyof SkierInputs, value: number): void {
  if (!Number.isFinite(value)) throw new ConfigurationError(field, `${value} is not a finite number`)
  if (value <= 0) throw new ConfigurationError(field, `${value} must be greater than zero`)
}

function requireNonNegative(field: keyof SkierInputs, value: number): void {
  if (!Number.isFinite(value)) throw new ConfigurationError(field, `${value} is not a finite number`)
  if (value < 0) throw new ConfigurationError(field, `${value} must not be negative`)
}

/**
 * Validate inputs and derive the full parameter set.
 * Throws ConfigurationError on the first bad field.
 */
export function makeSkierParameters(overrides: Partial<SkierInputs> = {}): SkierParameters {
  const inputs: SkierInputs = { ...DEFAULT_SKIER, ...overrides }

  requirePositive('bodyMass', inputs.bodyMass)
  requireNonNegative('equipmentMass', inputs.equipmentMass)
  requirePositive('height', inputs.height)
  requireNonNegative('frictionCoeff', inputs.frictionCoeff)
  requirePositive('airDensity', inputs.airDensity)
  requirePositive('g', inputs.g)
  requirePositive('dt', inputs.dt)
  requireNonNegative('startPosition', inputs.startPosition)
  requireNonNegative('jumpHeight', inputs.jumpHeight)

  const skiMass = 2 * (inputs.height * 1.45)
  const frontalAreaBody = inputs.height * 0.3

  return Object.freeze({
    ...inputs,
    skiMass,
    mass: skiMass + inputs.bodyMass + inputs.equipmentMass,
    frontalAreaBody,
    frontalAreaTakeoff: frontalAreaBody * 0.5,
    frontalAreaSkis: 2 * (inputs.height * 1.45 * 0.1),
    landingClearance: inputs.height / 3,
  })
}
