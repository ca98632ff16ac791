/**
 * Skier parameter tests — derived quantities and validation.
 */

import { describe, it, expect } from 'vitest'
import { DEFAULT_SKIER, makeSkierParameters } from '../jump/skier-params.ts'
import type { SkierInputs } from '../jump/skier-params.ts'
import { ConfigurationError } from '../jump/errors.ts'

describe('makeSkierParameters', () => {
  it('derives masses and areas from height', () => {
    const p = makeSkierParameters()
    expect(p.skiMass).toBeCloseTo(5.22, 12)
    expect(p.mass).toBeCloseTo(70.22, 12)
    expect(p.frontalAreaBody).toBeCloseTo(0.54, 12)
    expect(p.frontalAreaTakeoff).toBeCloseTo(0.27, 12)
    expect(p.frontalAreaSkis).toBeCloseTo(0.522, 12)
    expect(p.landingClearance).toBeCloseTo(0.6, 12)
  })

  it('keeps the base values', () => {
    const p = makeSkierParameters()
    expect(p.g).toBe(9.81)
    expect(p.airDensity).toBe(1.13)
    expect(p.frictionCoeff).toBe(0.05)
    expect(p.dt).toBe(0.001)
    expect(p.startPosition).toBe(6.25)
    expect(p.jumpHeight).toBe(0.4)
  })

  it('recomputes derived values from overrides', () => {
    const p = makeSkierParameters({ height: 2, bodyMass: 70 })
    expect(p.skiMass).toBeCloseTo(5.8, 12)
    expect(p.mass).toBeCloseTo(77.8, 12)
    expect(p.frontalAreaBody).toBeCloseTo(0.6, 12)
    expect(p.landingClearance).toBeCloseTo(2 / 3, 12)
  })

  it('returns a frozen value and leaves the defaults alone', () => {
    const p = makeSkierParameters({ height: 1.7 })
    expect(Object.isFrozen(p)).toBe(true)
    expect(DEFAULT_SKIER.height).toBe(1.8)
  })

  const badInputs: [keyof SkierInputs, Partial<SkierInputs>][] = [
    ['bodyMass', { bodyMass: -63 }],
    ['height', { height: 0 }],
    ['dt', { dt: Number.NaN }],
    ['frictionCoeff', { frictionCoeff: -0.1 }],
    ['airDensity', { airDensity: 0 }],
    ['startPosition', { startPosition: -1 }],
    ['g', { g: Infinity }],
  ]

  for (const [field, overrides] of badInputs) {
    it(`rejects a bad ${field}`, () => {
      try {
        makeSkierParameters(overrides)
        expect.unreachable()
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigurationError)
        if (err instanceof ConfigurationError) expect(err.field).toBe(field)
      }
    })
  }

  it('allows zero friction and no equipment', () => {
    const p = makeSkierParameters({ frictionCoeff: 0, equipmentMass: 0 })
    expect(p.mass).toBeCloseTo(68.22, 12)
  })
})
