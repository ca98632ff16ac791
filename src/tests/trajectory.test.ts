/**
 * Trajectory integrator tests.
 *
 *   - checkStartPosition
 *   - trackStep / simulateTrackPhase
 *   - applyTakeoffImpulse (lip and ramp)
 *   - flightStep / simulateFlightPhase
 *   - simulateJump: Whistler run, invariants, variants, failures
 */

import { describe, it, expect } from 'vitest'
import {
  DEFAULT_OPTIONS,
  resolveOptions,
  checkStartPosition,
  trackStep,
  simulateTrackPhase,
  applyTakeoffImpulse,
  flightStep,
  simulateFlightPhase,
  jumpDistance,
  simulateJump,
} from '../jump/trajectory.ts'
import type { KinematicState, TrajectorySample } from '../jump/sim-state.ts'
import { makeSkierParameters } from '../jump/skier-params.ts'
import { hillAltitude } from '../jump/hill-profile.ts'
import { ConfigurationError, ModelDomainError } from '../jump/errors.ts'

const params = makeSkierParameters()

// Whistler HS140, 6.25 m start, dt = 1 ms
const REF_TAKEOFF_SPEED = 26.615229735006196
const REF_DISTANCE = 134.3848779069854
const REF_TRACK_STEPS = 6243
const REF_FLIGHT_STEPS = 4533
const JUMP_PUSH = 2.8014282071829006

function relativeError(actual: number, expected: number): number {
  return Math.abs(actual - expected) / Math.abs(expected)
}

// ─── Track ───────────────────────────────────────────────────────────────────

describe('checkStartPosition', () => {
  it('accepts positions up to the ramp end', () => {
    expect(() => checkStartPosition(0)).not.toThrow()
    expect(() => checkStartPosition(102.15)).not.toThrow()
  })

  it('rejects positions past the ramp end', () => {
    expect(() => checkStartPosition(102.16)).toThrow(ConfigurationError)
    expect(() => checkStartPosition(150)).toThrow('150 m is past the end of the Whistler in-run (102.15 m)')
  })
})

describe('trackStep', () => {
  it('first step from rest', () => {
    const s = trackStep({ t: 0, slopeDistance: 6.25, v: 0 }, params)
    expect(s.phase).toBe('track')
    expect(s.state.t).toBeCloseTo(0.001, 12)
    expect(s.state.a).toBeCloseTo(5.226111559093803, 9)
    expect(s.state.v).toBeCloseTo(0.005226111559093803, 12)
    expect(s.state.ax).toBeCloseTo(4.28057596990869, 9)
    expect(s.state.ay).toBeCloseTo(-2.998151329391852, 9)
    expect(s.state.theta).toBe(-0.611)
    expect(s.forceAngle).toBe(-0.611)
    expect(s.slopeDistance).toBeCloseTo(6.250007839167338, 12)
    expect(s.state.x).toBeCloseTo(5.119223549969468, 10)
    expect(s.state.y).toBeCloseTo(133.04654351502137, 9)
    expect(s.hillAltitude).toBe(s.state.y)
  })

  it('uses the first-order position update when asked', () => {
    const opts = resolveOptions({ track: { position: 'first-order' } })
    const s = trackStep({ t: 0, slopeDistance: 6.25, v: 0 }, params, opts)
    expect(s.slopeDistance).toBeCloseTo(6.25 + s.state.v * 0.001, 15)
  })
})

describe('simulateTrackPhase', () => {
  const track = simulateTrackPhase(params)

  it('terminates in a bounded number of steps', () => {
    expect(Math.abs(track.samples.length - REF_TRACK_STEPS)).toBeLessThanOrEqual(1)
  })

  it('exits just past the ramp end', () => {
    expect(track.exit.slopeDistance).toBeGreaterThan(102.15)
    expect(track.exit.slopeDistance).toBeLessThan(102.2)
    const beforeExit = track.samples.slice(0, -1)
    expect(beforeExit.every(s => s.slopeDistance <= 102.15)).toBe(true)
  })

  it('reaches the recorded takeoff speed', () => {
    expect(relativeError(track.exit.state.v, REF_TAKEOFF_SPEED)).toBeLessThan(1e-3)
    expect(track.exit.state.v).toBeCloseTo(REF_TAKEOFF_SPEED, 6)
  })

  it('is pinned to the lip at the exit', () => {
    expect(track.exit.state.x).toBe(88.642)
    expect(track.exit.state.theta).toBe(-0.196)
  })

  it('advances time monotonically', () => {
    for (let i = 1; i < track.samples.length; i++) {
      expect(track.samples[i].state.t).toBeGreaterThan(track.samples[i - 1].state.t)
    }
  })

  it('rejects a start position past the ramp end', () => {
    const far = makeSkierParameters({ startPosition: 150 })
    expect(() => simulateTrackPhase(far)).toThrow(ConfigurationError)
  })
})

// ─── Takeoff ─────────────────────────────────────────────────────────────────

describe('applyTakeoffImpulse', () => {
  const exit: TrajectorySample = {
    phase: 'track',
    state: {
      t: 6.243, x: 88.642, y: 88.1416,
      vx: 26.105638910667516, vy: -5.183249069165016, v: REF_TAKEOFF_SPEED,
      theta: -0.196, ax: 0.6473140791480907, ay: -0.12852357721192273, a: 0.6599498670071006,
    },
    slopeDistance: 102.15380969578726,
    hillAltitude: 88.1416,
    forceAngle: -0.196,
  }

  it('lip policy adds a vertical push to horizontal speed', () => {
    const s = applyTakeoffImpulse(exit, params)
    expect(s.vx).toBe(REF_TAKEOFF_SPEED)
    expect(s.vy).toBeCloseTo(JUMP_PUSH, 12)
    expect(s.v).toBeCloseTo(26.762258010996717, 10)
    expect(s.theta).toBeCloseTo(0.10487043846796067, 10)
    expect(s.t).toBe(exit.state.t)
    expect(s.x).toBe(exit.state.x)
    expect(s.y).toBe(exit.state.y)
  })

  it('ramp policy keeps the push normal to the last ramp angle', () => {
    const s = applyTakeoffImpulse(exit, params, resolveOptions({ takeoffAngle: 'ramp' }))
    expect(s.vx).toBeCloseTo(26.651210010063853, 10)
    expect(s.vy).toBeCloseTo(-2.435458652211155, 10)
    expect(s.v).toBeCloseTo(26.762258010996717, 10)
  })
})

// ─── Flight ──────────────────────────────────────────────────────────────────

describe('flightStep', () => {
  const start: KinematicState = {
    t: 6.243, x: 88.642, y: 88.1416,
    vx: REF_TAKEOFF_SPEED, vy: JUMP_PUSH, v: 26.762258010996717,
    theta: 0, ax: 0, ay: 0, a: 0,
  }

  it('matches the first recorded flight sample', () => {
    const s = flightStep(start, start.t, params)
    expect(s.t).toBeCloseTo(6.244, 9)
    expect(s.x).toBeCloseTo(88.66861400005449, 8)
    expect(s.y).toBeCloseTo(88.14438768565988, 8)
    expect(s.v).toBeCloseTo(26.76048521864287, 8)
    expect(s.theta).toBe(Math.atan(s.vy / s.vx))
    expect(s.theta).toBeLessThan(0.10487043846796067)
    expect(s.ax).toBeCloseTo(-0.8197870088565224, 6)
    expect(s.ay).toBeCloseTo(-9.161698207832098, 6)
    expect(s.a).toBeCloseTo(Math.hypot(s.ax, s.ay), 12)
  })

  it('fails on purely vertical velocity', () => {
    const vertical: KinematicState = { ...start, vx: 0, vy: -5, v: 5 }
    expect(() => flightStep(vertical, start.t, params)).toThrow(ModelDomainError)
  })

  it('fails when asked for a time before takeoff', () => {
    expect(() => flightStep(start, start.t + 1, params)).toThrow(ModelDomainError)
  })
})

describe('simulateFlightPhase', () => {
  const start: KinematicState = {
    t: 0, x: 88.642, y: 88.1416,
    vx: REF_TAKEOFF_SPEED, vy: JUMP_PUSH, v: 26.762258010996717,
    theta: 0, ax: 0, ay: 0, a: 0,
  }
  const flight = simulateFlightPhase(start, 102.15, params)
  const ys = flight.samples.map(s => s.state.y)

  it('rises, peaks once, then descends until landing', () => {
    const apex = ys.indexOf(Math.max(...ys))
    expect(apex).toBeGreaterThan(0)
    expect(apex).toBeLessThan(ys.length - 1)
    for (let i = apex + 1; i < ys.length; i++) {
      expect(ys[i]).toBeLessThan(ys[i - 1])
    }
  })

  it('lands in a finite number of steps below the clearance', () => {
    expect(flight.samples.length).toBeGreaterThan(1000)
    expect(flight.samples.length).toBeLessThan(10000)
    const { landing } = flight
    expect(landing.y).toBeLessThan(hillAltitude(landing.x) + params.landingClearance)
  })

  it('resolves each step against the velocity it started with', () => {
    expect(flight.samples[0]?.forceAngle).toBeCloseTo(0.10487043846796067, 10)
    for (let i = 1; i < flight.samples.length; i++) {
      expect(flight.samples[i].forceAngle).toBe(flight.samples[i - 1].state.theta)
    }
  })

  it('keeps every recorded sample above the clearance', () => {
    for (const s of flight.samples) {
      expect(s.state.y).toBeGreaterThanOrEqual(s.hillAltitude + params.landingClearance)
      expect(s.slopeDistance).toBe(102.15)
      expect(s.phase).toBe('flight')
    }
  })
})

// ─── Full Run ────────────────────────────────────────────────────────────────

describe('simulateJump — Whistler run', () => {
  const { samples, result } = simulateJump(params)

  it('reproduces the recorded takeoff speed and distance', () => {
    expect(relativeError(result.takeoffSpeed, REF_TAKEOFF_SPEED)).toBeLessThan(1e-3)
    expect(relativeError(result.finalDistance, REF_DISTANCE)).toBeLessThan(1e-3)
  })

  it('reports the summary fields', () => {
    expect(result.mass).toBeCloseTo(70.22, 12)
    expect(result.height).toBe(1.8)
    expect(result.startPosition).toBe(6.25)
    expect(result.landing.x).toBeCloseTo(205.019, 1)
    expect(result.flightTime).toBeCloseTo(4.534, 2)
  })

  it('records both phases in order, landing step excluded', () => {
    expect(Math.abs(result.trackSteps - REF_TRACK_STEPS)).toBeLessThanOrEqual(1)
    expect(Math.abs(result.flightSteps - REF_FLIGHT_STEPS)).toBeLessThanOrEqual(2)
    expect(samples).toHaveLength(result.trackSteps + result.flightSteps)
    expect(samples[result.trackSteps - 1]?.phase).toBe('track')
    expect(samples[result.trackSteps]?.phase).toBe('flight')
    expect(samples[samples.length - 1].state.t).toBeLessThan(result.landing.t)
  })

  it('keeps speed and acceleration magnitudes consistent', () => {
    for (const { state: s } of samples) {
      expect(s.v).toBeCloseTo(Math.hypot(s.vx, s.vy), 9)
      expect(s.a).toBeCloseTo(Math.hypot(s.ax, s.ay), 9)
    }
  })

  it('records theta as the direction of the sampled velocity', () => {
    for (const { state: s } of samples) {
      expect(Math.abs(s.theta - Math.atan2(s.vy, s.vx))).toBeLessThan(1e-12)
    }
  })

  it('records the slope angle as the force angle on track', () => {
    for (const s of samples.slice(0, result.trackSteps)) {
      expect(s.forceAngle).toBe(s.state.theta)
    }
  })

  it('carries the takeoff slope-distance through the flight', () => {
    const exitDistance = samples[result.trackSteps - 1].slopeDistance
    const flight = samples.slice(result.trackSteps)
    expect(flight.every(s => s.slopeDistance === exitDistance)).toBe(true)
  })

  it('is deterministic', () => {
    const again = simulateJump(params)
    expect(again.result).toEqual(result)
    expect(again.samples).toEqual(samples)
  })

  it('streams the same samples it returns', () => {
    const seen: TrajectorySample[] = []
    const run = simulateJump(params, {}, s => seen.push(s))
    expect(seen).toEqual(run.samples)
  })
})

describe('simulateJump — variants', () => {
  it('atan2 direction agrees with atan while vx stays positive', () => {
    const { result } = simulateJump(params, { direction: 'atan2' })
    expect(relativeError(result.finalDistance, REF_DISTANCE)).toBeLessThan(1e-6)
  })

  it('legacy altitude policy changes nothing inside the profile', () => {
    const { result } = simulateJump(params, { altitudePolicy: 'legacy-zero' })
    expect(result.finalDistance).toBe(simulateJump(params).result.finalDistance)
  })

  it('ramp takeoff angle sends the skier down the knoll', () => {
    const { result } = simulateJump(params, { takeoffAngle: 'ramp' })
    expect(result.finalDistance).toBeCloseTo(29.78, 1)
  })

  it('first-order position updates shift the result slightly', () => {
    const { result } = simulateJump(params, {
      track: { position: 'first-order' },
      flight: { position: 'first-order' },
    })
    expect(result.takeoffSpeed).toBeCloseTo(26.6176, 3)
    expect(result.finalDistance).toBeCloseTo(134.42, 1)
  })

  it('starting higher flies further', () => {
    const low = simulateJump(makeSkierParameters({ startPosition: 9.5 })).result
    const high = simulateJump(makeSkierParameters({ startPosition: 3 })).result
    expect(high.finalDistance).toBeGreaterThan(low.finalDistance)
    expect(high.takeoffSpeed).toBeGreaterThan(low.takeoffSpeed)
  })
})

describe('simulateJump — failures', () => {
  it('stops at the step budget', () => {
    try {
      simulateJump(params, { maxSteps: 100 })
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(ModelDomainError)
      if (err instanceof ModelDomainError) expect(err.quantity).toBe('steps')
    }
  })

  it('leaves the model when friction holds the skier back', () => {
    const sticky = makeSkierParameters({ frictionCoeff: 0.8 })
    expect(() => simulateJump(sticky)).toThrow(ModelDomainError)
  })
})

describe('jumpDistance', () => {
  it('measures from the takeoff point', () => {
    expect(jumpDistance(88.64, 88.15)).toBe(0)
    expect(jumpDistance(91.64, 84.15)).toBeCloseTo(5, 10)
  })

  it('defaults are the calibrated choices', () => {
    expect(DEFAULT_OPTIONS.direction).toBe('atan')
    expect(DEFAULT_OPTIONS.takeoffAngle).toBe('lip')
  })
})
