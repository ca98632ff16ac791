/**
 * Readout text — run summary and trajectory tracker.
 *
 * Values are rounded to two decimals, time to three.
 */

import type { SimulationResult, TrajectorySample } from '../jump/sim-state.ts'

export interface ReadoutLine {
  label: string
  value: string
  unit: string
}

function round(n: number, digits: number): string {
  const f = 10 ** digits
  return String(Math.round(n * f) / f)
}

function render(lines: readonly ReadoutLine[]): string {
  return lines
    .map(l => (l.unit ? `${l.label}: ${l.value} ${l.unit}` : `${l.label}: ${l.value}`))
    .join('\n')
}

export function summaryLines(result: SimulationResult, hillName: string): ReadoutLine[] {
  return [
    { label: 'Hill Location', value: hillName, unit: '' },
    { label: 'Skier mass', value: String(result.mass), unit: 'kg' },
    { label: 'Skier height', value: String(result.height), unit: 'm' },
    { label: 'Start position', value: String(result.startPosition), unit: 'm' },
    { label: 'Takeoff speed', value: round(result.takeoffSpeed, 2), unit: 'm/s' },
    { label: 'Final Distance', value: round(result.finalDistance, 2), unit: 'm' },
  ]
}

export function formatSummary(result: SimulationResult, hillName: string): string {
  return render(summaryLines(result, hillName))
}

/** Values at one point of the trajectory, as shown while tracking. */
export function trackerLines(sample: TrajectorySample): ReadoutLine[] {
  const s = sample.state
  return [
    { label: 'Time', value: round(s.t, 3), unit: 's' },
    { label: 'X Position', value: round(s.x, 2), unit: 'm' },
    { label: 'Y Position', value: round(s.y, 2), unit: 'm' },
    { label: 'X Velocity', value: round(s.vx, 2), unit: 'm/s' },
    { label: 'Y Velocity', value: round(s.vy, 2), unit: 'm/s' },
    { label: 'Velocity', value: round(s.v, 2), unit: 'm/s' },
    { label: 'Velocity Angle', value: round(s.theta, 2), unit: 'rad' },
    { label: 'X Acceleration', value: round(s.ax, 2), unit: 'm/s^2' },
    { label: 'Y Acceleration', value: round(s.ay, 2), unit: 'm/s^2' },
    { label: 'Acceleration', value: round(s.a, 2), unit: 'm/s^2' },
  ]
}

export function formatTracker(sample: TrajectorySample): string {
  return render(trackerLines(sample))
}
