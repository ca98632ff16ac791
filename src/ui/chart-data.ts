/**
 * Chart data generation — hill outline and trajectory as scatter series.
 *
 * Produces Chart.js configurations the display layer can hand straight to
 * `new Chart(canvas, config)`.  Trajectory points are coloured by speed.
 */

import type { ChartConfiguration, ChartDataset, ScatterDataPoint } from 'chart.js'
import type { HillGeometry } from '../jump/hill-profile.ts'
import type { TrajectorySample, JumpTrajectory, Phase } from '../jump/sim-state.ts'
import { WHISTLER_HS140, hillOutline } from '../jump/hill-profile.ts'

// ─── Speed Color Map ─────────────────────────────────────────────────────────

/**
 * Map speed to a blue (slow) → red (fast) hue.
 */
export function speedToColor(v: number, minV: number, maxV: number): string {
  const span = maxV - minV
  const t = span > 0 ? Math.max(0, Math.min(1, (v - minV) / span)) : 0
  const hue = 240 * (1 - t)
  return `hsl(${hue}, 90%, 50%)`
}

// ─── Data Point ──────────────────────────────────────────────────────────────

export interface TrajectoryPoint {
  x: number
  y: number
  t: number
  v: number
  phase: Phase
  color: string
}

/** Slowest and fastest speed over a run.  Empty runs give ±Infinity. */
export function speedRange(samples: readonly TrajectorySample[]): { min: number; max: number } {
  let min = Infinity
  let max = -Infinity
  for (const { state } of samples) {
    if (state.v < min) min = state.v
    if (state.v > max) max = state.v
  }
  return { min, max }
}

export function trajectoryPoints(samples: readonly TrajectorySample[]): TrajectoryPoint[] {
  if (samples.length === 0) return []
  const { min: minV, max: maxV } = speedRange(samples)
  return samples.map(s => ({
    x: s.state.x,
    y: s.state.y,
    t: s.state.t,
    v: s.state.v,
    phase: s.phase,
    color: speedToColor(s.state.v, minV, maxV),
  }))
}

// ─── Tracker ─────────────────────────────────────────────────────────────────

/**
 * Index of the first sample at or beyond horizontal position `x`.
 * Falls back to the last sample when the query is past the landing, and
 * returns -1 for an empty trajectory.
 */
export function trackIndexAt(samples: readonly TrajectorySample[], x: number): number {
  if (samples.length === 0) return -1
  const i = samples.findIndex(s => s.state.x >= x)
  return i === -1 ? samples.length - 1 : i
}

// ─── Chart Configuration ─────────────────────────────────────────────────────

const HILL_COLOR = '#e8eef2'
const SKY_GRID = 'rgba(255,255,255,0.15)'

export interface JumpChartOptions {
  hill: HillGeometry
  /** Outline sampling step [m] */
  outlineStep: number
}

const DEFAULT_CHART: JumpChartOptions = {
  hill: WHISTLER_HS140,
  outlineStep: 0.5,
}

function toXY(points: readonly { x: number; y: number }[]): ScatterDataPoint[] {
  return points.map(p => ({ x: p.x, y: p.y }))
}

/**
 * Scatter configuration with three series: hill outline, trajectory,
 * and the landing point.
 */
export function jumpChartConfig(
  trajectory: JumpTrajectory,
  config: Partial<JumpChartOptions> = {},
): ChartConfiguration<'scatter'> {
  const cfg = { ...DEFAULT_CHART, ...config }
  const points = trajectoryPoints(trajectory.samples)
  const { landing, finalDistance } = trajectory.result

  const hillSeries: ChartDataset<'scatter'> = {
    label: `${cfg.hill.name} hill`,
    data: toXY(hillOutline(cfg.hill, cfg.outlineStep)),
    showLine: true,
    pointRadius: 0,
    borderColor: HILL_COLOR,
    backgroundColor: HILL_COLOR,
    borderWidth: 1.5,
    fill: 'origin',
  }

  const pathSeries: ChartDataset<'scatter'> = {
    label: 'Trajectory',
    data: toXY(points),
    pointBackgroundColor: points.map(p => p.color),
    pointBorderColor: points.map(p => p.color),
    pointRadius: 1,
    showLine: false,
  }

  const landingSeries: ChartDataset<'scatter'> = {
    label: `Landing (${finalDistance.toFixed(2)} m)`,
    data: [{ x: landing.x, y: landing.y }],
    pointRadius: 4,
    pointBackgroundColor: '#ff3030',
    showLine: false,
  }

  return {
    type: 'scatter',
    data: { datasets: [hillSeries, pathSeries, landingSeries] },
    options: {
      animation: false,
      plugins: {
        legend: { display: true },
        title: { display: true, text: 'Ski jump trajectory' },
      },
      scales: {
        x: { type: 'linear', title: { display: true, text: 'x (m)' }, grid: { color: SKY_GRID } },
        y: { type: 'linear', title: { display: true, text: 'y (m)' }, grid: { color: SKY_GRID } },
      },
    },
  }
}
