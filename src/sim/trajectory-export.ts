/**
 * Trajectory export — one tab-separated row per recorded sample.
 *
 * Six decimals per value.  The default file name has an .xls extension;
 * the content is plain TSV.  `velAngle` is the angle the step's forces
 * were resolved against.
 */

import { writeFile } from 'node:fs/promises'
import type { TrajectorySample } from '../jump/sim-state.ts'

export const DEFAULT_EXPORT_FILE = 'SkiJumpResultsData.xls'

export const EXPORT_COLUMNS = [
  't', 'slopeDist', 'hillAltitude', 'posX', 'posY',
  'velocity', 'velX', 'velY',
  'acceleration', 'accX', 'accY', 'velAngle',
] as const

function fixed(n: number): string {
  return n.toFixed(6)
}

export function exportRow(sample: TrajectorySample): string {
  const s = sample.state
  return [
    s.t, sample.slopeDistance, sample.hillAltitude, s.x, s.y,
    s.v, s.vx, s.vy,
    s.a, s.ax, s.ay, sample.forceAngle,
  ].map(fixed).join('\t')
}

/** Header line plus one line per sample, newline-terminated. */
export function formatTrajectoryTable(samples: readonly TrajectorySample[]): string {
  const lines = [EXPORT_COLUMNS.join('\t'), ...samples.map(exportRow)]
  return lines.join('\n') + '\n'
}

export async function writeTrajectoryTable(path: string, samples: readonly TrajectorySample[]): Promise<void> {
  await writeFile(path, formatTrajectoryTable(samples), 'utf8')
}
