/**
 * Ski Jump Simulator — command-line entry point.
 *
 * Runs the 2011 Whistler jump (or one with overridden parameters), prints the
 * summary and writes the per-step data table.
 */

import yargs from 'yargs'
import { hideBin } from 'yargs/helpers'
import { DEFAULT_SKIER } from './jump/index.ts'
import type { SkierInputs, SimulationOptions } from './jump/index.ts'
import { SimulationRunner, sweepStartPositions } from './sim/sim-runner.ts'
import { DEFAULT_EXPORT_FILE, writeTrajectoryTable } from './sim/trajectory-export.ts'
import { formatSummary } from './ui/readout.ts'

async function main(): Promise<void> {
  const argv = await yargs(hideBin(process.argv))
    .scriptName('ski-jump')
    .usage('Simulate a ski jump with Euler integration and export the trajectory')
    .option('start', { type: 'number', default: DEFAULT_SKIER.startPosition, describe: 'Start position along the in-run [m]' })
    .option('height', { type: 'number', default: DEFAULT_SKIER.height, describe: 'Skier height [m]' })
    .option('body-mass', { type: 'number', default: DEFAULT_SKIER.bodyMass, describe: 'Skier body mass [kg]' })
    .option('friction', { type: 'number', default: DEFAULT_SKIER.frictionCoeff, describe: 'Ski–snow friction coefficient' })
    .option('air-density', { type: 'number', default: DEFAULT_SKIER.airDensity, describe: 'Air density [kg/m³]' })
    .option('dt', { type: 'number', default: DEFAULT_SKIER.dt, describe: 'Integration step [s]' })
    .option('direction', { choices: ['atan', 'atan2'] as const, default: 'atan' as const, describe: 'Flight direction strategy' })
    .option('takeoff', { choices: ['lip', 'ramp'] as const, default: 'lip' as const, describe: 'Angle the takeoff push is resolved against' })
    .option('altitude', { choices: ['strict', 'legacy-zero'] as const, default: 'strict' as const, describe: 'Behaviour right of the hill profile' })
    .option('sweep', { type: 'number', array: true, describe: 'Only print results for each of these start positions' })
    .option('out', { type: 'string', default: DEFAULT_EXPORT_FILE, describe: 'Trajectory table path' })
    .option('export', { type: 'boolean', default: true, describe: 'Write the trajectory table (--no-export to skip)' })
    .example('$0 --start 9.5', 'Start higher up the in-run')
    .example('$0 --direction atan2 --takeoff ramp --no-export', 'Compare the corrected variants')
    .strict()
    .help()
    .parse()

  const inputs: Partial<SkierInputs> = {
    startPosition: argv.start,
    height: argv.height,
    bodyMass: argv['body-mass'],
    frictionCoeff: argv.friction,
    airDensity: argv['air-density'],
    dt: argv.dt,
  }
  const options: Partial<SimulationOptions> = {
    direction: argv.direction,
    takeoffAngle: argv.takeoff,
    altitudePolicy: argv.altitude,
  }

  if (argv.sweep && argv.sweep.length > 0) {
    const results = sweepStartPositions(argv.sweep, inputs, options)
    console.log('start [m]\ttakeoff [m/s]\tdistance [m]')
    for (const r of results) {
      console.log(`${r.startPosition}\t${r.takeoffSpeed.toFixed(2)}\t${r.finalDistance.toFixed(2)}`)
    }
    return
  }

  const runner = new SimulationRunner(inputs, options)
  const trajectory = runner.run()
  console.log(formatSummary(trajectory.result, runner.options.hill.name))

  if (argv.export) {
    await writeTrajectoryTable(argv.out, trajectory.samples)
    console.log(`Wrote ${trajectory.samples.length} samples to ${argv.out}`)
  }
}

main().catch((err: unknown) => {
  console.error('Simulation failed:', err instanceof Error ? err.message : err)
  process.exit(1)
})
