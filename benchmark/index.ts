/**
 * Benchmark entry point
 *
 * Usage:
 *   npm run bench                         # Run both suites
 *   npm run bench -- --category layout
 *   npm run bench -- --time 200 --no-warmup
 */

import { Bench } from 'tinybench'
import { suite as solver } from './layout/solver.bench.js'
import { suite as frame } from './render/frame.bench.js'
import { STANDARD_SIZES } from './lib/layouts.js'
import type { BenchmarkSuite } from './lib/types.js'

const SUITES: BenchmarkSuite[] = [solver, frame]

interface RunOptions {
  time: number
  warmup: boolean
  category?: string
}

function parseArgs(args: string[]): RunOptions {
  const options: RunOptions = { time: 1000, warmup: true }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    const value = args[i + 1]

    if (arg === '--category' && value) {
      options.category = value
      i++
    } else if (arg === '--time' && value) {
      options.time = parseInt(value, 10)
      i++
    } else if (arg === '--no-warmup') {
      options.warmup = false
    } else if (arg === '--help' || arg === '-h') {
      console.log('Usage: npm run bench -- [--category layout|render] [--time <ms>] [--no-warmup]')
      process.exit(0)
    }
  }

  return options
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2))
  const selected = SUITES.filter((s) => !options.category || s.category === options.category)
  if (selected.length === 0) throw new Error(`No benchmark suite in category "${options.category}"`)

  for (const suite of selected) {
    const bench = new Bench({ time: options.time, warmup: options.warmup })
    suite.add(bench, { sizes: STANDARD_SIZES })
    await bench.run()

    console.log(`\n[${suite.category}] ${suite.name}`)
    console.table(bench.table())
  }
}

main().catch((err) => {
  console.error('Benchmark failed:', err)
  process.exit(1)
})
