/**
 * Constraint Solver Benchmarks
 *
 * Per-frame cost of turning layout trees into rects.
 */

import { Constraint, solveConstraints, solveLayout } from '@tiledash/core'
import type { BenchmarkSuite } from '../lib/types.js'
import { nestedLayout } from '../lib/layouts.js'

export const suite: BenchmarkSuite = {
  name: 'Constraint Solver',
  category: 'layout',

  add(bench, { sizes }) {
    const siblings = [Constraint.fixed(10), Constraint.percentage(25), Constraint.flex(1), Constraint.flex(2), Constraint.flex(1)]
    const overflowing = [Constraint.percentage(70), Constraint.percentage(50), Constraint.fixed(40)]

    bench.add('solveConstraints 5 siblings', () => {
      solveConstraints(siblings, 200)
    })

    bench.add('solveConstraints overflow clamp', () => {
      solveConstraints(overflowing, 100)
    })

    const shallow = nestedLayout(2, 2)
    const deep = nestedLayout(4, 2)

    for (const [cols, rows] of sizes) {
      const area = { row: 1, col: 1, width: cols, height: rows }
      const label = `${cols}x${rows}`

      bench.add(`solveLayout depth 2 ${label}`, () => {
        solveLayout(shallow, area)
      })

      bench.add(`solveLayout depth 4 ${label}`, () => {
        solveLayout(deep, area)
      })
    }
  },
}
