import { Bench } from 'tinybench'
import { describe, it, expect } from 'vitest'
import { suite as solver } from '../layout/solver.bench.js'
import { suite as frame } from '../render/frame.bench.js'

function registered(add: (bench: Bench) => void): Bench {
  const bench = new Bench({ time: 0, iterations: 1, warmup: false })
  add(bench)
  return bench
}

describe('benchmark suites', () => {
  it('registers solver tasks per size', () => {
    const bench = registered((b) => solver.add(b, { sizes: [[20, 10]] }))
    expect(bench.tasks.map((t) => t.name)).toEqual([
      'solveConstraints 5 siblings',
      'solveConstraints overflow clamp',
      'solveLayout depth 2 20x10',
      'solveLayout depth 4 20x10',
    ])
  })

  it('registers drawing and encoding tasks per size', () => {
    const bench = registered((b) => frame.add(b, { sizes: [[20, 10], [40, 12]] }))
    expect(bench.tasks.map((t) => t.name)).toEqual([
      'draw blocks 20x10',
      'encode 20x10',
      'draw blocks 40x12',
      'encode 40x12',
    ])
  })

  it('runs every task without error', async () => {
    for (const suite of [solver, frame]) {
      const bench = registered((b) => suite.add(b, { sizes: [[20, 10]] }))
      await bench.run()
      for (const task of bench.tasks) expect(task.result?.error).toBeUndefined()
    }
  })
})
