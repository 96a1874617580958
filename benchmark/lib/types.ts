/**
 * Benchmark suite contract
 */

import type { Bench } from 'tinybench'

export type SuiteCategory = 'layout' | 'render'

export interface BenchOptions {
  /** Terminal sizes to measure at, as [columns, rows] */
  sizes: Array<[number, number]>
}

export interface BenchmarkSuite {
  name: string
  category: SuiteCategory
  /** Register the suite's tasks on a bench the caller runs. */
  add(bench: Bench, options: BenchOptions): void
}
