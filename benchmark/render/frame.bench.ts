/**
 * Frame Rendering Benchmarks
 *
 * Buffer fill, block drawing and ANSI encoding of a full frame.
 */

import { Color, FrameBuffer, drawBlock, drawSparkline, solveLayout } from '@tiledash/core'
import type { BenchmarkSuite } from '../lib/types.js'
import { nestedLayout } from '../lib/layouts.js'

export const suite: BenchmarkSuite = {
  name: 'Frame Rendering',
  category: 'render',

  add(bench, { sizes }) {
    const tree = nestedLayout(2, 2)
    const samples = Array.from({ length: 300 }, (_, i) => Math.sin(i / 10) + 1)

    for (const [cols, rows] of sizes) {
      const area = { row: 1, col: 1, width: cols, height: rows }
      const label = `${cols}x${rows}`

      bench.add(`draw blocks ${label}`, () => {
        const buf = new FrameBuffer(cols, rows)
        for (const { widget, rect } of solveLayout(tree, area)) {
          const inner = drawBlock(buf, rect, { title: `w${widget}`, focused: widget === 0 })
          drawSparkline(buf, inner, samples, Color.lightGreen)
        }
      })

      const filled = new FrameBuffer(cols, rows)
      for (const { rect } of solveLayout(tree, area)) drawBlock(filled, rect, { title: 'panel' })

      bench.add(`encode ${label}`, () => {
        filled.encode()
      })
    }
  },
}
