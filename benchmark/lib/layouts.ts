/**
 * Shared benchmark fixtures
 */

import { Constraint, type LayoutNode } from '@tiledash/core'

/** Standard terminal sizes, as [columns, rows] */
export const STANDARD_SIZES: Array<[number, number]> = [
  [80, 24],
  [160, 48],
  [320, 96],
]

/**
 * A layout tree `depth` levels deep, alternating direction, each branch holding
 * one fixed, one percentage and `fanout` flex children. Leaves are numbered.
 */
export function nestedLayout(depth: number, fanout: number): LayoutNode<number> {
  let next = 0
  const build = (level: number): LayoutNode<number> => {
    if (level === depth) return { type: 'widget', widget: next++ }
    return {
      type: 'layout',
      direction: level % 2 === 0 ? 'horizontal' : 'vertical',
      children: [
        { node: build(level + 1), constraint: Constraint.fixed(3) },
        { node: build(level + 1), constraint: Constraint.percentage(20) },
        ...Array.from({ length: fanout }, (_, i) => ({ node: build(level + 1), constraint: Constraint.flex(i + 1) })),
      ],
    }
  }
  return build(0)
}
