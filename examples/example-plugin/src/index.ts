// ─────────────────────────────────────────────────────────────
// Example widget plugin: counts bus events under a topic pattern
//
// Build it and copy dist/index.js into the plugin directory
// (~/.tiledash/plugins by default). Editing the copy reloads it live.
//
// The plugin directory has no node_modules, so only types come from
// @tiledash/core: the built file has no imports at all. Drawing goes
// through the FrameBuffer the engine hands to render().
// ─────────────────────────────────────────────────────────────

import type { FrameBuffer, KeyEvent, Rect, Style, Subscription, Widget, WidgetContext, WidgetFactory } from '@tiledash/core'

/** Must match PLUGIN_ABI_VERSION of the engine loading this file. */
export const abiVersion = 1
export const widgetName = 'event-counter'

const fg = (r: number, g: number, b: number) => `\x1b[38;2;${r};${g};${b}m`

const BORDER: Style = { fg: fg(80, 80, 80) }
const BORDER_FOCUSED: Style = { fg: fg(230, 200, 60) }
const TITLE: Style = { fg: fg(220, 220, 220), bold: true }
const TOPIC: Style = { fg: fg(230, 200, 60) }
const COUNT: Style = { bold: true }

/** Border and title around `area`; returns the inside, 0-based. */
function frame(buf: FrameBuffer, area: Rect, title: string, focused: boolean) {
  const top = area.row - 1
  const left = area.col - 1
  const bottom = top + area.height - 1
  const right = left + area.width - 1
  const inside = { top: top + 1, left: left + 1, width: Math.max(0, area.width - 2), height: Math.max(0, area.height - 2) }
  if (area.width < 2 || area.height < 2) return inside

  const style = focused ? BORDER_FOCUSED : BORDER
  buf.putStr(top, left, '┌' + '─'.repeat(area.width - 2) + '┐', style)
  buf.putStr(bottom, left, '└' + '─'.repeat(area.width - 2) + '┘', style)
  for (let row = top + 1; row < bottom; row++) {
    buf.set(row, left, '│', style)
    buf.set(row, right, '│', style)
  }
  if (area.width > 4) buf.putStr(top, left + 1, title.slice(0, area.width - 4), TITLE)
  return inside
}

export class EventCounter implements Widget {
  private counts = new Map<string, number>()
  private subscription: Subscription | null = null
  private pattern: string

  constructor(private readonly ctx: WidgetContext) {
    this.pattern = typeof ctx.settings.topic === 'string' ? ctx.settings.topic : 'system.*'
  }

  count(topic: string): number {
    return this.counts.get(topic) ?? 0
  }

  get subscribed(): boolean {
    return this.subscription !== null
  }

  onMount() {
    this.subscription = this.ctx.bus.subscribe(this.pattern, ({ topic }) => {
      this.counts.set(topic, this.count(topic) + 1)
    })
  }

  onUnmount() {
    this.subscription?.dispose()
    this.subscription = null
  }

  handleInput(key: KeyEvent): boolean {
    if (key.name !== 'c' || key.ctrl) return false
    this.counts.clear()
    return true
  }

  render(buf: FrameBuffer, area: Rect, focused: boolean) {
    const inside = frame(buf, area, `Events ${this.pattern}`, focused)
    const topics = [...this.counts.keys()].sort().slice(0, inside.height)
    topics.forEach((topic, i) => {
      const row = inside.top + i
      const end = inside.left + inside.width
      const label = ` ${topic} `.slice(0, inside.width)
      const written = buf.putStr(row, inside.left, label, TOPIC)
      const room = end - inside.left - written
      if (room > 0) buf.putStr(row, inside.left + written, String(this.count(topic)).slice(0, room), COUNT)
    })
  }
}

export const factory: WidgetFactory = (ctx) => new EventCounter(ctx)
