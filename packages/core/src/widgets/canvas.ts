/**
 * packages/core/src/widgets/canvas.ts — Plain container control.
 *
 * Canvas relies on every default: children are measured against the full
 * available size and arranged over the full final size. The root of every
 * UserInterface is a Canvas sized to the screen.
 */

import type { Control } from "./types.js";
import { Widget, type WidgetProps } from "./widget.js";

export class Canvas implements Control {
  readonly widget: Widget;

  constructor(props: WidgetProps = {}) {
    this.widget = new Widget(props);
  }
}
