/**
 * packages/core/src/widgets/style.ts — Cascading property styles.
 *
 * A style is a list of named property setters with an optional base style.
 * Application walks the base chain first, so a derived style's setters
 * override its base's for the same property name.
 */

import type { Control } from "./types.js";

export type StyleSetter = Readonly<{ name: string; value: unknown }>;

export type Style = Readonly<{
  base: Style | null;
  setters: readonly StyleSetter[];
}>;

export type StyleInput = Readonly<{
  base?: Style | null;
  setters: readonly StyleSetter[];
}>;

export function createStyle(input: StyleInput): Style {
  return Object.freeze({
    base: input.base ?? null,
    setters: Object.freeze(input.setters.map((s) => Object.freeze({ name: s.name, value: s.value }))),
  });
}

export function setter(name: string, value: unknown): StyleSetter {
  return { name, value };
}

/**
 * Apply `style` to a control: base styles first, then record the style on the
 * widget, then every setter in list order.
 */
export function applyStyle(control: Control, style: Style): void {
  if (style.base !== null) {
    applyStyle(control, style.base);
  }
  control.widget.style = style;
  if (!control.setProperty) return;
  for (const s of style.setters) {
    control.setProperty(s.name, s.value);
  }
}

/** Base-first list of styles in the chain ending at `style`. */
export function styleChain(style: Style): readonly Style[] {
  const chain: Style[] = [];
  for (let cur: Style | null = style; cur !== null; cur = cur.base) {
    chain.push(cur);
  }
  return chain.reverse();
}
