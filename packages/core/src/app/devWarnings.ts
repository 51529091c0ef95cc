/**
 * packages/core/src/app/devWarnings.ts — Deduplicated developer warnings.
 *
 * Warnings only fire in dev mode and only once per key, so a problem that
 * repeats every frame produces a single line.
 */

import { formatHandle } from "../arena/handle.js";
import type { NodeHandle } from "../widgets/types.js";
import type { Widget } from "../widgets/widget.js";
import type { UiWarnSink } from "./types.js";

export type DevWarningArea = "layout" | "capture" | "events";

export type DevWarningContext = Readonly<{
  devMode: boolean;
  warned: Set<string>;
  warn: UiWarnSink;
}>;

export function describeWidget(handle: NodeHandle, widget: Widget | null): string {
  const name = widget !== null && widget.name.length > 0 ? `"${widget.name}"` : "node";
  return `${name}${formatHandle(handle)}`;
}

export function warnDevIssue(
  ctx: DevWarningContext,
  area: DevWarningArea,
  key: string,
  detail: string,
): void {
  if (!ctx.devMode) return;
  const dedupeKey = `${area}:${key}`;
  if (ctx.warned.has(dedupeKey)) return;
  ctx.warned.add(dedupeKey);
  ctx.warn(`[gantry][${area}] ${detail}`);
}
