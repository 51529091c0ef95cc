/**
 * packages/core/src/testing/ui.ts — UserInterface factory and queue helpers for tests.
 */

import type { UiConfig } from "../app/types.js";
import { UserInterface } from "../app/userInterface.js";
import type { UiEvent } from "../events.js";
import type { Vec2 } from "../layout/types.js";

export type TestUiOptions = Readonly<{
  /** Defaults to true so dev warnings land in `warnings`. */
  devMode?: boolean;
  visualDebug?: boolean;
  clipInflation?: number;
}>;

export type TestUi = Readonly<{
  ui: UserInterface;
  warnings: string[];
}>;

export function createTestUi(opts: TestUiOptions = {}): TestUi {
  const warnings: string[] = [];
  const config: UiConfig = {
    devMode: opts.devMode ?? true,
    warn: (message) => {
      warnings.push(message);
    },
    ...(opts.visualDebug === undefined ? {} : { visualDebug: opts.visualDebug }),
    ...(opts.clipInflation === undefined ? {} : { clipInflation: opts.clipInflation }),
  };
  return { ui: new UserInterface(config), warnings };
}

/** Run one update and one draw, the part of a frame hit testing depends on. */
export function runFrame(ui: UserInterface, screen: Vec2, dt = 0): void {
  ui.update(screen, dt);
  ui.draw();
}

/** Poll until the queue is empty; returns the dispatched events in order. */
export function drainUiEvents(ui: UserInterface, limit = 1000): UiEvent[] {
  const out: UiEvent[] = [];
  for (let i = 0; i < limit; i++) {
    const event = ui.pollUiEvent();
    if (event === null) return out;
    out.push(event);
  }
  throw new Error(`drainUiEvents: queue still not empty after ${limit} polls`);
}
