/**
 * packages/core/src/app/config.ts — UiConfig defaults and validation.
 */

import { UiCoreError } from "../errors.js";
import type { ResolvedUiConfig, UiConfig, UiWarnSink } from "./types.js";

function defaultWarn(message: string): void {
  console.warn(message);
}

/** Default configuration values. */
export const DEFAULT_UI_CONFIG: ResolvedUiConfig = Object.freeze({
  devMode: false,
  warn: defaultWarn,
  visualDebug: false,
  clipInflation: 0.9,
});

function invalidConfig(detail: string): never {
  throw new UiCoreError("UI_INVALID_CONFIG", detail);
}

function requireBoolean(name: string, v: boolean): boolean {
  if (typeof v !== "boolean") invalidConfig(`${name} must be a boolean`);
  return v;
}

function requireNonNegativeFinite(name: string, v: number): number {
  if (typeof v !== "number" || !Number.isFinite(v) || v < 0) {
    invalidConfig(`${name} must be a finite number >= 0`);
  }
  return v;
}

function requireWarnSink(v: UiWarnSink): UiWarnSink {
  if (typeof v !== "function") invalidConfig("warn must be a function");
  return v;
}

/** Apply defaults to user-provided config, validating all values. */
export function resolveUiConfig(config: UiConfig | undefined): ResolvedUiConfig {
  if (!config) return DEFAULT_UI_CONFIG;
  return Object.freeze({
    devMode:
      config.devMode === undefined
        ? DEFAULT_UI_CONFIG.devMode
        : requireBoolean("devMode", config.devMode),
    warn: config.warn === undefined ? DEFAULT_UI_CONFIG.warn : requireWarnSink(config.warn),
    visualDebug:
      config.visualDebug === undefined
        ? DEFAULT_UI_CONFIG.visualDebug
        : requireBoolean("visualDebug", config.visualDebug),
    clipInflation:
      config.clipInflation === undefined
        ? DEFAULT_UI_CONFIG.clipInflation
        : requireNonNegativeFinite("clipInflation", config.clipInflation),
  });
}
