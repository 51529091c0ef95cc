/**
 * packages/core/src/app/types.ts — UserInterface configuration.
 */

export type UiWarnSink = (message: string) => void;

export type UiConfig = Readonly<{
  /** Emit deduplicated developer warnings through `warn`. Default false. */
  devMode?: boolean;
  /** Warning sink. Default console.warn. */
  warn?: UiWarnSink;
  /** Outline the picked node after each draw pass. Default false. */
  visualDebug?: boolean;
  /**
   * Per-side growth of each node's clip rect, so points on the exact float
   * edge of a node are not clipped away. Default 0.9.
   */
  clipInflation?: number;
}>;

/** Resolved configuration with defaults applied. */
export type ResolvedUiConfig = Readonly<{
  devMode: boolean;
  warn: UiWarnSink;
  visualDebug: boolean;
  clipInflation: number;
}>;
