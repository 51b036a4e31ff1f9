/**
 * Runner type definitions
 */

export type RunMode = "once" | "forever";

/**
 * Result of one reconcile + populate cycle
 */
export type RunCycleResult = {
  touched: number;
  attempted: number;
  succeeded: number;
  failed: number;
  itemCount: number;
};
