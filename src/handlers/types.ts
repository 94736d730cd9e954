// ============================================
// External handler contracts
// ============================================

import type { RouteParams } from "../router/types.js";

/** JSON value returned by a data service */
export type HandlerValue =
  | string
  | number
  | boolean
  | null
  | HandlerValue[]
  | { [key: string]: HandlerValue };

/** Structured result of one handler call */
export type HandlerResult = { [key: string]: HandlerValue };

/**
 * A data service behind one intent (quote lookup, calculator, ...).
 * Rejects with HANDLER_UNAVAILABLE on failure or timeout.
 */
export interface ExternalHandler {
  execute(params: Readonly<RouteParams>): Promise<HandlerResult>;
}

/** Intent → handler */
export type HandlerRegistry = ReadonlyMap<string, ExternalHandler>;

export function isHandlerResult(value: unknown): value is HandlerResult {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
