import { handlerUnavailable } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { RouteParams } from "../router/types.js";
import { isHandlerResult, type ExternalHandler, type HandlerRegistry, type HandlerResult } from "./types.js";

export interface HttpHandlerOptions {
  baseUrl: string;
  timeoutMs: number;
}

/**
 * Handler served over HTTP.
 * POSTs the params as JSON to `${baseUrl}/${intent}` and expects a JSON object back.
 * A body carrying a string `error` field counts as a failed call.
 */
export class HttpHandler implements ExternalHandler {
  private readonly url: string;

  constructor(
    private readonly intent: string,
    private readonly options: HttpHandlerOptions
  ) {
    this.url = `${options.baseUrl.replace(/\/+$/, "")}/${encodeURIComponent(intent)}`;
  }

  async execute(params: Readonly<RouteParams>): Promise<HandlerResult> {
    const startTime = Date.now();
    let body: unknown;

    try {
      const response = await fetch(this.url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(params),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });

      if (!response.ok) {
        throw new Error(`HTTP ${response.status} from ${this.url}`);
      }

      body = await response.json();
    } catch (err) {
      logger.error("Handler request failed", {
        stage: "handler",
        intent: this.intent,
        url: this.url,
        latencyMs: Date.now() - startTime,
        error: err,
      });
      throw handlerUnavailable(this.intent, err);
    }

    if (!isHandlerResult(body)) {
      throw handlerUnavailable(this.intent, new Error("Handler response is not a JSON object"));
    }

    // Data services report lookup and calculation failures as { error } with a 200.
    const reported = body["error"];
    if (typeof reported === "string") {
      logger.warn("Handler reported an error", {
        stage: "handler",
        intent: this.intent,
        reportedError: reported,
      });
      throw handlerUnavailable(this.intent, new Error(reported));
    }

    logger.debug("Handler responded", {
      stage: "handler",
      intent: this.intent,
      latencyMs: Date.now() - startTime,
    });

    return body;
  }
}

/** One HttpHandler per intent, all under the same base URL */
export function createHttpHandlers(intents: readonly string[], options: HttpHandlerOptions): HandlerRegistry {
  return new Map(intents.map((intent) => [intent, new HttpHandler(intent, options)]));
}
