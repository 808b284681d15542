import { DeliveryFailedError, formatError } from "../shared/errors";
import type { DeliveryOutcome, LogKind } from "../shared/types";

export const MESSAGE_LIMIT = 1900;
export const ELLIPSIS = "...";
const ERROR_BODY_LIMIT = 200;

export type WebhookLog = {
  appendLog: (kind: LogKind, text: string) => Promise<void>;
};

export type DispatcherOptions = {
  timeoutMs: number;
  log: WebhookLog;
  fetchImpl?: typeof fetch;
};

const isHighSurrogate = (code: number) => code >= 0xd800 && code <= 0xdbff;

/** Caps `text` at `limit` characters, the ellipsis included. Never splits a surrogate pair. */
export const truncateMessage = (text: string, limit = MESSAGE_LIMIT) => {
  if (text.length <= limit) {
    return { text, truncated: false };
  }
  let end = limit - ELLIPSIS.length;
  if (end > 0 && isHighSurrogate(text.charCodeAt(end - 1))) {
    end -= 1;
  }
  return { text: `${text.slice(0, end)}${ELLIPSIS}`, truncated: true };
};

const flatten = (text: string) => text.replace(/\s+/g, " ").trim();

export class WebhookDispatcher {
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly url: string,
    private readonly options: DispatcherOptions
  ) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async dispatch(message: string): Promise<DeliveryOutcome> {
    if (!message) {
      return { delivered: false, reason: "empty" };
    }
    const { text, truncated } = truncateMessage(message);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);
    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ content: text }),
        signal: controller.signal
      });
    } catch (error: unknown) {
      await this.options.log.appendLog("webhook", `status=error error=${flatten(formatError(error))}`);
      throw new DeliveryFailedError(`Webhook request failed: ${formatError(error)}`, null);
    } finally {
      clearTimeout(timeout);
    }

    if (response.status >= 400) {
      const body = await response.text().catch(() => "");
      const snippet = flatten(body).slice(0, ERROR_BODY_LIMIT);
      await this.options.log.appendLog("webhook", `status=${response.status} error=${snippet}`);
      throw new DeliveryFailedError(`Webhook failed: ${response.status} ${snippet}`.trim(), response.status);
    }

    await this.options.log.appendLog("webhook", `status=${response.status} ok chars=${text.length}`);
    return { delivered: true, status: response.status, length: text.length, truncated };
  }
}
