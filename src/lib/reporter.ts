/**
 * Vetting Bot — src/lib/reporter.ts
 * WHAT: Single sink for fetcher and publisher diagnostics: log + ops webhook + actor notice.
 * WHY: Fetchers never throw; they hand the failure here and return a sentinel.
 * FLOWS: report(event, actor?) → logger[level] → POST webhook (best effort) → actor.notify(userMessage)
 * DOCS:
 *  - Discord webhooks: https://discord.com/developers/docs/resources/webhook#execute-webhook
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Logger } from "./logger.js";
import type { ErrorKind } from "./errors.js";
import { postJson } from "./http.js";

export type Severity = "info" | "warning" | "error";

export type DiagnosticEvent = {
  severity: Severity;
  kind: ErrorKind;
  message: string;
  /** Shown to the invoking user; a generic message is used when absent */
  userMessage?: string;
};

/**
 * The invoking user, when there is one. Usually backed by an interaction's
 * ephemeral reply.
 */
export type ActorNotifier = {
  notify(content: string): Promise<void>;
};

export interface DiagnosticReporter {
  /** Never rejects. */
  report(event: DiagnosticEvent, actor?: ActorNotifier): Promise<void>;
}

export const GENERIC_USER_MESSAGE = "⚠️ An error has occurred, please try again.";

const WEBHOOK_TIMEOUT_MS = 10_000;

export type ReporterOptions = {
  logger: Pick<Logger, "info" | "warn" | "error">;
  /** Empty string disables the webhook */
  webhookUrl: string;
};

export function createReporter({ logger, webhookUrl }: ReporterOptions): DiagnosticReporter {
  return {
    async report(event, actor) {
      const payload = { evt: "diagnostic", kind: event.kind };
      if (event.severity === "info") logger.info(payload, event.message);
      else if (event.severity === "warning") logger.warn(payload, event.message);
      else logger.error(payload, event.message);

      if (webhookUrl) {
        try {
          const ok = await postJson(
            webhookUrl,
            { content: `⚠️ ${event.severity.toUpperCase()}: ${event.message}` },
            WEBHOOK_TIMEOUT_MS
          );
          if (!ok) {
            logger.warn({ evt: "diagnostic_webhook_rejected" }, "Diagnostic webhook rejected the message");
          }
        } catch (err) {
          logger.warn({ evt: "diagnostic_webhook_fail", err }, "Failed to send error webhook");
        }
      }

      if (actor) {
        try {
          await actor.notify(event.userMessage ?? GENERIC_USER_MESSAGE);
        } catch (err) {
          logger.warn({ evt: "diagnostic_notify_fail", err }, "Failed to send ephemeral error message");
        }
      }
    },
  };
}
