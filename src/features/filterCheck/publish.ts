/**
 * Vetting Bot — src/features/filterCheck/publish.ts
 * WHAT: Sends a rendered verdict to the result channel configured for the invoking guild.
 * FLOWS: result_channels[guildId] → resolve channel → send text → send chart as badge_growth.png
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { ActorNotifier, DiagnosticReporter } from "../../lib/reporter.js";
import type { RenderedVerdict } from "./render.js";

export const CHART_FILENAME = "badge_growth.png";

export type MessageTarget = {
  send(payload: {
    content?: string;
    files?: { attachment: Buffer; name: string }[];
  }): Promise<unknown>;
};

/** Channel id → sendable channel, or null when it is gone or not text-based. */
export type ChannelResolver = (channelId: string) => Promise<MessageTarget | null>;

export type PublishContext = {
  resolveChannel: ChannelResolver;
  /** filter_check.result_channels */
  resultChannels: Readonly<Record<string, string>>;
  reporter: DiagnosticReporter;
  actor?: ActorNotifier;
};

/**
 * Resolves to false when there is nowhere to publish; the reporter has been told.
 */
export async function publishVerdict(
  context: PublishContext,
  guildId: string | null,
  rendered: RenderedVerdict
): Promise<boolean> {
  const channelId = guildId !== null ? context.resultChannels[guildId] : undefined;
  const channel = channelId ? await context.resolveChannel(channelId) : null;

  if (!channel) {
    await context.reporter.report(
      {
        severity: "error",
        kind: "service_error",
        message: `Filter channel not found for guild ${guildId ?? "dm"}.`,
      },
      context.actor
    );
    return false;
  }

  await channel.send({ content: rendered.textBlock });
  if (rendered.chartArtifact) {
    await channel.send({ files: [{ attachment: rendered.chartArtifact, name: CHART_FILENAME }] });
  }
  return true;
}
