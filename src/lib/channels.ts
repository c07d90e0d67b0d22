/**
 * Vetting Bot — src/lib/channels.ts
 * WHAT: Channel lookup by id that yields a sendable channel or null.
 * DOCS:
 *  - ChannelManager.fetch: https://discord.js.org/#/docs/discord.js/main/class/ChannelManager?scrollTo=fetch
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Client, SendableChannels } from "discord.js";
import { classifyError } from "./errors.js";
import { logger } from "./logger.js";

/**
 * Cache first, then the API. Deleted channels, missing access and non-text channels
 * all come back as null; the reason is logged at warn.
 */
export async function fetchSendableChannel(
  client: Client,
  channelId: string
): Promise<SendableChannels | null> {
  try {
    const channel = await client.channels.fetch(channelId);
    if (channel?.isSendable()) return channel;
    logger.warn({ channelId, type: channel?.type ?? null }, "[channels] channel is missing or not sendable");
    return null;
  } catch (err) {
    const classified = classifyError(err);
    logger.warn({ channelId, errorKind: classified.kind, err }, "[channels] channel fetch failed");
    return null;
  }
}
