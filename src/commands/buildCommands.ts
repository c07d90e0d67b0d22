// SPDX-License-Identifier: LicenseRef-ANW-1.0

// Aggregates every slash command definition for bulk registration with Discord.
// The list is static: unloading a module at runtime does not unregister its commands,
// the router answers them with "unavailable" instead.
//
// GOTCHA: Discord caches slash commands aggressively. After adding/removing commands here,
// re-run the deploy script. Global commands can take up to 1 hour to propagate; guild
// commands update instantly.

import { data as checkData } from "./check.js";
import { resetInviteData, sendInvitePanelData } from "./invite.js";
import { data as moduleData } from "./modules.js";
import { postRatingData, previewRatingData } from "./staffRating.js";

export function buildCommands() {
  return [
    checkData.toJSON(),

    sendInvitePanelData.toJSON(),
    resetInviteData.toJSON(),

    postRatingData.toJSON(),
    previewRatingData.toJSON(),

    moduleData.toJSON(),
  ];
}
