import { discordEmbedBuilder, discordPlainBuilder } from "./discord.js";
import { msteamsCardBuilder } from "./msteams.js";
import type { DestinationKind, PayloadBuilder } from "./types.js";

/**
 * Builder for each destination, keyed by the config field that holds its
 * URL. A new destination needs a schema field and an entry here.
 */
export const BUILDERS: Readonly<Record<DestinationKind, PayloadBuilder>> = {
  discordWebhook: discordEmbedBuilder,
  discordWebhookPlain: discordPlainBuilder,
  msteamsWebhook: msteamsCardBuilder,
};

export * from "./types.js";
export * from "./discord.js";
export * from "./msteams.js";
