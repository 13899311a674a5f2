import { bulletsToDiamonds, extractTitle, headingsToBold } from "../transform/markdown.js";
import type { DiscordEmbedPayload, DiscordPlainPayload, PayloadBuilder } from "./types.js";

export const SENDER_NAME = "notehook";
export const EMBED_COLOR = 0x9c5d7f;

function authorLine(author: string, authorIcon: string): string {
  if (!author) {
    return "";
  }
  return authorIcon ? `${author} (${authorIcon})\n` : `${author}\n`;
}

/**
 * The note as preformatted text, for channels that should show the raw
 * Markdown untouched.
 */
export const discordPlainBuilder: PayloadBuilder<DiscordPlainPayload> = {
  kind: "discordWebhookPlain",
  build(author, authorIcon, content) {
    return {
      username: SENDER_NAME,
      content: "```" + authorLine(author, authorIcon) + content + "```",
    };
  },
};

/**
 * A single embed: first heading as the title, the body with bullets as
 * diamonds and headings in bold.
 */
export const discordEmbedBuilder: PayloadBuilder<DiscordEmbedPayload> = {
  kind: "discordWebhook",
  build(author, authorIcon, content) {
    const title = extractTitle(content);
    const description = headingsToBold(bulletsToDiamonds(content));

    return {
      username: SENDER_NAME,
      embeds: [
        {
          author: {
            name: author,
            icon_url: authorIcon,
          },
          title,
          description,
          color: EMBED_COLOR,
        },
      ],
    };
  },
};
