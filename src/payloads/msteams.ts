import { extractTitle, headingsToBold } from "../transform/markdown.js";
import { SENDER_NAME } from "./discord.js";
import type {
  AdaptiveCard,
  ColumnSet,
  PayloadBuilder,
  TeamsCardPayload,
  TextBlock,
  ToggleVisibilityAction,
} from "./types.js";

export const ADAPTIVE_CARD_SCHEMA = "http://adaptivecards.io/schemas/adaptive-card.json";
export const TOGGLE_TARGET_ID = "contentToToggle";

function headerBlock(title: string): TextBlock {
  return {
    type: "TextBlock",
    text: title,
    size: "medium",
    weight: "bolder",
    style: "heading",
  };
}

function authorColumns(author: string, authorIcon: string): ColumnSet {
  return {
    type: "ColumnSet",
    columns: [
      {
        type: "Column",
        width: "auto",
        items: [
          {
            type: "Image",
            url: authorIcon,
            size: "small",
            style: "person",
            fallback: "drop",
          },
        ],
      },
      {
        type: "Column",
        width: "stretch",
        items: [
          {
            type: "TextBlock",
            text: author,
            size: "default",
            weight: "bolder",
            wrap: true,
          },
          {
            type: "TextBlock",
            text: `sent by: ${SENDER_NAME}`,
            spacing: "none",
            isSubtle: true,
            wrap: true,
          },
        ],
      },
    ],
  };
}

function collapsedBody(text: string, id: string): TextBlock {
  return {
    type: "TextBlock",
    text,
    size: "default",
    weight: "default",
    wrap: true,
    fallback: "drop",
    separator: true,
    id,
    isVisible: false,
  };
}

function toggleAction(target: TextBlock): ToggleVisibilityAction {
  return {
    type: "Action.ToggleVisibility",
    title: "Toggle Content",
    targetElements: target.id ? [target.id] : [],
  };
}

export function buildAdaptiveCard(author: string, authorIcon: string, content: string): AdaptiveCard {
  // Only headings are rewritten on cards; bullets stay as Markdown
  const body = collapsedBody(headingsToBold(content), TOGGLE_TARGET_ID);

  return {
    $schema: ADAPTIVE_CARD_SCHEMA,
    version: "1.2",
    type: "AdaptiveCard",
    themeColor: "9C5D7F",
    body: [headerBlock(extractTitle(content)), authorColumns(author, authorIcon), body],
    actions: [toggleAction(body)],
    msteams: {
      width: "Full",
      entities: [],
    },
  };
}

export const msteamsCardBuilder: PayloadBuilder<TeamsCardPayload> = {
  kind: "msteamsWebhook",
  build(author, authorIcon, content) {
    return {
      type: "message",
      attachments: [
        {
          contentType: "application/vnd.microsoft.card.adaptive",
          content: buildAdaptiveCard(author, authorIcon, content),
        },
      ],
    };
  },
};
