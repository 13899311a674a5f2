export const DESTINATION_KINDS = ["discordWebhook", "discordWebhookPlain", "msteamsWebhook"] as const;

/** Config field holding the webhook URL for each destination. */
export type DestinationKind = (typeof DESTINATION_KINDS)[number];

export type Destinations = Record<DestinationKind, string>;

export interface AuthorIdentity {
  name: string;
  icon: string;
}

// Discord

export interface DiscordPlainPayload {
  username: string;
  content: string;
}

export interface DiscordEmbed {
  author: {
    name: string;
    icon_url: string;
  };
  title: string;
  description: string;
  color: number;
}

export interface DiscordEmbedPayload {
  username: string;
  embeds: DiscordEmbed[];
}

// Microsoft Teams adaptive card

export interface TextBlock {
  type: "TextBlock";
  text: string;
  id?: string;
  size?: "default" | "small" | "medium" | "large";
  weight?: "default" | "lighter" | "bolder";
  style?: "default" | "heading";
  spacing?: "none" | "default";
  isSubtle?: boolean;
  wrap?: boolean;
  fallback?: "drop";
  separator?: boolean;
  isVisible?: boolean;
}

export interface Image {
  type: "Image";
  url: string;
  size?: "auto" | "small" | "medium" | "large";
  style?: "default" | "person";
  fallback?: "drop";
}

export interface Column {
  type: "Column";
  width: "auto" | "stretch";
  items: Array<TextBlock | Image>;
}

export interface ColumnSet {
  type: "ColumnSet";
  columns: Column[];
}

export type CardElement = TextBlock | Image | ColumnSet;

export interface ToggleVisibilityAction {
  type: "Action.ToggleVisibility";
  title: string;
  targetElements: string[];
}

export interface AdaptiveCard {
  $schema: string;
  version: string;
  type: "AdaptiveCard";
  themeColor: string;
  body: CardElement[];
  actions: ToggleVisibilityAction[];
  msteams: {
    width: "Full";
    entities: unknown[];
  };
}

export interface TeamsCardPayload {
  type: "message";
  attachments: Array<{
    contentType: "application/vnd.microsoft.card.adaptive";
    content: AdaptiveCard;
  }>;
}

export type Payload = DiscordPlainPayload | DiscordEmbedPayload | TeamsCardPayload;

export interface PayloadBuilder<P extends Payload = Payload> {
  readonly kind: DestinationKind;
  build(author: string, authorIcon: string, content: string): P;
}
