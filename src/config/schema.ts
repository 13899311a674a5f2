import { z } from "zod";

export const DEFAULT_TEMPLATE = `### {date}

Motivation summary:

Shout outs:

Improvements:

`;

export const ConfigSchema = z.object({
  workdir: z.string().default("."),
  editor: z.string().min(1).default("vim"),
  editorArgs: z.string().default(""),
  author: z.string().default("notehook"),
  authorIcon: z.string().default(""),
  // Webhook destinations; an empty URL disables the destination
  discordWebhook: z.string().default(""),
  discordWebhookPlain: z.string().default(""),
  msteamsWebhook: z.string().default(""),
  // Gist archive, skipped unless user, token and gist id are all set
  githubApiUrl: z.string().default("https://api.github.com"),
  githubUser: z.string().default(""),
  githubPat: z.string().default(""),
  gistId: z.string().default(""),
  openweathermapUrl: z.string().default(""),
  template: z.string().default(DEFAULT_TEMPLATE),
  logFile: z.string().optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});
