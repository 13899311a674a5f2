import prompts from "prompts";
import chalk from "chalk";
import { Config, DEFAULT_CONFIG, saveConfig, configExists } from "../config/index.js";

export async function runInteractiveSetup(
  configPath: string,
  options: { force?: boolean } = {}
): Promise<Config | null> {
  console.log(chalk.bold("\n📓 notehook setup\n"));

  if (configExists(configPath) && !options.force) {
    const { overwrite } = await prompts({
      type: "confirm",
      name: "overwrite",
      message: `Config already exists at ${configPath}. Overwrite?`,
      initial: false,
    });

    if (!overwrite) {
      console.log(chalk.yellow("Setup cancelled."));
      return null;
    }
  }

  let cancelled = false;
  const responses = await prompts(
    [
      {
        type: "text",
        name: "workdir",
        message: "Where should daily notes be stored?",
        initial: DEFAULT_CONFIG.workdir,
        validate: (value: string) => (value.trim() ? true : "Directory path is required"),
      },
      {
        type: "text",
        name: "editor",
        message: "Editor command:",
        initial: process.env.EDITOR || DEFAULT_CONFIG.editor,
      },
      {
        type: "text",
        name: "author",
        message: "Author name shown on messages:",
        initial: DEFAULT_CONFIG.author,
      },
      {
        type: "text",
        name: "authorIcon",
        message: "Author icon URL (leave empty to skip):",
        initial: "",
      },
      {
        type: "text",
        name: "discordWebhook",
        message: "Discord webhook URL (leave empty to skip):",
        initial: "",
      },
      {
        type: "text",
        name: "msteamsWebhook",
        message: "Microsoft Teams webhook URL (leave empty to skip):",
        initial: "",
      },
    ],
    {
      onCancel: () => {
        cancelled = true;
        return false;
      },
    }
  );

  if (cancelled) {
    console.log(chalk.yellow("\nSetup cancelled."));
    return null;
  }

  const config: Config = {
    ...DEFAULT_CONFIG,
    workdir: String(responses.workdir).trim(),
    editor: String(responses.editor || DEFAULT_CONFIG.editor).trim(),
    author: String(responses.author ?? "").trim(),
    authorIcon: String(responses.authorIcon ?? "").trim(),
    discordWebhook: String(responses.discordWebhook ?? "").trim(),
    msteamsWebhook: String(responses.msteamsWebhook ?? "").trim(),
  };

  saveConfig(config, configPath);
  console.log(chalk.green(`✓ Created ${configPath}`));

  console.log(chalk.bold.green("\n✨ Setup complete!\n"));
  console.log("Next steps:");
  console.log(chalk.dim("  1. Add gist or weather settings by editing the config file"));
  console.log(chalk.dim("  2. Write today's note:   ") + "notehook\n");

  return config;
}
