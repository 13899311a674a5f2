import { readFileSync, writeFileSync, existsSync, mkdirSync } from "fs";
import { spawn } from "child_process";
import { dirname, join } from "path";
import matter from "gray-matter";
import { Config, getWorkDirectory } from "../config/index.js";
import { NoteNotFoundError } from "../errors.js";
import type { Note, NoteFrontmatter } from "./types.js";

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/** The local calendar day of `date` as YYYY-MM-DD. */
export function formatDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}-${month}-${day}`;
}

export function renderTemplate(template: string, date: Date): string {
  return template.replaceAll("{date}", formatDate(date));
}

export function createFilename(config: Config, clock: Clock = systemClock): string {
  return join(getWorkDirectory(config), `journal-${formatDate(clock.now())}.md`);
}

/**
 * Write a fresh note from the template unless the file is already there.
 * Returns true when a file was created.
 */
export function createIfMissing(filePath: string, template: string, clock: Clock = systemClock): boolean {
  if (existsSync(filePath)) {
    return false;
  }

  const dir = dirname(filePath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  writeFileSync(filePath, renderTemplate(template, clock.now()));
  return true;
}

export function readNote(filePath: string): string {
  if (!existsSync(filePath)) {
    throw new NoteNotFoundError(filePath);
  }
  return readFileSync(filePath, "utf-8");
}

export function parseNote(filePath: string): Note {
  const rawContent = readNote(filePath);
  const { data, content } = matter(rawContent);

  const frontmatter: NoteFrontmatter = { ...data };
  if (typeof data.weather !== "string") {
    delete frontmatter.weather;
  }

  return { filePath, frontmatter, content, rawContent };
}

export function writeNote(filePath: string, content: string, frontmatter: NoteFrontmatter): void {
  const hasFrontmatter = Object.keys(frontmatter).length > 0;
  writeFileSync(filePath, hasFrontmatter ? matter.stringify(content, frontmatter) : content);
}

/** The part of a note that gets sent: everything after the frontmatter. */
export function noteBody(rawContent: string): string {
  return matter(rawContent).content;
}

export function openEditor(config: Config, filePath: string): Promise<void> {
  const args = config.editorArgs.split(/\s+/).filter(Boolean);
  args.push(filePath);

  return new Promise((resolve, reject) => {
    const child = spawn(config.editor, args, { stdio: "inherit" });

    child.on("error", (error) => {
      reject(new Error(`Failed to start editor '${config.editor}': ${error.message}`));
    });

    child.on("exit", () => {
      resolve();
    });
  });
}
