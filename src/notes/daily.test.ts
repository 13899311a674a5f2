import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { DEFAULT_CONFIG } from "../config/index.js";
import { NoteNotFoundError } from "../errors.js";
import {
  createFilename,
  createIfMissing,
  formatDate,
  noteBody,
  openEditor,
  parseNote,
  readNote,
  renderTemplate,
} from "./daily.js";

const clock = { now: () => new Date(2026, 9, 18, 8, 30) };

describe("daily notes", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "notehook-notes-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("formats dates as YYYY-MM-DD", () => {
    expect(formatDate(clock.now())).toBe("2026-10-18");
    expect(formatDate(new Date(2026, 0, 5, 0, 0))).toBe("2026-01-05");
  });

  it("uses the local day for late-evening notes", () => {
    const evening = new Date(2026, 9, 18, 20, 0);

    expect(formatDate(evening)).toBe("2026-10-18");
    expect(createFilename({ ...DEFAULT_CONFIG, workdir: dir }, { now: () => evening })).toBe(
      join(dir, "journal-2026-10-18.md")
    );
  });

  it("fills every date placeholder in a template", () => {
    expect(renderTemplate("# {date}\nsee {date}", clock.now())).toBe("# 2026-10-18\nsee 2026-10-18");
  });

  it("names today's note inside the work directory", () => {
    expect(createFilename({ ...DEFAULT_CONFIG, workdir: dir }, clock)).toBe(join(dir, "journal-2026-10-18.md"));
  });

  it("creates a missing note from the template", () => {
    const filePath = join(dir, "2026", "journal-2026-10-18.md");

    expect(createIfMissing(filePath, DEFAULT_CONFIG.template, clock)).toBe(true);
    expect(readFileSync(filePath, "utf-8")).toBe(
      "### 2026-10-18\n\nMotivation summary:\n\nShout outs:\n\nImprovements:\n\n"
    );
  });

  it("leaves an existing note untouched", () => {
    const filePath = join(dir, "journal-2026-10-18.md");
    writeFileSync(filePath, "already written");

    expect(createIfMissing(filePath, DEFAULT_CONFIG.template, clock)).toBe(false);
    expect(readFileSync(filePath, "utf-8")).toBe("already written");
  });

  it("throws NoteNotFoundError for a missing note", () => {
    const filePath = join(dir, "missing.md");

    expect(() => readNote(filePath)).toThrow(NoteNotFoundError);
    expect(() => readNote(filePath)).toThrow(`Note not found: ${filePath}`);
  });

  it("splits frontmatter from the body", () => {
    const filePath = join(dir, "with-frontmatter.md");
    writeFileSync(filePath, "---\nweather: sunny\nmood: good\n---\nhello\n");

    const note = parseNote(filePath);

    expect(note.frontmatter).toEqual({ weather: "sunny", mood: "good" });
    expect(note.content).toBe("hello\n");
  });

  it("ignores a weather field that is not text", () => {
    const filePath = join(dir, "odd-weather.md");
    writeFileSync(filePath, "---\nweather: 12\n---\nhello\n");

    expect(parseNote(filePath).frontmatter.weather).toBeUndefined();
  });

  it("sends only the body of a note", () => {
    expect(noteBody("---\nweather: sunny\n---\n## Today\n")).toBe("## Today\n");
    expect(noteBody("## No frontmatter\n")).toBe("## No frontmatter\n");
  });

  it("rejects when the editor cannot be started", async () => {
    const filePath = join(dir, "journal.md");
    const config = { ...DEFAULT_CONFIG, editor: join(dir, "no-such-editor") };

    await expect(openEditor(config, filePath)).rejects.toThrow(
      `Failed to start editor '${config.editor}'`
    );
    expect(existsSync(filePath)).toBe(false);
  });
});
