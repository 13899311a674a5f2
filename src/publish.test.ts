import { describe, it, expect, vi } from "vitest";
import { DEFAULT_CONFIG } from "./config/index.js";
import { publishNote } from "./publish.js";
import { FakeTransport } from "./testing/fake-transport.js";

const clock = { now: () => new Date(2026, 9, 18, 21, 15) };

describe("publishNote", () => {
  it("sends webhooks before the gist", async () => {
    const transport = new FakeTransport();

    const result = await publishNote({
      config: {
        ...DEFAULT_CONFIG,
        msteamsWebhook: "https://teams.example.com/hook",
        githubUser: "test-user",
        githubPat: "test-token",
        gistId: "abc123",
      },
      filePath: "/notes/journal-2026-10-18.md",
      content: "# Evening\n",
      transport,
      clock,
    });

    expect(transport.requests.map((req) => `${req.method} ${req.host}${req.path}`)).toEqual([
      "POST teams.example.com/hook",
      "PATCH api.github.com/gists/abc123",
    ]);
    expect(transport.jsonBody(1)).toMatchObject({ description: "Note posted: 2026-10-18" });
    expect(result.archive).toEqual({ status: "sent", httpStatus: 204 });
  });

  it("logs nothing when no logger is given", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const transport = new FakeTransport({ status: 500, body: "boom" });

    const result = await publishNote({
      config: { ...DEFAULT_CONFIG, discordWebhook: "https://discord.com/api/webhooks/1/a" },
      filePath: "journal.md",
      content: "hello",
      transport,
      clock,
    });

    expect(result.deliveries[0]).toEqual({ kind: "discordWebhook", status: "rejected", httpStatus: 500, body: "boom" });
    expect(errorSpy).not.toHaveBeenCalled();
  });
});
