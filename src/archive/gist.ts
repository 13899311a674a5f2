import { basename } from "path";
import { isSuccess, splitUri, type HttpTransport } from "../delivery/transport.js";
import type { Logger } from "../logger.js";
import { formatDate, type Clock } from "../notes/daily.js";

export interface GistCredentials {
  githubApiUrl: string;
  githubUser: string;
  githubPat: string;
  gistId: string;
}

export interface GistPatchBody {
  description: string;
  files: Record<string, { content: string }>;
}

export type ArchiveOutcome =
  | { status: "skipped" }
  | { status: "sent"; httpStatus: number }
  | { status: "rejected"; httpStatus: number; body: string };

export interface GistArchiverOptions {
  transport: HttpTransport;
  logger: Logger;
  clock: Clock;
}

export function buildGistBody(filename: string, content: string, date: Date): GistPatchBody {
  return {
    description: `Note posted: ${formatDate(date)}`,
    files: { [basename(filename)]: { content } },
  };
}

/**
 * Keeps a copy of each note in one GitHub gist, one file per note.
 */
export class GistArchiver {
  private transport: HttpTransport;
  private logger: Logger;
  private clock: Clock;

  constructor(options: GistArchiverOptions) {
    this.transport = options.transport;
    this.logger = options.logger;
    this.clock = options.clock;
  }

  async archive(credentials: GistCredentials, filename: string, content: string): Promise<ArchiveOutcome> {
    const { githubUser, githubPat, gistId } = credentials;
    if (!githubUser || !githubPat || !gistId) {
      return { status: "skipped" };
    }

    const { host, path } = splitUri(credentials.githubApiUrl);
    const apiPath = path.replace(/\/+$/, "");
    const body = buildGistBody(filename, content, this.clock.now());

    this.logger.debug("Updating gist", { gistId });
    const response = await this.transport.request({
      method: "PATCH",
      host,
      path: `${apiPath}/gists/${gistId}`,
      headers: {
        accept: "application/vnd.github.v3+json",
        "user-agent": githubUser,
        authorization: `token ${githubPat}`,
        "content-type": "application/json",
      },
      body: JSON.stringify(body),
    });

    if (!isSuccess(response.status)) {
      this.logger.error("Error sending gist", { status: response.status, body: response.body });
      return { status: "rejected", httpStatus: response.status, body: response.body };
    }

    return { status: "sent", httpStatus: response.status };
  }
}
