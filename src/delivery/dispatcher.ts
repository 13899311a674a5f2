import type { Logger } from "../logger.js";
import { BUILDERS } from "../payloads/index.js";
import {
  DESTINATION_KINDS,
  type AuthorIdentity,
  type DestinationKind,
  type Destinations,
  type PayloadBuilder,
} from "../payloads/types.js";
import { isSuccess, splitUri, type HttpTransport } from "./transport.js";

export type DeliveryStatus = "sent" | "rejected" | "skipped";

export interface DeliveryOutcome {
  kind: DestinationKind;
  status: DeliveryStatus;
  httpStatus?: number;
  body?: string;
}

export type DeliveryReport = DeliveryOutcome[];

export interface DispatcherOptions {
  transport: HttpTransport;
  logger: Logger;
  builders?: Readonly<Record<DestinationKind, PayloadBuilder>>;
}

export class DeliveryDispatcher {
  private transport: HttpTransport;
  private logger: Logger;
  private builders: Readonly<Record<DestinationKind, PayloadBuilder>>;

  constructor(options: DispatcherOptions) {
    this.transport = options.transport;
    this.logger = options.logger;
    this.builders = options.builders ?? BUILDERS;
  }

  /**
   * POST the note to every destination with a URL, one after another.
   *
   * A destination answering outside 2xx is logged and reported as rejected;
   * the rest are still attempted. A host that cannot be reached rejects the
   * whole dispatch with DeliveryUnavailableError.
   */
  async dispatch(
    identity: AuthorIdentity,
    content: string,
    destinations: Destinations
  ): Promise<DeliveryReport> {
    const report: DeliveryReport = [];

    for (const kind of DESTINATION_KINDS) {
      const url = destinations[kind];
      if (!url) {
        report.push({ kind, status: "skipped" });
        continue;
      }

      const payload = this.builders[kind].build(identity.name, identity.icon, content);
      const { host, path } = splitUri(url);

      this.logger.debug(`Sending message to ${kind}`, { host });
      const response = await this.transport.request({
        method: "POST",
        host,
        path,
        headers: { "content-type": "application/json" },
        body: JSON.stringify(payload),
      });

      if (!isSuccess(response.status)) {
        this.logger.error("Error sending message", {
          destination: kind,
          status: response.status,
          body: response.body,
        });
        report.push({ kind, status: "rejected", httpStatus: response.status, body: response.body });
        continue;
      }

      report.push({ kind, status: "sent", httpStatus: response.status });
    }

    return report;
  }
}

export function destinationsFrom(source: Destinations): Destinations {
  return {
    discordWebhook: source.discordWebhook,
    discordWebhookPlain: source.discordWebhookPlain,
    msteamsWebhook: source.msteamsWebhook,
  };
}
