import { GistArchiver, type ArchiveOutcome } from "./archive/gist.js";
import type { Config } from "./config/index.js";
import { DeliveryDispatcher, destinationsFrom, type DeliveryReport } from "./delivery/dispatcher.js";
import { httpsTransport, type HttpTransport } from "./delivery/transport.js";
import { silentLogger, type Logger } from "./logger.js";
import { systemClock, type Clock } from "./notes/daily.js";

export interface PublishOptions {
  config: Config;
  filePath: string;
  content: string;
  logger?: Logger;
  transport?: HttpTransport;
  clock?: Clock;
}

export interface PublishResult {
  deliveries: DeliveryReport;
  archive: ArchiveOutcome;
}

/**
 * Send a finished note to every configured webhook, then archive it to the
 * gist once the webhooks are done.
 */
export async function publishNote(options: PublishOptions): Promise<PublishResult> {
  const { config, filePath, content } = options;
  const logger = options.logger ?? silentLogger;
  const transport = options.transport ?? httpsTransport;

  const dispatcher = new DeliveryDispatcher({ transport, logger });
  const deliveries = await dispatcher.dispatch(
    { name: config.author, icon: config.authorIcon },
    content,
    destinationsFrom(config)
  );

  const archiver = new GistArchiver({ transport, logger, clock: options.clock ?? systemClock });
  const archive = await archiver.archive(config, filePath, content);

  return { deliveries, archive };
}
