import { Config, expandPath } from "./config/index.js";
import { httpsTransport, type HttpTransport } from "./delivery/transport.js";
import type { Logger } from "./logger.js";
import {
  createFilename,
  createIfMissing,
  noteBody,
  openEditor,
  readNote,
  systemClock,
  type Clock,
} from "./notes/daily.js";
import { publishNote, type PublishResult } from "./publish.js";
import { WeatherClient } from "./weather/openweathermap.js";

export interface SessionOptions {
  config: Config;
  /** Note to edit; defaults to today's note in the work directory. */
  file?: string;
  autoSend?: boolean;
}

export interface SessionDeps {
  logger: Logger;
  confirmSend: () => Promise<boolean>;
  edit?: (config: Config, filePath: string) => Promise<void>;
  transport?: HttpTransport;
  clock?: Clock;
}

export interface SessionResult {
  filePath: string;
  created: boolean;
  sent: boolean;
  publish?: PublishResult;
}

/**
 * One journaling pass: make sure the note exists, let the user edit it,
 * and on confirmation add the weather and publish it.
 */
export async function runSession(options: SessionOptions, deps: SessionDeps): Promise<SessionResult> {
  const { config } = options;
  const { logger } = deps;
  const clock = deps.clock ?? systemClock;
  const transport = deps.transport ?? httpsTransport;
  const edit = deps.edit ?? openEditor;

  const filePath = options.file ? expandPath(options.file) : createFilename(config, clock);
  const created = createIfMissing(filePath, config.template, clock);
  if (created) {
    logger.info("Created note", { filePath });
  }

  await edit(config, filePath);

  if (!options.autoSend && !(await deps.confirmSend())) {
    return { filePath, created, sent: false };
  }

  const weather = new WeatherClient({ transport, logger });
  await weather.appendWeather(filePath, config.openweathermapUrl);

  const content = noteBody(readNote(filePath));
  const publish = await publishNote({ config, filePath, content, logger, transport, clock });

  return { filePath, created, sent: true, publish };
}
