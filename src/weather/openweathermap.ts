import { z } from "zod";
import { DeliveryUnavailableError } from "../errors.js";
import { isSuccess, splitUri, type HttpResponse, type HttpTransport } from "../delivery/transport.js";
import type { Logger } from "../logger.js";
import { parseNote, writeNote } from "../notes/daily.js";

const KELVIN = 273.15;

export const CurrentWeatherSchema = z.object({
  main: z.object({
    temp_min: z.number(),
    temp_max: z.number(),
    feels_like: z.number(),
    humidity: z.number(),
    pressure: z.number(),
  }),
});

export type CurrentWeather = z.infer<typeof CurrentWeatherSchema>;

function celsius(kelvin: number): string {
  return `${(kelvin - KELVIN).toFixed(1)}°C`;
}

export function formatWeather(weather: CurrentWeather): string {
  const { main } = weather;
  return (
    [
      `min: ${celsius(main.temp_min)}`,
      `max: ${celsius(main.temp_max)}`,
      `feels like: ${celsius(main.feels_like)}`,
      `humidity: ${main.humidity}%`,
      `pressure: ${main.pressure}hPa`,
    ].join(", ") + "\n"
  );
}

export interface WeatherClientOptions {
  transport: HttpTransport;
  logger: Logger;
}

/**
 * Reads current conditions from an OpenWeatherMap URL (API key included in
 * the query string) and records them in the day's note.
 */
export class WeatherClient {
  private transport: HttpTransport;
  private logger: Logger;

  constructor(options: WeatherClientOptions) {
    this.transport = options.transport;
    this.logger = options.logger;
  }

  /** One summary line ending in a newline, or "" when nothing usable came back. */
  async fetchWeather(url: string): Promise<string> {
    if (!url) {
      return "";
    }

    const { host, path } = splitUri(url);
    let response: HttpResponse;
    try {
      response = await this.transport.request({
        method: "GET",
        host,
        path,
        headers: { "content-type": "application/json" },
      });
    } catch (error) {
      // An unreachable weather host yields no weather line
      if (error instanceof DeliveryUnavailableError) {
        this.logger.warn("Weather unavailable", { host, reason: error.message });
        return "";
      }
      throw error;
    }

    if (!isSuccess(response.status)) {
      this.logger.error("Error fetching weather", { status: response.status, body: response.body });
      return "";
    }

    let data: unknown;
    try {
      data = JSON.parse(response.body);
    } catch {
      this.logger.error("Weather response is not JSON", { body: response.body });
      return "";
    }

    const parsed = CurrentWeatherSchema.safeParse(data);
    if (!parsed.success) {
      this.logger.error("Weather response is missing temperature fields", { body: response.body });
      return "";
    }

    return formatWeather(parsed.data);
  }

  /**
   * Append the weather to the note once. The `weather` frontmatter field
   * marks a note that already has it. Returns true when the file changed.
   */
  async appendWeather(filePath: string, url: string): Promise<boolean> {
    if (!url) {
      return false;
    }

    const note = parseNote(filePath);
    if (note.frontmatter.weather !== undefined) {
      return false;
    }

    const weather = await this.fetchWeather(url);
    if (!weather) {
      return false;
    }

    let body = note.content;
    if (body && !body.endsWith("\n")) {
      body += "\n";
    }

    writeNote(filePath, body + weather, { ...note.frontmatter, weather: weather.trim() });
    this.logger.debug("Appended weather to note", { filePath });
    return true;
  }
}
