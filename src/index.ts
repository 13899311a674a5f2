export * from "./config/index.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./transform/markdown.js";
export * from "./payloads/index.js";
export * from "./delivery/transport.js";
export * from "./delivery/dispatcher.js";
export * from "./archive/gist.js";
export * from "./weather/openweathermap.js";
export * from "./notes/daily.js";
export * from "./notes/types.js";
export * from "./publish.js";
export * from "./session.js";
