import { request as httpsRequest } from "https";
import { DeliveryUnavailableError } from "../errors.js";

export type HttpMethod = "GET" | "POST" | "PATCH";

export interface HttpRequest {
  method: HttpMethod;
  host: string;
  path: string;
  headers: Record<string, string>;
  body?: string;
}

export interface HttpResponse {
  status: number;
  body: string;
}

/**
 * One request against one host. Implementations reject with
 * DeliveryUnavailableError when the host cannot be reached at all; any
 * HTTP status, good or bad, resolves.
 */
export interface HttpTransport {
  request(req: HttpRequest): Promise<HttpResponse>;
}

const SCHEME = /^https?:\/\//;

/**
 * Split a URL into host and path at the first `/` after the scheme.
 * The path keeps its leading slash; a bare host yields an empty path.
 */
export function splitUri(uri: string): { host: string; path: string } {
  const rest = uri.replace(SCHEME, "");
  const slash = rest.indexOf("/");
  if (slash === -1) {
    return { host: rest, path: "" };
  }
  return { host: rest.slice(0, slash), path: rest.slice(slash) };
}

export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

export const httpsTransport: HttpTransport = {
  request(req) {
    return new Promise<HttpResponse>((resolve, reject) => {
      const headers: Record<string, string | number> = { ...req.headers };
      if (req.body !== undefined) {
        headers["content-length"] = Buffer.byteLength(req.body);
      }

      const outgoing = httpsRequest(
        {
          host: req.host,
          path: req.path || "/",
          method: req.method,
          headers,
        },
        (response) => {
          const chunks: Buffer[] = [];
          response.on("data", (chunk: Buffer) => chunks.push(chunk));
          response.on("end", () => {
            resolve({
              status: response.statusCode ?? 0,
              body: Buffer.concat(chunks).toString("utf-8"),
            });
          });
          response.on("error", (error) => reject(new DeliveryUnavailableError(req.host, error)));
        }
      );

      outgoing.on("error", (error) => reject(new DeliveryUnavailableError(req.host, error)));

      if (req.body !== undefined) {
        outgoing.write(req.body);
      }
      outgoing.end();
    });
  },
};
