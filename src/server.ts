/**
 * Migrator HTTP server.
 *
 * A thin node:http wrapper: the handler decides whether it owns a request,
 * everything it declines gets a JSON 404, and anything it throws becomes a
 * 500 with a generic body.
 */

import { createServer, type IncomingMessage, type ServerResponse, type Server } from "node:http";
import type { Logger } from "./types.js";

export type MigratorHttpHandler = (
  req: IncomingMessage,
  res: ServerResponse,
) => Promise<boolean>;

export interface MigratorHttpServerOptions {
  port: number;
  host?: string;
  logger: Logger;
}

/** Thrown by readJsonBody when the payload is not valid JSON. */
export class InvalidJsonError extends Error {
  constructor() {
    super("Invalid JSON body");
    this.name = "InvalidJsonError";
  }
}

/**
 * Read and parse a JSON body. Resolves undefined for an empty body.
 */
export function readJsonBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => {
      const raw = Buffer.concat(chunks).toString("utf-8");
      if (!raw.trim()) { resolve(undefined); return; }
      try { resolve(JSON.parse(raw)); }
      catch { reject(new InvalidJsonError()); }
    });
    req.on("error", reject);
  });
}

/** Write a JSON response; a null body sends no content. */
export function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.statusCode = status;
  if (body === null) {
    res.end();
    return;
  }
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(body));
}

/**
 * Create and start the HTTP server.
 * Resolves once the server is listening.
 */
export function startMigratorHttpServer(
  handler: MigratorHttpHandler,
  opts: MigratorHttpServerOptions,
): Promise<Server> {
  const { port, host = "127.0.0.1", logger } = opts;

  const server = createServer(async (req, res) => {
    try {
      const handled = await handler(req, res);
      if (!handled) {
        sendJson(res, 404, { error: "not found" });
      }
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      logger.error(`[migrator:http] unhandled error: ${msg}`);
      if (!res.headersSent) {
        sendJson(res, 500, { error: "internal server error" });
      }
    }
  });

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      const addr = server.address();
      const bound = addr && typeof addr !== "string" ? addr.port : port;
      logger.info(`[migrator:http] server listening on ${host}:${bound}`);
      resolve(server);
    });
  });
}

/**
 * Stop the HTTP server gracefully.
 */
export function stopMigratorHttpServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}
