import { once } from "node:events";
import type { Server } from "node:http";
import type express from "express";

/** Resolves once the server is bound; bind failures (EADDRINUSE, EACCES) reject. */
export async function listen(app: express.Express, port: number, host?: string): Promise<Server> {
  const server = host === undefined ? app.listen(port) : app.listen(port, host);
  await once(server, "listening");
  return server;
}
