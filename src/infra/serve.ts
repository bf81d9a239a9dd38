import { serve } from "@hono/node-server";
import type { AddressInfo, Server } from "node:net";
import type { Hono } from "hono";
import { createLogger } from "../logging.js";

const log = createLogger("http");

export type RunningServer = {
  url: string;
  close: () => Promise<void>;
};

/** Binds a Hono app with @hono/node-server and resolves once it is listening. */
export function startHttpServer(app: Hono, options: { name: string; hostname: string; port: number }): Promise<RunningServer> {
  return new Promise((resolve, reject) => {
    const server: Server = serve(
      { fetch: app.fetch, port: options.port, hostname: options.hostname },
      (info: AddressInfo) => {
        const url = `http://${options.hostname}:${info.port}`;
        log.info(`${options.name} listening on ${url}`);
        resolve({
          url,
          close: () =>
            new Promise<void>((done, fail) => {
              server.close((err?: Error) => (err ? fail(err) : done()));
            }),
        });
      },
    );
    server.once("error", (err: Error) => {
      reject(new Error(`${options.name} failed to bind ${options.hostname}:${options.port}: ${err.message}`));
    });
  });
}
