// HTTP listener
// Serves a fetch-style handler (Request in, Response out) on a node:http server

import { createServer } from "node:http";
import { getRequestListener } from "@hono/node-server";

export type FetchHandler = (request: Request) => Response | Promise<Response>;

export interface HttpListener {
  readonly port: number;
  close(): Promise<void>;
}

/** Start listening; resolves once the socket is bound. Port 0 picks a free port. */
export function listen(port: number, handler: FetchHandler, host = "0.0.0.0"): Promise<HttpListener> {
  const server = createServer(getRequestListener(handler));

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      const address = server.address();
      const boundPort = address !== null && typeof address === "object" ? address.port : port;

      resolve({
        port: boundPort,
        // Stops accepting connections and resolves once in-flight requests have finished
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((error) => (error ? fail(error) : done()));
          }),
      });
    });
  });
}
