import http from "node:http";
import type express from "express";
import type { TrustLedger } from "@trustledger/core-runtime";
import { createLocalApp } from "./app.js";

export { createLocalApp, statusForError, type LocalAppOptions } from "./app.js";

export interface LocalApiOptions {
  ledger: TrustLedger;
  port?: number;
  host?: string;
}

export interface LocalApiServer {
  app: express.Express;
  server: http.Server;
  stop(): Promise<void>;
}

export async function startLocalApi(options: LocalApiOptions): Promise<LocalApiServer> {
  const app = createLocalApp({ ledger: options.ledger });
  const port = options.port ?? options.ledger.config.localApiPort;
  const host = options.host ?? "127.0.0.1";

  const server = await new Promise<http.Server>((resolve, reject) => {
    const srv = app.listen(port, host, () => resolve(srv));
    srv.once("error", reject);
  });

  options.ledger.db.insertAudit({
    category: "runtime",
    action: "local_api_started",
    details: `port=${port}`,
  });

  return {
    app,
    server,
    stop: async () => {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      });
    },
  };
}
