import express from "express";
import type { Server } from "node:http";

export interface RunningApp {
  baseUrl: string;
  close(): Promise<void>;
}

/**
 * Bind an express app on an ephemeral local port. Used by tests as an
 * in-process stand-in for the model-serving endpoints and for our own routes.
 */
export async function listen(app: express.Express): Promise<RunningApp> {
  const server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, "127.0.0.1", () => resolve(s));
  });
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("server is not bound to a TCP port");
  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
