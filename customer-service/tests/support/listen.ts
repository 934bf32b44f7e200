import { Express } from "express";
import { Server } from "http";

export interface RunningApp {
  baseUrl: string;
  close: () => Promise<void>;
}

/** Serves `app` on an ephemeral loopback port. */
export const listen = (app: Express): Promise<RunningApp> =>
  new Promise((resolve, reject) => {
    const server: Server = app.listen(0, "127.0.0.1", () => {
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new Error("Server is not listening on a TCP port"));
        return;
      }
      resolve({
        baseUrl: `http://127.0.0.1:${address.port}`,
        close: () =>
          new Promise<void>((done, fail) =>
            server.close((error) => (error ? fail(error) : done()))
          ),
      });
    });
  });
