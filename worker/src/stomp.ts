/**
 * STOMP-over-TCP transport for the Darwin Push Port queue
 */
import type { Readable } from "node:stream";
import stompit from "stompit";
import type { FeedConfig } from "./config";
import type { FeedConnection, FrameListener } from "./feed";
import { logError } from "./log";

async function readBody(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

export function connectStomp(
  config: Pick<FeedConfig, "host" | "port" | "username" | "password">,
): Promise<FeedConnection> {
  const options = {
    host: config.host,
    port: config.port,
    connectHeaders: {
      host: "/",
      login: config.username,
      passcode: config.password,
      "heart-beat": "5000,5000",
    },
  };

  return new Promise((resolve, reject) => {
    stompit.connect(options, (connectError, client) => {
      if (connectError) {
        reject(connectError);
        return;
      }

      client.on("error", (error: Error) => logError("STOMP connection error:", error));

      resolve({
        subscribe(destination: string, listener: FrameListener): void {
          client.subscribe({ destination, ack: "client-individual" }, (error, message) => {
            if (error) {
              listener(error);
              return;
            }

            readBody(message).then(
              (body) => listener(null, { body, ack: () => client.ack(message) }),
              (readError: unknown) =>
                listener(readError instanceof Error ? readError : new Error(String(readError))),
            );
          });
        },

        close(): Promise<void> {
          return new Promise((done, fail) => {
            client.disconnect((error) => (error ? fail(error) : done()));
          });
        },
      });
    });
  });
}
