/**
 * Bounded consumption of compressed Push Port frames
 */
import { setTimeout as sleep } from "node:timers/promises";
import { gunzipSync } from "node:zlib";
import type { FeedConfig } from "./config";
import { MalformedPayloadError } from "./errors";
import { log, logError } from "./log";
import { decodePushPort } from "./push-port";

export interface FeedFrame {
  body: Buffer;
  ack(): void;
}

export type FrameListener = (error: Error | null, frame?: FeedFrame) => void;

export interface FeedConnection {
  subscribe(destination: string, listener: FrameListener): void;
  close(): Promise<void>;
}

export interface FeedStats {
  received: number;
  rendered: number;
  dropped: number;
}

export function decompress(body: Buffer): Buffer {
  try {
    return gunzipSync(body);
  } catch (error) {
    throw new MalformedPayloadError(`Failed to decompress message body: ${error}`, { cause: error });
  }
}

export async function processFrame(
  body: Buffer,
  options: Pick<FeedConfig, "logRaw">,
): Promise<string> {
  const xml = decompress(body);
  if (options.logRaw) {
    log(xml.toString("utf8"));
  }

  const message = await decodePushPort(xml);
  return message.render();
}

/**
 * Consume the queue for `config.runSeconds`, logging a summary per frame.
 * Frames are acknowledged whether they rendered or were dropped.
 */
export async function runFeed(
  connection: FeedConnection,
  config: Pick<FeedConfig, "queueName" | "runSeconds" | "logRaw">,
): Promise<FeedStats> {
  const stats: FeedStats = { received: 0, rendered: 0, dropped: 0 };
  const pending = new Set<Promise<void>>();

  const handle = async (frame: FeedFrame): Promise<void> => {
    try {
      const text = await processFrame(frame.body, config);
      stats.rendered++;
      log("---------------");
      log(`${text}\n`);
    } catch (error) {
      stats.dropped++;
      logError("Dropping message:", error);
    } finally {
      try {
        frame.ack();
      } catch (error) {
        logError("Failed to acknowledge message:", error);
      }
    }
  };

  log(`Subscribing to ${config.queueName}...`);
  connection.subscribe(config.queueName, (error, frame) => {
    if (error) {
      logError("Feed error:", error);
      return;
    }
    if (!frame) return;

    stats.received++;
    const task = handle(frame);
    pending.add(task);
    void task.finally(() => pending.delete(task));
  });

  await sleep(config.runSeconds * 1000);
  await Promise.all(pending);
  await connection.close();

  return stats;
}
