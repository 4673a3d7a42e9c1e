/**
 * Darwin Push Port delay monitor
 * Reads schedule updates from the National Rail STOMP feed for a fixed window
 * and logs a readable summary of each, including arrival delays.
 */
import { loadConfig } from "./config";
import { runFeed } from "./feed";
import { log, logError, trace } from "./log";
import { connectStomp } from "./stomp";

async function main(): Promise<void> {
  const config = loadConfig();

  log(`Connecting to ${config.host}:${config.port}...`);
  const connection = await trace("connect", () => connectStomp(config));

  log(`Listening for ${config.runSeconds}s...`);
  const stats = await runFeed(connection, config);

  log(`Received ${stats.received} messages: ${stats.rendered} rendered, ${stats.dropped} dropped`);
}

main().catch((error: unknown) => {
  logError("Error:", error);
  process.exitCode = 1;
});
