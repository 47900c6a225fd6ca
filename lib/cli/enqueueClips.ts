import "dotenv/config";
import { loadConfig } from "@/lib/config";
import { createClipsQueue } from "@/lib/queue/clips.queue";
import { createLogger } from "@/lib/utils/logger";
import { parseClipArgs } from "./args";

const log = createLogger("ENQUEUE");

async function main() {
  const args = parseClipArgs(process.argv.slice(2));
  const config = loadConfig();
  const queue = createClipsQueue(config.redisUrl);

  const job = await queue.add("generate-clips", args);
  log.step(`Queued job ${job.id}`, args);

  await queue.close();
}

main().catch((err) => {
  log.error("Enqueue failed", err);
  process.exit(1);
});
