import "dotenv/config";
import { loadConfig } from "@/lib/config";
import { createClipsQueue } from "@/lib/queue/clips.queue";
import { createLogger } from "@/lib/utils/logger";

const log = createLogger("QUEUE");

async function clearQueues() {
  const clipsQueue = createClipsQueue(loadConfig().redisUrl);

  // Clear all jobs
  await clipsQueue.obliterate({ force: true });

  log.step("Clips queue cleared");

  await clipsQueue.close();
  process.exit(0);
}

clearQueues().catch((err) => {
  log.error("Clearing queues failed", err);
  process.exit(1);
});
