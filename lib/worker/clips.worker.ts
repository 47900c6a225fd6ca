import "dotenv/config";
import { Worker } from "bullmq";
import { loadConfig } from "@/lib/config";
import { CLIPS_QUEUE, type ClipJobData } from "@/lib/queue/clips.queue";
import { redisConnectionFromUrl } from "@/lib/queue/redis";
import type { RunReport } from "@/lib/types";
import { createLogger } from "@/lib/utils/logger";
import { buildPipelineDeps, processClipJob } from "./processClipJob";

const log = createLogger("CLIPS WORKER");

log.step("Clips worker starting...");

const config = loadConfig();
const pipeline = buildPipelineDeps(config);

const worker = new Worker<ClipJobData, RunReport>(
  CLIPS_QUEUE,
  (job) => processClipJob(job, { config, pipeline }),
  {
    connection: redisConnectionFromUrl(config.redisUrl),
    concurrency: 1, // Process one video at a time
  }
);

worker.on("completed", (job, report) => {
  log.step(`Job ${job.id} completed`, { status: report.status, counts: report.counts });
});

worker.on("failed", (job, err) => {
  log.error(`Job ${job?.id} permanently failed`, err);
});

worker.on("error", (err) => {
  log.error("Worker error", err);
});

const shutdown = async () => {
  log.step("Shutting down clips worker...");
  await worker.close();
  process.exit(0);
};

const onSignal = () => {
  shutdown().catch((err) => {
    log.error("Worker shutdown failed", err);
    process.exit(1);
  });
};

process.on("SIGINT", onSignal);
process.on("SIGTERM", onSignal);

log.step("Clips worker ready and listening...");
