import { Queue } from "bullmq";
import { redisConnectionFromUrl } from "./redis";

export const CLIPS_QUEUE = "clips-queue";

export type ClipJobData = {
  // Local video file; either this or `mediaUrl` is set
  mediaPath?: string;
  mediaUrl?: string;
  mediaId?: string;
  runName?: string;
};

export function createClipsQueue(redisUrl: string) {
  return new Queue<ClipJobData>(CLIPS_QUEUE, {
    connection: redisConnectionFromUrl(redisUrl),
    defaultJobOptions: {
      // Failures land in the RunReport, the job itself resolves
      attempts: 1,
      removeOnComplete: 100,
      removeOnFail: 500,
    },
  });
}
