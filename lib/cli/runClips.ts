import "dotenv/config";
import { loadConfig } from "@/lib/config";
import { probeMedia } from "@/lib/media/probeMedia";
import { runPipeline } from "@/lib/pipeline/runPipeline";
import { buildPipelineDeps } from "@/lib/worker/processClipJob";
import { createLogger } from "@/lib/utils/logger";
import { parseClipArgs } from "./args";

const log = createLogger("RUN");

// Runs the pipeline in-process, no Redis needed. Prints the RunReport as JSON.
async function main() {
  const args = parseClipArgs(process.argv.slice(2));
  const config = loadConfig();
  const media = await probeMedia(args.mediaPath, args.mediaId);

  const report = await runPipeline(media, buildPipelineDeps(config), {
    outputDir: config.clipsDir,
    runName: args.runName,
    targetLanguage: config.transcriptLanguage,
    cutConcurrency: config.cutConcurrency,
    extraction: config.extraction,
  });

  process.stdout.write(JSON.stringify(report, null, 2) + "\n");
  process.exitCode = report.status === "succeeded" ? 0 : 1;
}

main().catch((err) => {
  log.error("Run failed", err);
  process.exit(1);
});
