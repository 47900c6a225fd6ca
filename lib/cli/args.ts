import path from "path";
import { parseArgs } from "util";

export type ClipCliArgs = {
  mediaPath: string;
  mediaId?: string;
  runName?: string;
};

export const USAGE = "Usage: <video-file> [--id <media-id>] [--run <run-name>]";

export function parseClipArgs(argv: string[]): ClipCliArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      id: { type: "string" },
      run: { type: "string" },
    },
  });

  const [video] = positionals;
  if (!video || positionals.length > 1) {
    throw new Error(USAGE);
  }

  return {
    mediaPath: path.resolve(video),
    mediaId: values.id,
    runName: values.run,
  };
}
