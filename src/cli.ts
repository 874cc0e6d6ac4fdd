#!/usr/bin/env node
import "reflect-metadata";
import "dotenv/config";
import { loadConfig } from "./config";
import { Logger } from "./logger";
import { createAttachmentService } from "./index";
import { UploadStageError } from "./errors/esa-error";

const USAGE = "Usage: esa-upload <team> <file>";

/**
 * Uploads one file and prints its public URL on stdout.
 */
async function main(argv: string[]): Promise<number> {
  const [teamName, filePath] = argv;
  if (!teamName || !filePath || argv.length > 2) {
    process.stderr.write(`${USAGE}\n`);
    return 2;
  }

  const config = loadConfig();
  const logger = new Logger(config);
  const attachments = createAttachmentService(config, logger);

  try {
    const url = await attachments.uploadAttachmentFile(teamName, filePath);
    process.stdout.write(`${url}\n`);
    return 0;
  } catch (err) {
    if (err instanceof UploadStageError) {
      logger.error(err.message, { stage: err.stage, ...err.details });
      return 1;
    }
    throw err;
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    process.stderr.write(
      `${err instanceof Error ? err.stack || err.message : String(err)}\n`,
    );
    process.exitCode = 1;
  });
