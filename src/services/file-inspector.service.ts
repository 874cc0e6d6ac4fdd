import * as fs from "fs/promises";
import * as path from "path";
import { Logger } from "../logger";
import { FileError, errorMessage } from "../errors/esa-error";
import { InspectedFile } from "../models/file-metadata.model";
import { detectContentType } from "../utils/content-sniffer";

/**
 * Reads a local file into memory and derives what the policy endpoint needs
 * to know about it. The whole file is held in memory; there is no streaming.
 */
export class FileInspector {
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  public async inspect(filePath: string): Promise<InspectedFile> {
    let handle: fs.FileHandle;
    try {
      handle = await fs.open(filePath, "r");
    } catch (err) {
      throw new FileError(
        `Cannot open "${filePath}": ${errorMessage(err)}`,
        { path: filePath },
        { cause: err },
      );
    }

    let content: Buffer;
    try {
      content = await this.readRegularFile(handle, filePath);
    } catch (err) {
      const failure = this.toReadError(err, filePath);
      throw await this.closeAfterFailure(handle, failure);
    }

    try {
      await handle.close();
    } catch (err) {
      throw new FileError(
        `Cannot close "${filePath}": ${errorMessage(err)}`,
        { path: filePath },
        { cause: err },
      );
    }

    const metadata = {
      type: detectContentType(content),
      name: path.basename(filePath),
      size: content.length,
    };

    this.logger.debug(`Inspected "${filePath}"`, { ...metadata });

    return { metadata, content };
  }

  // ── private ──

  private async readRegularFile(
    handle: fs.FileHandle,
    filePath: string,
  ): Promise<Buffer> {
    const stats = await handle.stat();
    if (!stats.isFile()) {
      throw new FileError(`"${filePath}" is not a regular file`, {
        path: filePath,
      });
    }
    return handle.readFile();
  }

  private toReadError(err: unknown, filePath: string): FileError {
    if (err instanceof FileError) return err;
    return new FileError(
      `Cannot read "${filePath}": ${errorMessage(err)}`,
      { path: filePath },
      { cause: err },
    );
  }

  /**
   * Closes the handle after a failed read. The read failure is returned
   * either way; a close failure on top of it is added to its details.
   */
  private async closeAfterFailure(
    handle: fs.FileHandle,
    failure: FileError,
  ): Promise<FileError> {
    try {
      await handle.close();
      return failure;
    } catch (err) {
      return new FileError(
        failure.message,
        { ...failure.details, closeError: errorMessage(err) },
        { cause: failure.cause },
      );
    }
  }
}
