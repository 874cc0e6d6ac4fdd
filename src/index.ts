import "reflect-metadata";
import { EsaConfig, loadConfig } from "./config";
import { Logger } from "./logger";
import { EsaClient } from "./services/esa-client.service";
import { FileInspector } from "./services/file-inspector.service";
import { PolicyRequester } from "./services/policy-requester.service";
import { UploadExecutor } from "./services/upload-executor.service";
import { AttachmentService } from "./services/attachment.service";

/**
 * Wires an AttachmentService from configuration. Every dependency is
 * explicit; pass a logger to share one with the host application.
 */
export function createAttachmentService(
  config: EsaConfig = loadConfig(),
  logger: Logger = new Logger(config),
): AttachmentService {
  const client = new EsaClient(config);

  return new AttachmentService(
    logger,
    new FileInspector(logger),
    new PolicyRequester(logger, client, config),
    new UploadExecutor(logger, client),
  );
}

export { EsaConfig, loadConfig, DEFAULT_TEAMS_URL } from "./config";
export { Logger } from "./logger";
export { EsaClient, RawResponse } from "./services/esa-client.service";
export { FileInspector } from "./services/file-inspector.service";
export { PolicyRequester } from "./services/policy-requester.service";
export { UploadExecutor } from "./services/upload-executor.service";
export { AttachmentService, UploadState } from "./services/attachment.service";
export { detectContentType } from "./utils/content-sniffer";
export * from "./errors/esa-error";
export * from "./models/file-metadata.model";
export * from "./models/upload-policy.model";
