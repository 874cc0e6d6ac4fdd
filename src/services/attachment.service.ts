import { Logger } from "../logger";
import { FileInspector } from "./file-inspector.service";
import { PolicyRequester } from "./policy-requester.service";
import { UploadExecutor } from "./upload-executor.service";
import {
  STAGE_ERRORS,
  UploadStage,
  UploadStageError,
  errorMessage,
} from "../errors/esa-error";

export type UploadState =
  | "start"
  | "inspecting"
  | "requesting-policy"
  | "uploading"
  | "done"
  | "failed";

const STAGE_STATES: Record<UploadStage, UploadState> = {
  inspect: "inspecting",
  policy: "requesting-policy",
  upload: "uploading",
};

/**
 * Uploads local files as esa attachments: inspect the file, obtain a fresh
 * policy, post the bytes to object storage. Steps run strictly in order and
 * the first failure ends the attempt. Nothing is retried.
 */
export class AttachmentService {
  private logger: Logger;
  private fileInspector: FileInspector;
  private policyRequester: PolicyRequester;
  private uploadExecutor: UploadExecutor;

  constructor(
    logger: Logger,
    fileInspector: FileInspector,
    policyRequester: PolicyRequester,
    uploadExecutor: UploadExecutor,
  ) {
    this.logger = logger;
    this.fileInspector = fileInspector;
    this.policyRequester = policyRequester;
    this.uploadExecutor = uploadExecutor;
  }

  /**
   * Resolves with the public URL of the uploaded object.
   *
   * Rejects with the FileError, PolicyError or UploadError of the stage that
   * failed, carrying the team and path in its message and details.
   */
  public async uploadAttachmentFile(
    teamName: string,
    filePath: string,
  ): Promise<string> {
    const context = { team: teamName, path: filePath };

    const { metadata, content } = await this.runStage("inspect", context, () =>
      this.fileInspector.inspect(filePath),
    );

    const policy = await this.runStage("policy", context, () =>
      this.policyRequester.requestPolicy(teamName, metadata),
    );

    const url = await this.runStage("upload", context, () =>
      this.uploadExecutor.execute(policy, metadata.name, content),
    );

    this.transition("uploading", "done", context);
    this.logger.info(`Uploaded "${metadata.name}" to team "${teamName}"`, {
      ...context,
      url,
      size: metadata.size,
    });

    return url;
  }

  // ── private ──

  private async runStage<T>(
    stage: UploadStage,
    context: { team: string; path: string },
    step: () => Promise<T>,
  ): Promise<T> {
    const state = STAGE_STATES[stage];
    this.transition(this.previousState(stage), state, context);

    try {
      return await step();
    } catch (err) {
      this.transition(state, "failed", context);
      throw this.withContext(stage, context, err);
    }
  }

  private previousState(stage: UploadStage): UploadState {
    switch (stage) {
      case "inspect":
        return "start";
      case "policy":
        return "inspecting";
      case "upload":
        return "requesting-policy";
    }
  }

  private transition(
    from: UploadState,
    to: UploadState,
    context: { team: string; path: string },
  ): void {
    this.logger.debug(`Attachment upload ${from} -> ${to}`, { ...context });
  }

  /**
   * Re-raises a stage failure as that stage's error class with the upload
   * inputs added, keeping the original as `cause`.
   */
  private withContext(
    stage: UploadStage,
    context: { team: string; path: string },
    err: unknown,
  ): UploadStageError {
    const ErrorClass = STAGE_ERRORS[stage];
    const details = err instanceof UploadStageError ? err.details : {};

    return new ErrorClass(
      `Uploading "${context.path}" to team "${context.team}" failed at ${stage} stage: ${errorMessage(err)}`,
      { ...details, ...context, stage },
      { cause: err },
    );
  }
}
