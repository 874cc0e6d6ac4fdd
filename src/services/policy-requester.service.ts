import { Logger } from "../logger";
import { EsaConfig } from "../config";
import { EsaClient } from "./esa-client.service";
import { PolicyError, errorMessage } from "../errors/esa-error";
import { FileMetadata } from "../models/file-metadata.model";
import { UploadPolicy } from "../models/upload-policy.model";
import { UploadPolicyResponseDto } from "../dtos/upload-policy.dto";
import { isPlainObject, validateDto } from "../utils/validate";

export const ATTACHMENT_POLICY_PATH = "/attachments/policies";
export const POLICY_BODY_TYPE = "application/x-www-form-urlencoded";

/**
 * Asks esa for a presigned-POST policy for one file.
 */
export class PolicyRequester {
  private logger: Logger;
  private client: EsaClient;
  private teamsUrl: string;

  constructor(logger: Logger, client: EsaClient, config: EsaConfig) {
    this.logger = logger;
    this.client = client;
    this.teamsUrl = config.teamsUrl;
  }

  public policyUrl(teamName: string): string {
    return `${this.teamsUrl}/${teamName}${ATTACHMENT_POLICY_PATH}`;
  }

  public async requestPolicy(
    teamName: string,
    metadata: FileMetadata,
  ): Promise<UploadPolicy> {
    const url = this.policyUrl(teamName);
    const form = {
      type: metadata.type,
      name: metadata.name,
      size: String(metadata.size),
    };
    const context = { team: teamName, url, ...form };

    this.logger.debug(`Requesting attachment policy for team "${teamName}"`, {
      ...context,
    });

    let body: unknown;
    try {
      body = await this.client.post(
        url,
        POLICY_BODY_TYPE,
        new URLSearchParams(form).toString(),
      );
    } catch (err) {
      throw new PolicyError(
        `Policy request for team "${teamName}" failed: ${errorMessage(err)}`,
        context,
        { cause: err },
      );
    }

    return this.toPolicy(body, teamName, context);
  }

  // ── private ──

  private async toPolicy(
    body: unknown,
    teamName: string,
    context: Record<string, unknown>,
  ): Promise<UploadPolicy> {
    if (!isPlainObject(body)) {
      throw new PolicyError(
        `Policy response for team "${teamName}" is not a JSON object`,
        context,
      );
    }

    const { instance, errors } = await validateDto(
      UploadPolicyResponseDto,
      body,
    );
    if (errors.length > 0) {
      throw new PolicyError(
        `Policy response for team "${teamName}" does not match the expected schema: ${errors.join("; ")}`,
        { ...context, violations: errors },
      );
    }

    return {
      attachment: {
        endpoint: instance.attachment.endpoint,
        url: instance.attachment.url,
      },
      form: {
        awsAccessKeyId: instance.form.awsAccessKeyId,
        signature: instance.form.signature,
        policy: instance.form.policy,
        key: instance.form.key,
        contentType: instance.form.contentType,
        cacheControl: instance.form.cacheControl,
        contentDisposition: instance.form.contentDisposition,
        acl: instance.form.acl,
      },
    };
  }
}
