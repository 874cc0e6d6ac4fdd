import { Logger } from "../logger";
import { EsaClient, RawResponse } from "./esa-client.service";
import { UploadError, errorMessage } from "../errors/esa-error";
import { PolicyForm, UploadPolicy } from "../models/upload-policy.model";

/** Object storage answers a successful presigned POST with 204 No Content. */
export const UPLOAD_SUCCESS_STATUS = 204;

/**
 * Form field names in the order they precede the file part.
 */
export const POLICY_FORM_FIELDS: ReadonlyArray<[string, keyof PolicyForm]> = [
  ["AWSAccessKeyId", "awsAccessKeyId"],
  ["signature", "signature"],
  ["policy", "policy"],
  ["key", "key"],
  ["Content-Type", "contentType"],
  ["Cache-Control", "cacheControl"],
  ["Content-Disposition", "contentDisposition"],
  ["acl", "acl"],
];

export class UploadExecutor {
  private logger: Logger;
  private client: EsaClient;

  constructor(logger: Logger, client: EsaClient) {
    this.logger = logger;
    this.client = client;
  }

  /**
   * Posts the policy fields and the file to the policy's endpoint and
   * resolves with the public URL esa assigned to the object.
   */
  public async execute(
    policy: UploadPolicy,
    fileName: string,
    content: Buffer,
  ): Promise<string> {
    const { endpoint } = policy.attachment;
    const context = { endpoint, key: policy.form.key, fileName };

    this.logger.debug(`Uploading "${fileName}" to ${endpoint}`, {
      ...context,
      size: content.length,
    });

    let res: RawResponse;
    try {
      res = await this.client.postRaw(
        endpoint,
        this.buildForm(policy.form, fileName, content),
      );
    } catch (err) {
      throw new UploadError(
        `Upload to ${endpoint} failed: ${errorMessage(err)}`,
        context,
        { cause: err },
      );
    }

    if (res.status !== UPLOAD_SUCCESS_STATUS) {
      throw new UploadError(`Upload to ${endpoint} failed: ${res.statusText}`, {
        ...context,
        statusCode: res.status,
      });
    }

    return policy.attachment.url;
  }

  public buildForm(
    form: PolicyForm,
    fileName: string,
    content: Buffer,
  ): FormData {
    const data = new FormData();
    for (const [field, property] of POLICY_FORM_FIELDS) {
      data.append(field, form[property]);
    }
    data.append("file", new Blob([content]), fileName);
    return data;
  }
}
