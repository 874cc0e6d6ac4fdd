export interface PolicyAttachment {
  /** Object-storage URL the multipart form is posted to. */
  readonly endpoint: string;
  /** Public URL of the object once the upload succeeds. */
  readonly url: string;
}

/** Presigned-POST fields, posted back verbatim. */
export interface PolicyForm {
  readonly awsAccessKeyId: string;
  readonly signature: string;
  readonly policy: string;
  readonly key: string;
  readonly contentType: string;
  readonly cacheControl: string;
  readonly contentDisposition: string;
  readonly acl: string;
}

/** Valid for a single upload attempt. */
export interface UploadPolicy {
  readonly attachment: PolicyAttachment;
  readonly form: PolicyForm;
}
