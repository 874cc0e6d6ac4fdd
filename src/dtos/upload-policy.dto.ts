import "reflect-metadata";
import { Expose, Type } from "class-transformer";
import {
  IsDefined,
  IsNotEmpty,
  IsObject,
  IsString,
  ValidateNested,
} from "class-validator";

// The policy endpoint is an undocumented beta API, so its reply is checked
// field by field instead of being trusted to match.

export class PolicyAttachmentDto {
  @IsString()
  @IsNotEmpty()
  endpoint!: string;

  @IsString()
  @IsNotEmpty()
  url!: string;
}

export class PolicyFormDto {
  @Expose({ name: "AWSAccessKeyId" })
  @IsString()
  awsAccessKeyId!: string;

  @IsString()
  signature!: string;

  @IsString()
  policy!: string;

  @IsString()
  key!: string;

  @Expose({ name: "Content-Type" })
  @IsString()
  contentType!: string;

  @Expose({ name: "Cache-Control" })
  @IsString()
  cacheControl!: string;

  @Expose({ name: "Content-Disposition" })
  @IsString()
  contentDisposition!: string;

  @IsString()
  acl!: string;
}

export class UploadPolicyResponseDto {
  @IsDefined()
  @IsObject()
  @ValidateNested()
  @Type(() => PolicyAttachmentDto)
  attachment!: PolicyAttachmentDto;

  @IsDefined()
  @IsObject()
  @ValidateNested()
  @Type(() => PolicyFormDto)
  form!: PolicyFormDto;
}
