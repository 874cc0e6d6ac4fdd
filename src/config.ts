import {
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  validateSync,
} from "class-validator";
import { plainToInstance } from "class-transformer";

export const DEFAULT_TEAMS_URL = "https://api.esa.io/v1/teams";

export class EsaConfig {
  @IsString()
  nodeEnv: string = "development";

  @IsString()
  logLevel: string = "info";

  /** Base URL that team-scoped API paths are appended to. */
  @IsString()
  @IsNotEmpty()
  teamsUrl: string = DEFAULT_TEAMS_URL;

  @IsString()
  @IsOptional()
  accessToken?: string;

  /** Per-request timeout in milliseconds (default 30 s). */
  @IsNumber()
  @IsPositive()
  requestTimeoutMs: number = 30_000;

  get isProduction(): boolean {
    return this.nodeEnv === "production";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EsaConfig {
  const raw = {
    nodeEnv: env.NODE_ENV || "development",
    logLevel: env.LOG_LEVEL || "info",
    teamsUrl: (env.ESA_TEAMS_URL || DEFAULT_TEAMS_URL).replace(/\/+$/, ""),
    accessToken: env.ESA_ACCESS_TOKEN || undefined,
    requestTimeoutMs: env.REQUEST_TIMEOUT_MS
      ? Number(env.REQUEST_TIMEOUT_MS)
      : 30_000,
  };

  const config = plainToInstance(EsaConfig, raw);
  const errors = validateSync(config, { whitelist: true });

  if (errors.length > 0) {
    const messages = errors.map((e) =>
      Object.values(e.constraints || {}).join(", "),
    );
    throw new Error(`Invalid configuration:\n  ${messages.join("\n  ")}`);
  }

  return config;
}
