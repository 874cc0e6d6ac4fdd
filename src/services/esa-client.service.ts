import * as http from "http";
import axios, { AxiosInstance } from "axios";
import { EsaConfig } from "../config";
import {
  HttpStatusError,
  MalformedResponseError,
} from "../errors/esa-error";

export interface RawResponse {
  status: number;
  statusText: string;
}

/** Standard reason phrase for a status code, e.g. 403 → "Forbidden". */
export function statusText(status: number): string {
  return http.STATUS_CODES[status] ?? `Status ${status}`;
}

/**
 * HTTP collaborator shared by the esa services.
 *
 * `api` talks to the esa REST API and carries the access token. `raw` is
 * used for third-party endpoints handed out by esa (object storage), which
 * must never receive esa credentials.
 */
export class EsaClient {
  private api: AxiosInstance;
  private raw: AxiosInstance;

  constructor(config: EsaConfig) {
    this.api = axios.create({
      timeout: config.requestTimeoutMs,
      headers: {
        "User-Agent": "esa-attachments",
        ...(config.accessToken && {
          Authorization: `Bearer ${config.accessToken}`,
        }),
      },
      responseType: "text",
    });

    this.raw = axios.create({
      timeout: config.requestTimeoutMs,
      responseType: "arraybuffer",
      validateStatus: () => true,
    });
  }

  /**
   * POSTs `body` and decodes the JSON reply.
   * Non-2xx replies reject with HttpStatusError, unparseable bodies with
   * MalformedResponseError; transport errors propagate unchanged.
   */
  public async post(
    url: string,
    contentType: string,
    body: string,
  ): Promise<unknown> {
    let text: string;
    try {
      const res = await this.api.post<string>(url, body, {
        headers: { "Content-Type": contentType },
      });
      text = res.data;
    } catch (err) {
      if (axios.isAxiosError(err) && err.response) {
        throw new HttpStatusError(
          url,
          err.response.status,
          statusText(err.response.status),
        );
      }
      throw err;
    }

    try {
      return JSON.parse(text);
    } catch (err) {
      throw new MalformedResponseError(url, err);
    }
  }

  /**
   * POSTs `body` without esa credentials and resolves with the status
   * whatever it is. The response body is read to the end and dropped.
   */
  public async postRaw(
    url: string,
    body: FormData,
  ): Promise<RawResponse> {
    const res = await this.raw.post(url, body);
    return { status: res.status, statusText: statusText(res.status) };
  }
}
