import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { AttachmentService } from "../attachment.service";
import { FileInspector } from "../file-inspector.service";
import { PolicyRequester } from "../policy-requester.service";
import { UploadExecutor } from "../upload-executor.service";
import { EsaClient } from "../esa-client.service";
import { Logger } from "../../logger";
import { EsaConfig } from "../../config";
import {
  FileError,
  PolicyError,
  UploadError,
} from "../../errors/esa-error";
import { StubEsaServer } from "../../__tests__/helpers/stub-esa-server";

// ── Helpers ─────────────────────────────────────────────────────────────

const mockLogger: Logger = {
  info: jest.fn(),
  error: jest.fn(),
  warn: jest.fn(),
  debug: jest.fn(),
} as unknown as Logger;

function makeConfig(overrides: Partial<EsaConfig> = {}): EsaConfig {
  return {
    accessToken: "test-token",
    requestTimeoutMs: 5_000,
    ...overrides,
  } as EsaConfig;
}

function makeService(config: EsaConfig): AttachmentService {
  const client = new EsaClient(config);
  return new AttachmentService(
    mockLogger,
    new FileInspector(mockLogger),
    new PolicyRequester(mockLogger, client, config),
    new UploadExecutor(mockLogger, client),
  );
}

// ── Tests ───────────────────────────────────────────────────────────────

describe("AttachmentService", () => {
  let stub: StubEsaServer;
  let service: AttachmentService;
  let workDir: string;
  let helloPath: string;

  beforeEach(async () => {
    jest.clearAllMocks();
    stub = new StubEsaServer();
    await stub.start();
    service = makeService(makeConfig({ teamsUrl: stub.teamsUrl }));

    workDir = fs.mkdtempSync(path.join(os.tmpdir(), "esa-upload-"));
    helloPath = path.join(workDir, "hello.txt");
    fs.writeFileSync(helloPath, "hello esa\n");
  });

  afterEach(async () => {
    await stub.stop();
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  // ─── end to end ───────────────────────────────────────────────────

  describe("uploadAttachmentFile – success", () => {
    it("should return the public URL from the policy", async () => {
      stub.policyReply = JSON.stringify({
        attachment: { endpoint: stub.endpoint, url: "http://x/pub/hello.txt" },
        form: {
          AWSAccessKeyId: "test-access-key",
          signature: "test-signature",
          policy: "test-policy",
          key: "uploads/hello.txt",
          "Content-Type": "text/plain; charset=utf-8",
          "Cache-Control": "max-age=31536000",
          "Content-Disposition": 'inline; filename="hello.txt"',
          acl: "public-read",
        },
      });

      const url = await service.uploadAttachmentFile("acme", helloPath);

      expect(url).toBe("http://x/pub/hello.txt");
    });

    it("should report the file metadata and then upload its bytes", async () => {
      await service.uploadAttachmentFile("acme", helloPath);

      expect(stub.policyRequests).toHaveLength(1);
      expect(stub.policyRequests[0].team).toBe("acme");
      expect(stub.policyRequests[0].form).toEqual({
        type: "text/plain; charset=utf-8",
        name: "hello.txt",
        size: "10",
      });

      expect(stub.uploads).toHaveLength(1);
      const filePart = stub.uploads[0].parts[8];
      expect(filePart.filename).toBe("hello.txt");
      expect(filePart.data).toEqual(Buffer.from("hello esa\n"));
    });

    it("should post back the key issued by the policy", async () => {
      const url = await service.uploadAttachmentFile("acme", helloPath);

      const keyPart = stub.uploads[0].parts.find((p) => p.name === "key");
      expect(url).toBe(`${stub.url}/pub/${keyPart?.value}`);
    });

    it("should obtain a new policy and URL for every upload", async () => {
      const first = await service.uploadAttachmentFile("acme", helloPath);
      const second = await service.uploadAttachmentFile("acme", helloPath);

      expect(stub.policyRequests).toHaveLength(2);
      expect(second).not.toBe(first);
    });

    it("should log each state transition and the result", async () => {
      const url = await service.uploadAttachmentFile("acme", helloPath);
      const context = { team: "acme", path: helloPath };

      const transitions = jest
        .mocked(mockLogger.debug)
        .mock.calls.map(([message]) => message)
        .filter((message) => message.startsWith("Attachment upload"));
      expect(transitions).toEqual([
        "Attachment upload start -> inspecting",
        "Attachment upload inspecting -> requesting-policy",
        "Attachment upload requesting-policy -> uploading",
        "Attachment upload uploading -> done",
      ]);
      expect(mockLogger.info).toHaveBeenCalledWith(
        'Uploaded "hello.txt" to team "acme"',
        { ...context, url, size: 10 },
      );
    });
  });

  // ─── failures ─────────────────────────────────────────────────────

  describe("uploadAttachmentFile – failures", () => {
    it("should stop at inspection when the file is missing", async () => {
      const missing = path.join(workDir, "missing.txt");

      const err = await service
        .uploadAttachmentFile("acme", missing)
        .catch((e) => e);

      expect(err).toBeInstanceOf(FileError);
      expect(err.message).toMatch(
        new RegExp(
          `^Uploading "${escapeRegExp(missing)}" to team "acme" failed at inspect stage: Cannot open`,
        ),
      );
      expect(err.details).toEqual({
        path: missing,
        team: "acme",
        stage: "inspect",
      });
      expect(err.cause).toBeInstanceOf(FileError);
      expect(stub.policyRequests).toHaveLength(0);
      expect(stub.uploads).toHaveLength(0);
    });

    it("should stop at the policy stage when esa rejects the request", async () => {
      stub.policyStatus = 401;

      const err = await service
        .uploadAttachmentFile("acme", helloPath)
        .catch((e) => e);

      expect(err).toBeInstanceOf(PolicyError);
      expect(err.message).toContain("failed at policy stage");
      expect(err.message).toContain("401 Unauthorized");
      expect(err.details).toMatchObject({
        team: "acme",
        path: helloPath,
        stage: "policy",
        name: "hello.txt",
        size: "10",
      });
      expect(stub.uploads).toHaveLength(0);
    });

    it("should report the upload stage when object storage refuses", async () => {
      stub.uploadStatus = 403;

      const err = await service
        .uploadAttachmentFile("acme", helloPath)
        .catch((e) => e);

      expect(err).toBeInstanceOf(UploadError);
      expect(err.message).toBe(
        `Uploading "${helloPath}" to team "acme" failed at upload stage: Upload to ${stub.endpoint} failed: Forbidden`,
      );
      expect(err.details).toMatchObject({
        endpoint: stub.endpoint,
        statusCode: 403,
        stage: "upload",
      });
      expect(err.cause).toBeInstanceOf(UploadError);
    });

    it("should wrap unexpected errors in the failing stage's error", async () => {
      const boom = new Error("disk on fire");
      const inspector = {
        inspect: jest.fn().mockRejectedValue(boom),
      } as unknown as FileInspector;
      const requester = {
        requestPolicy: jest.fn(),
      } as unknown as PolicyRequester;
      const executor = { execute: jest.fn() } as unknown as UploadExecutor;
      const isolated = new AttachmentService(
        mockLogger,
        inspector,
        requester,
        executor,
      );

      const err = await isolated
        .uploadAttachmentFile("acme", "notes.md")
        .catch((e) => e);

      expect(err).toBeInstanceOf(FileError);
      expect(err.message).toBe(
        'Uploading "notes.md" to team "acme" failed at inspect stage: disk on fire',
      );
      expect(err.cause).toBe(boom);
      expect(requester.requestPolicy).not.toHaveBeenCalled();
      expect(executor.execute).not.toHaveBeenCalled();
    });

    it("should record the failed state without logging an error", async () => {
      stub.uploadStatus = 403;

      await service
        .uploadAttachmentFile("acme", helloPath)
        .catch(() => undefined);

      expect(mockLogger.debug).toHaveBeenCalledWith(
        "Attachment upload uploading -> failed",
        { team: "acme", path: helloPath },
      );
      expect(mockLogger.error).not.toHaveBeenCalled();
      expect(mockLogger.info).not.toHaveBeenCalled();
    });
  });
});

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
