import { createApp } from "@server/index";
import type { GatewayConfig } from "@server/lib/config";
import type { FetchLike } from "@server/lib/drive-client";
import { Hono } from "hono";

export const TEST_API_KEY = "test-api-key";
export const TEST_FOLDER_ID = "test-folder";
export const TEST_DRIVE_BASE_URL = "https://drive.test/drive/v3";

export type FakeDriveOperation = "list" | "search" | "metadata" | "media";

export interface FakeDriveFile {
  id: string;
  name: string;
  mimeType: string;
  parents: string[];
  content?: string | ArrayBuffer;
  shortcutTargetId?: string;
}

export interface FakeDriveCall {
  operation: FakeDriveOperation;
  fileId?: string;
  url: URL;
}

type FakeResponse = { status: number; body: string };

const PARENT_QUERY = /^'((?:[^'\\]|\\.)*)' in parents$/;
const NAME_QUERY =
  /^name = '((?:[^'\\]|\\.)*)' and '((?:[^'\\]|\\.)*)' in parents$/;

function unescapeQueryValue(value: string): string {
  return value.replace(/\\'/g, "'");
}

function toDriveJson(file: FakeDriveFile) {
  return {
    id: file.id,
    name: file.name,
    mimeType: file.mimeType,
    ...(file.shortcutTargetId
      ? { shortcutDetails: { targetId: file.shortcutTargetId } }
      : {}),
  };
}

/**
 * In-process stand-in for the Drive v3 files endpoints.
 * Records every call and can be told to fail an operation.
 */
export function createFakeDrive(initialFiles: FakeDriveFile[] = []) {
  const files = [...initialFiles];
  const calls: FakeDriveCall[] = [];
  const overrides = new Map<FakeDriveOperation, FakeResponse>();

  const app = new Hono();

  app.use("*", async (c, next) => {
    if (c.req.query("key") !== TEST_API_KEY) {
      return c.json({ error: { code: 403, message: "Invalid API key" } }, 403);
    }
    await next();
  });

  app.get("/drive/v3/files", (c) => {
    const q = c.req.query("q") ?? "";
    const nameMatch = NAME_QUERY.exec(q);
    const parentMatch = PARENT_QUERY.exec(q);
    const operation: FakeDriveOperation = nameMatch ? "search" : "list";
    calls.push({ operation, url: new URL(c.req.url) });

    const override = overrides.get(operation);
    if (override) {
      return new Response(override.body, { status: override.status });
    }

    if (nameMatch) {
      const name = unescapeQueryValue(nameMatch[1]);
      const parent = unescapeQueryValue(nameMatch[2]);
      const matches = files.filter(
        (file) => file.name === name && file.parents.includes(parent),
      );
      return c.json({ files: matches.map(toDriveJson) });
    }

    if (parentMatch) {
      const parent = unescapeQueryValue(parentMatch[1]);
      const children = files.filter((file) => file.parents.includes(parent));
      return c.json({ files: children.map(toDriveJson) });
    }

    return c.json({ error: { code: 400, message: `Invalid query: ${q}` } }, 400);
  });

  app.get("/drive/v3/files/:fileId", (c) => {
    const fileId = c.req.param("fileId");
    const operation: FakeDriveOperation =
      c.req.query("alt") === "media" ? "media" : "metadata";
    calls.push({ operation, fileId, url: new URL(c.req.url) });

    const override = overrides.get(operation);
    if (override) {
      return new Response(override.body, { status: override.status });
    }

    const file = files.find((candidate) => candidate.id === fileId);
    if (!file) {
      return c.json({ error: { code: 404, message: "File not found" } }, 404);
    }

    if (operation === "metadata") {
      return c.json(toDriveJson(file));
    }

    if (file.shortcutTargetId || file.content === undefined) {
      return c.json(
        { error: { code: 403, message: "Only files with binary content can be downloaded" } },
        403,
      );
    }
    return c.body(file.content, 200, { "Content-Type": file.mimeType });
  });

  const fetch: FetchLike = async (input, init) => app.request(input, init);

  return {
    fetch,
    calls,
    /** Make every later call of this kind answer with the given status and body. */
    respondWith(operation: FakeDriveOperation, status: number, body = "") {
      overrides.set(operation, { status, body });
    },
    callsOf(operation: FakeDriveOperation) {
      return calls.filter((call) => call.operation === operation);
    },
  };
}

export type FakeDrive = ReturnType<typeof createFakeDrive>;

export function createTestConfig(
  overrides: Partial<GatewayConfig> = {},
): GatewayConfig {
  return {
    apiKey: TEST_API_KEY,
    folderId: TEST_FOLDER_ID,
    driveApiBaseUrl: TEST_DRIVE_BASE_URL,
    requestTimeoutMs: 0,
    host: "127.0.0.1",
    port: 0,
    logRequests: false,
    ...overrides,
  };
}

export function createTestApp(drive: FakeDrive, overrides: Partial<GatewayConfig> = {}) {
  return createApp({ config: createTestConfig(overrides), fetch: drive.fetch });
}

/**
 * Bytes of a small PNG header, as an ArrayBuffer.
 */
export function createTestImageContent(): ArrayBuffer {
  const bytes = [
    0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x0d,
    0x49, 0x48, 0x44, 0x52, 0x00, 0x00, 0x00, 0x01, 0x00, 0x00, 0x00, 0x01,
  ];
  const buffer = new ArrayBuffer(bytes.length);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}
