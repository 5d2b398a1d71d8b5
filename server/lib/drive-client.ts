/**
 * Drive Client
 *
 * Thin wrapper over the three Drive v3 endpoints the gateway needs:
 * files.list (by parent, optionally by name), files.get (metadata) and
 * files.get with alt=media (content). Every call resolves to a DriveResult
 * instead of throwing, so callers can short-circuit on the first failure.
 */

import { z } from "zod";

export const DEFAULT_DRIVE_API_BASE_URL = "https://www.googleapis.com/drive/v3";

const FILE_FIELDS =
  "id,name,mimeType,webViewLink,webContentLink,shortcutDetails(targetId)";

export const driveFileSchema = z.object({
  id: z.string(),
  name: z.string(),
  mimeType: z.string(),
  webViewLink: z.string().optional(),
  webContentLink: z.string().optional(),
  shortcutDetails: z.object({ targetId: z.string() }).optional(),
});

export const driveFileListSchema = z.object({
  files: z.array(driveFileSchema).default([]),
});

export type DriveFile = z.infer<typeof driveFileSchema>;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * The call site a result came from. Used to pick the caller-facing message.
 */
export type DriveOperation = "list" | "search" | "resolve" | "download";

export type DriveFailureReason = "status" | "network" | "invalid_response";

export interface DriveFailure {
  operation: DriveOperation;
  reason: DriveFailureReason;
  status?: number;
  detail: string;
}

export type DriveResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: DriveFailure };

export interface DriveClientOptions {
  apiKey: string;
  baseUrl?: string;
  /** Per-call cap in milliseconds; 0 disables it. */
  timeoutMs?: number;
  fetch?: FetchLike;
}

/**
 * Escape a value for a single-quoted string literal in a Drive query.
 * Only the single quote is escaped.
 */
export function escapeQueryValue(value: string): string {
  return value.replace(/'/g, "\\'");
}

export function parentQuery(folderId: string): string {
  return `'${escapeQueryValue(folderId)}' in parents`;
}

export function nameInParentQuery(name: string, folderId: string): string {
  return `name = '${escapeQueryValue(name)}' and ${parentQuery(folderId)}`;
}

export class DriveClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: DriveClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? DEFAULT_DRIVE_API_BASE_URL).replace(
      /\/+$/,
      "",
    );
    this.timeoutMs = options.timeoutMs ?? 0;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * List every entry whose parent is the given folder, in provider order.
   */
  async listFolder(folderId: string): Promise<DriveResult<DriveFile[]>> {
    const url = this.buildUrl("/files", {
      q: parentQuery(folderId),
      fields: `files(${FILE_FIELDS})`,
      includeItemsFromAllDrives: "true",
    });

    const result = await this.getJson("list", url, driveFileListSchema);
    if (!result.ok) {
      return result;
    }
    return { ok: true, value: result.value.files };
  }

  /**
   * Find an entry by exact name inside the folder. When the provider
   * returns several, the first one wins; null when there are none.
   */
  async findByName(
    folderId: string,
    name: string,
  ): Promise<DriveResult<DriveFile | null>> {
    const url = this.buildUrl("/files", {
      q: nameInParentQuery(name, folderId),
      fields: `files(${FILE_FIELDS})`,
      includeItemsFromAllDrives: "true",
    });

    const result = await this.getJson("search", url, driveFileListSchema);
    if (!result.ok) {
      return result;
    }
    return { ok: true, value: result.value.files[0] ?? null };
  }

  /**
   * Fetch a single entry's metadata by id.
   */
  async getFile(fileId: string): Promise<DriveResult<DriveFile>> {
    const url = this.buildUrl(`/files/${encodeURIComponent(fileId)}`, {
      fields: FILE_FIELDS,
      includeItemsFromAllDrives: "true",
    });

    return this.getJson("resolve", url, driveFileSchema);
  }

  /**
   * Download an entry's content. The body is read to the end before the
   * result resolves, so a failed read never yields partial bytes.
   */
  async download(fileId: string): Promise<DriveResult<ArrayBuffer>> {
    const url = this.buildUrl(`/files/${encodeURIComponent(fileId)}`, {
      alt: "media",
      includeItemsFromAllDrives: "true",
    });

    const sent = await this.send("download", url);
    if (!sent.ok) {
      return sent;
    }

    try {
      return { ok: true, value: await sent.value.arrayBuffer() };
    } catch (error) {
      return {
        ok: false,
        error: {
          operation: "download",
          reason: "network",
          detail: describeError(error),
        },
      };
    }
  }

  private buildUrl(path: string, params: Record<string, string>): string {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    url.searchParams.set("supportsAllDrives", "true");
    url.searchParams.set("key", this.apiKey);
    return url.toString();
  }

  private async send(
    operation: DriveOperation,
    url: string,
  ): Promise<DriveResult<Response>> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "GET",
        signal:
          this.timeoutMs > 0 ? AbortSignal.timeout(this.timeoutMs) : undefined,
      });
    } catch (error) {
      return {
        ok: false,
        error: { operation, reason: "network", detail: describeError(error) },
      };
    }

    if (!response.ok) {
      // Release the connection; the error body is not forwarded.
      try {
        await response.body?.cancel();
      } catch (error) {
        console.warn("Failed to release Drive error response:", error);
      }
      return {
        ok: false,
        error: {
          operation,
          reason: "status",
          status: response.status,
          detail: `Drive API responded with ${response.status}`,
        },
      };
    }

    return { ok: true, value: response };
  }

  private async getJson<S extends z.ZodTypeAny>(
    operation: DriveOperation,
    url: string,
    schema: S,
  ): Promise<DriveResult<z.output<S>>> {
    const sent = await this.send(operation, url);
    if (!sent.ok) {
      return sent;
    }

    let body: unknown;
    try {
      body = await sent.value.json();
    } catch (error) {
      return {
        ok: false,
        error: {
          operation,
          reason: "invalid_response",
          detail: describeError(error),
        },
      };
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      return {
        ok: false,
        error: {
          operation,
          reason: "invalid_response",
          detail: parsed.error.message,
        },
      };
    }
    return { ok: true, value: parsed.data };
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
