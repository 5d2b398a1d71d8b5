import type { GatewayConfig } from "@server/lib/config";
import { DriveClient, type FetchLike } from "@server/lib/drive-client";
import {
  driveFailureMessages,
  FILE_NOT_FOUND_MESSAGE,
  INTERNAL_ERROR_MESSAGE,
  INVALID_FILE_NAME_MESSAGE,
  ROUTE_NOT_FOUND_MESSAGE,
} from "@server/lib/errors";
import {
  buildContentDisposition,
  decodeFileName,
  toContentType,
} from "@server/lib/file-names";
import { serveFileByName } from "@server/lib/file-serving";
import {
  renderFolderListing,
  SERVE_ROUTE_PREFIX,
} from "@server/lib/folder-listing";
import { Hono } from "hono";
import { logger } from "hono/logger";

export type AppOptions = {
  config: Readonly<GatewayConfig>;
  // Outbound fetch used for every Drive call; defaults to the global fetch
  fetch?: FetchLike;
};

export function createApp({ config, fetch }: AppOptions) {
  const drive = new DriveClient({
    apiKey: config.apiKey,
    baseUrl: config.driveApiBaseUrl,
    timeoutMs: config.requestTimeoutMs,
    fetch,
  });

  const app = new Hono();

  if (config.logRequests) {
    app.use("*", logger());
  }

  app.notFound((c) => c.text(ROUTE_NOT_FOUND_MESSAGE, 404));

  app.onError((error, c) => {
    console.error("Unhandled error:", error);
    return c.text(INTERNAL_ERROR_MESSAGE, 500);
  });

  // Methods are not distinguished; every route behaves as GET.
  app
    .all(SERVE_ROUTE_PREFIX, async (c) => {
      const result = await drive.listFolder(config.folderId);
      if (!result.ok) {
        console.error("Error listing folder:", result.error);
        return c.text(driveFailureMessages.list, 500);
      }

      return c.html(await renderFolderListing(result.value));
    })
    // Serve a file by name: /files/{percent-encoded name}
    .all(`${SERVE_ROUTE_PREFIX}*`, async (c) => {
      // Hono's own path is partially decoded; take the raw one from the URL
      const { pathname } = new URL(c.req.url);
      if (!pathname.startsWith(SERVE_ROUTE_PREFIX)) {
        return c.notFound();
      }

      const fileName = decodeFileName(
        pathname.slice(SERVE_ROUTE_PREFIX.length),
      );
      if (fileName === null) {
        return c.text(INVALID_FILE_NAME_MESSAGE, 400);
      }

      const result = await serveFileByName(drive, config.folderId, fileName);
      if (!result.ok) {
        if (result.notFound) {
          return c.text(FILE_NOT_FOUND_MESSAGE, 404);
        }
        console.error(`Error serving file "${fileName}":`, result.error);
        return c.text(driveFailureMessages[result.error.operation], 500);
      }

      const { file, content } = result.value;
      const headers = new Headers({
        "Content-Type": toContentType(file.mimeType),
        "Content-Disposition": buildContentDisposition(file.name),
        "Content-Length": content.byteLength.toString(),
      });

      return new Response(content, { headers });
    });

  return app;
}
