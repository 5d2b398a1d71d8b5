import type { DriveFile } from "@server/lib/drive-client";
import { encodeFileName } from "@server/lib/file-names";
import { html } from "hono/html";

export const SERVE_ROUTE_PREFIX = "/files/";

// URL parsers drop these as dot segments, even percent-encoded
const UNLINKABLE_NAMES = new Set([".", ".."]);

function renderFileName(name: string) {
  if (UNLINKABLE_NAMES.has(name)) {
    return html`<span>${name}</span>`;
  }
  return html`<a href="${SERVE_ROUTE_PREFIX}${encodeFileName(name)}">${name}</a>`;
}

function renderFileBlock(file: DriveFile) {
  return html`
    <div class="file">
      <div class="file-name">
        ${renderFileName(file.name)}
      </div>
      <div class="file-type">${file.mimeType}</div>
    </div>
`;
}

/**
 * Render the folder contents as an HTML page, one block per entry,
 * in the order the provider returned them.
 */
export async function renderFolderListing(files: DriveFile[]): Promise<string> {
  const page = await html`<!DOCTYPE html>
<html>
  <head>
    <meta charset="utf-8" />
    <title>Drive Files</title>
    <style>
      body { font-family: Arial, sans-serif; margin: 40px; }
      .file { margin: 10px 0; padding: 10px; border: 1px solid #ddd; border-radius: 5px; }
      .file-name { font-weight: bold; }
      .file-type { color: #666; font-size: 0.9em; }
      a { text-decoration: none; color: #1976d2; }
      a:hover { text-decoration: underline; }
    </style>
  </head>
  <body>
    <h1>Files in Drive Folder</h1>
${files.map(renderFileBlock)}
  </body>
</html>
`;
  return page.toString();
}
