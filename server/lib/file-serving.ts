/**
 * File Serving Service
 *
 * Resolves a file name inside the configured folder to downloadable content:
 * search by name, follow a shortcut to its target when there is one, then
 * download. Each step short-circuits on failure.
 */

import type {
  DriveClient,
  DriveFailure,
  DriveFile,
  DriveResult,
} from "@server/lib/drive-client";

export type ServedFile = {
  file: DriveFile;
  content: ArrayBuffer;
};

export type ServeFileResult =
  | { ok: true; value: ServedFile }
  | { ok: false; notFound: true }
  | { ok: false; notFound: false; error: DriveFailure };

/**
 * Look up a file by name and follow it when it is a shortcut.
 * Returns the metadata of the entry whose content should be served,
 * or null when nothing in the folder has that name.
 */
export async function resolveFileByName(
  drive: DriveClient,
  folderId: string,
  fileName: string,
): Promise<DriveResult<DriveFile | null>> {
  const search = await drive.findByName(folderId, fileName);
  if (!search.ok || search.value === null) {
    return search;
  }

  const match = search.value;
  if (!match.shortcutDetails) {
    return search;
  }

  const targetId = match.shortcutDetails.targetId;
  console.debug(`File is a shortcut, resolving target ID: ${targetId}`);
  return drive.getFile(targetId);
}

/**
 * Resolve a file by name and download its content.
 */
export async function serveFileByName(
  drive: DriveClient,
  folderId: string,
  fileName: string,
): Promise<ServeFileResult> {
  const resolved = await resolveFileByName(drive, folderId, fileName);
  if (!resolved.ok) {
    return { ok: false, notFound: false, error: resolved.error };
  }
  if (resolved.value === null) {
    return { ok: false, notFound: true };
  }

  const file = resolved.value;
  const download = await drive.download(file.id);
  if (!download.ok) {
    return { ok: false, notFound: false, error: download.error };
  }

  return { ok: true, value: { file, content: download.value } };
}
