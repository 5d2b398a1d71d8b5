import type { DriveOperation } from "@server/lib/drive-client";

// Upstream status codes are logged, never forwarded to the caller.
export const driveFailureMessages: Record<DriveOperation, string> = {
  list: "Failed to fetch files from Google Drive",
  search: "Failed to search for file",
  resolve: "Failed to fetch target file of shortcut",
  download: "Failed to download file",
};

export const FILE_NOT_FOUND_MESSAGE = "File not found";
export const INVALID_FILE_NAME_MESSAGE = "Invalid file name encoding";
export const ROUTE_NOT_FOUND_MESSAGE = "Not found";
export const INTERNAL_ERROR_MESSAGE = "Internal server error";
