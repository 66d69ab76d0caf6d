import { cpSync, rmSync } from "node:fs";

/**
 * Replaces `targetDir` with a fresh copy of `sourceDir`'s contents, so files
 * removed from the source do not linger from an earlier bundle.
 */
export const copyLicenseCatalog = (sourceDir: string, targetDir: string): void => {
  rmSync(targetDir, { recursive: true, force: true });
  cpSync(sourceDir, targetDir, { recursive: true });
};
