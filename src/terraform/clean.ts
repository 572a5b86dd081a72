import { existsSync, readdirSync, rmSync } from "node:fs";
import { join } from "node:path";
import { errorMessage } from "../errors";
import { logger } from "../logger";

const DIRS_TO_REMOVE = new Set([".terraform"]);
const FILES_TO_REMOVE = new Set([
  ".terraform.lock.hcl",
  "backend.tf",
  "terraform.tfstate",
  "terraform.tfstate.backup",
]);

export type CleanResult = {
  removed: string[];
  failed: string[];
};

/**
 * Deletes local Terraform working files under `root`, including those of
 * nested configurations such as `bootstrap/`.
 */
export function cleanTerraformFiles(root: string): CleanResult {
  const result: CleanResult = { removed: [], failed: [] };
  if (existsSync(root)) {
    walk(root, result);
  }
  logger.info(`Clean completed. Removed ${result.removed.length} items.`);
  return result;
}

function walk(dir: string, result: CleanResult) {
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      if (DIRS_TO_REMOVE.has(entry.name)) {
        remove(path, "directory", result);
      } else {
        walk(path, result);
      }
    } else if (FILES_TO_REMOVE.has(entry.name)) {
      remove(path, "file", result);
    }
  }
}

function remove(path: string, kind: "file" | "directory", result: CleanResult) {
  try {
    rmSync(path, { recursive: kind === "directory", force: true });
    logger.info(`Removed ${kind}: ${path}`);
    result.removed.push(path);
  } catch (e: unknown) {
    logger.error(`Failed to remove ${kind} ${path}: ${errorMessage(e)}`);
    result.failed.push(path);
  }
}
