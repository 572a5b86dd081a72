import { existsSync, mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { logger } from "../logger";

export const BACKEND_FILE_NAME = "backend.tf";

export type BackendDescriptorOptions = {
  bucket: string;
  region: string;
  accountId: string;
  safeName: string;
};

/**
 * Renders the `backend "s3"` block the target configuration is initialized
 * against. State locking uses S3 lock files, so no DynamoDB table is needed.
 */
export function buildBackendDescriptor({
  bucket,
  region,
  accountId,
  safeName,
}: BackendDescriptorOptions) {
  return `terraform {
  backend "s3" {
    bucket = "${bucket}"
    key    = "terraform.${accountId}-${region}-${safeName}.tfstate"
    region = "${region}"
    encrypt = true
    use_lockfile = true
  }
}
`;
}

export function backendFilePath(directory: string) {
  return join(directory, BACKEND_FILE_NAME);
}

export function writeBackendDescriptor(directory: string, content: string) {
  mkdirSync(directory, { recursive: true });
  const path = backendFilePath(directory);
  writeFileSync(path, content);
  logger.info(`Wrote ${path}`);
  return path;
}

export function eraseBackendDescriptor(directory: string) {
  const path = backendFilePath(directory);
  if (!existsSync(path)) {
    return false;
  }
  rmSync(path);
  logger.info(`Erased ${path}`);
  return true;
}

/**
 * Extracts the bucket name from descriptors stored before the bucket name was
 * kept alongside the record.
 */
export function parseLegacyBucket(content: string): string | undefined {
  return /bucket\s*=\s*"([^"]+)"/.exec(content)?.[1];
}
