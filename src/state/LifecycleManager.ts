import { DeleteBucketCommand, type S3Client } from "@aws-sdk/client-s3";
import { defaultBucketName, terraformVars, type RunContext } from "../context";
import {
  ResourceCleanupWarning,
  TerraformError,
  errorMessage,
} from "../errors";
import { logger } from "../logger";
import type { Terraform } from "../terraform/Terraform";
import { eraseBackendDescriptor, parseLegacyBucket } from "./BackendDescriptor";
import type { BackendResolver } from "./BackendResolver";
import type { BackendStore } from "./BackendStore";
import { findBootstrapDir } from "./Bootstrapper";
import type { BucketPurger, PurgeSummary } from "./BucketPurger";

export type BucketSource = "tag" | "record" | "default";

export type TeardownReport = {
  bucket: string;
  bucketSource: BucketSource;
  recordDeleted: boolean;
  bucketDeleted: boolean;
  purge: PurgeSummary;
  warnings: ResourceCleanupWarning[];
};

/**
 * Initializes the target directory against the resolved backend. Always
 * reconfigures so a previously initialized backend is never silently reused.
 */
export async function initTarget(terraform: Terraform, context: RunContext) {
  const result = await terraform.init(context.targetDir, {
    reconfigure: true,
    forceCopy: context.forceCopy,
  });
  if (!result.success) {
    throw new TerraformError(
      `terraform init failed in ${context.targetDir}`,
      result.command,
      result.exitCode
    );
  }
}

export class LifecycleManager {
  constructor(
    private readonly store: BackendStore,
    private readonly terraform: Terraform,
    private readonly purger: BucketPurger,
    private readonly s3: S3Client
  ) {}

  /**
   * Destroys the top-level stack. The backend is resolved first since the
   * resources can only be destroyed from the state they were created in.
   */
  async destroyStack(context: RunContext, resolver: BackendResolver) {
    logger.info(`Destroying top-level stack in ${context.targetDir}`);
    await resolver.resolve(context);
    await initTarget(this.terraform, context);

    const result = await this.terraform.destroy(
      context.targetDir,
      terraformVars(context),
      { autoApprove: true }
    );
    if (!result.success) {
      throw new TerraformError(
        `terraform destroy failed in ${context.targetDir}`,
        result.command,
        result.exitCode
      );
    }
    logger.info("Top-level stack destroyed.");
  }

  /**
   * Removes the backend record and the state bucket. Only meaningful once the
   * top-level stack is gone. A purge failure aborts with the record already
   * deleted; a failure to delete the emptied bucket is only a warning.
   */
  async destroyBootstrap(context: RunContext): Promise<TeardownReport> {
    const { bucket, source } = await this.recoverBucketName(context);
    logger.info(`Preparing to destroy bootstrap bucket ${bucket} (from ${source})`);

    const deletion = await this.store.delete(context.parameterName);
    if (deletion.status === "error") {
      logger.warn(`${deletion.error.message}; continuing teardown`);
    }

    const bootstrapDir = findBootstrapDir(context);
    if (bootstrapDir) {
      eraseBackendDescriptor(bootstrapDir);
    } else {
      logger.debug("No bootstrap directory found; no local backend.tf to erase");
    }

    const purge = await this.purger.purge(bucket);

    const warnings: ResourceCleanupWarning[] = [];
    let bucketDeleted = false;
    logger.info(`Deleting bootstrap S3 bucket ${bucket}`);
    try {
      await this.s3.send(new DeleteBucketCommand({ Bucket: bucket }));
      bucketDeleted = true;
      logger.info(`Deleted S3 bucket ${bucket}`);
    } catch (e: unknown) {
      const warning = new ResourceCleanupWarning(
        `Failed to delete S3 bucket ${bucket} (${errorMessage(
          e
        )}). Please empty and delete it manually if it still exists.`,
        bucket,
        { cause: e }
      );
      logger.warn(warning.message);
      warnings.push(warning);
    }

    return {
      bucket,
      bucketSource: source,
      recordDeleted: deletion.status === "deleted",
      bucketDeleted,
      purge,
      warnings,
    };
  }

  private async recoverBucketName(
    context: RunContext
  ): Promise<{ bucket: string; source: BucketSource }> {
    const tagged = await this.store.bucketOf(context.parameterName);
    if (tagged.status === "found") {
      return { bucket: tagged.value, source: "tag" };
    }
    if (tagged.status === "error") {
      logger.warn(tagged.error.message);
    }

    const record = await this.store.get(context.parameterName);
    if (record.status === "found") {
      const bucket = parseLegacyBucket(record.value);
      if (bucket) {
        return { bucket, source: "record" };
      }
    } else if (record.status === "error") {
      logger.warn(record.error.message);
    }

    return { bucket: defaultBucketName(context.identity), source: "default" };
  }
}
