import { existsSync, statSync } from "node:fs";
import { join, resolve } from "node:path";
import {
  defaultBucketName,
  terraformVars,
  type RunContext,
} from "../context";
import { BootstrapError } from "../errors";
import { logger } from "../logger";
import type { Terraform } from "../terraform/Terraform";
import {
  buildBackendDescriptor,
  eraseBackendDescriptor,
  writeBackendDescriptor,
} from "./BackendDescriptor";
import { isUsableRecord, type BackendStore } from "./BackendStore";

export type PublishMode = "upsert" | "create";

export type BootstrapResult = {
  bootstrapDir: string;
  bucket: string;
  descriptor: string;
  /** False when a concurrent bootstrap published its record first. */
  published: boolean;
};

export function bootstrapDirCandidates(context: RunContext) {
  return [join(context.targetDir, "bootstrap"), resolve(context.cwd, "bootstrap")];
}

export function findBootstrapDir(context: RunContext): string | undefined {
  return bootstrapDirCandidates(context).find(
    (dir) => existsSync(dir) && statSync(dir).isDirectory()
  );
}

/**
 * Provisions the state bucket with the bootstrap configuration and publishes
 * the backend descriptor for it. The bootstrap configuration keeps its own
 * local state; it is never migrated into the bucket it creates.
 */
export class Bootstrapper {
  constructor(
    private readonly store: BackendStore,
    private readonly terraform: Terraform
  ) {}

  async run(context: RunContext, mode: PublishMode): Promise<BootstrapResult> {
    const bootstrapDir = findBootstrapDir(context);
    if (!bootstrapDir) {
      throw new BootstrapError(
        `Bootstrap directory not found in ${bootstrapDirCandidates(
          context
        ).join(" ")}. Cannot bootstrap.`
      );
    }

    logger.info(
      `Found bootstrap directory at ${bootstrapDir}. Running terraform init and apply...`
    );
    eraseBackendDescriptor(bootstrapDir);

    const init = await this.terraform.init(bootstrapDir, { reconfigure: true });
    if (!init.success) {
      throw new BootstrapError(`terraform init failed in ${bootstrapDir}`);
    }
    const apply = await this.terraform.apply(
      bootstrapDir,
      terraformVars(context),
      { autoApprove: true }
    );
    if (!apply.success) {
      throw new BootstrapError(`terraform apply failed in ${bootstrapDir}`);
    }
    logger.info(`Bootstrap terraform apply completed in ${bootstrapDir}.`);

    const bucket = await this.bucketName(context, bootstrapDir);
    const { accountId, safeName } = context.identity;
    let descriptor = buildBackendDescriptor({
      bucket,
      region: context.region,
      accountId,
      safeName,
    });

    const outcome = await this.store.put(
      context.parameterName,
      { descriptor, bucket },
      { overwrite: mode === "upsert" }
    );
    let published = outcome === "written";
    if (!published) {
      const existing = await this.store.get(context.parameterName);
      if (isUsableRecord(existing)) {
        // Another run created the record between our lookup and our put
        logger.warn(
          `SSM parameter ${context.parameterName} was created by a concurrent bootstrap; using its backend configuration. Bucket ${bucket} provisioned by this run may be unused and can be removed manually if it differs.`
        );
        descriptor = existing.value;
      } else if (existing.status === "error") {
        logger.warn(
          `${existing.error.message}; continuing with bucket ${bucket} without publishing`
        );
      } else {
        logger.warn(
          `SSM parameter ${context.parameterName} holds no usable backend configuration; replacing it`
        );
        await this.store.put(
          context.parameterName,
          { descriptor, bucket },
          { overwrite: true }
        );
        published = true;
      }
    }
    if (published) {
      logger.info(
        `Stored backend configuration into SSM parameter ${context.parameterName}`
      );
    }

    writeBackendDescriptor(context.targetDir, descriptor);
    return { bootstrapDir, bucket, descriptor, published };
  }

  private async bucketName(context: RunContext, bootstrapDir: string) {
    if (context.bucketOverride) {
      return context.bucketOverride;
    }
    const outputs = await this.terraform.output(bootstrapDir);
    const bucket = outputs?.["bucket_name"];
    if (typeof bucket === "string" && bucket) {
      return bucket;
    }
    return defaultBucketName(context.identity);
  }
}
