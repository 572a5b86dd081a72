import {
  DeleteObjectsCommand,
  ListObjectVersionsCommand,
  ListObjectsV2Command,
  type ObjectIdentifier,
  type S3Client,
  type _Object,
} from "@aws-sdk/client-s3";
import { PurgeError, errorMessage } from "../errors";
import { logger } from "../logger";
import { inBatchesOf } from "../util";

// Upper limit of a single DeleteObjects request
export const MAX_DELETE_BATCH_SIZE = 1000;

export type PurgeSummary = {
  currentObjectsDeleted: number;
  versionsDeleted: number;
  batches: number;
};

export type BucketPurgerOptions = {
  batchSize?: number;
};

/**
 * Empties a bucket that may have versioning enabled. Deleting current objects
 * only leaves noncurrent versions and delete markers behind, and those block
 * DeleteBucket, so every version is removed explicitly as well.
 */
export class BucketPurger {
  private readonly batchSize: number;

  constructor(
    private readonly s3: S3Client,
    { batchSize = MAX_DELETE_BATCH_SIZE }: BucketPurgerOptions = {}
  ) {
    if (
      !Number.isInteger(batchSize) ||
      batchSize < 1 ||
      batchSize > MAX_DELETE_BATCH_SIZE
    ) {
      throw new Error(
        `Batch size must be an integer between 1 and ${MAX_DELETE_BATCH_SIZE}`
      );
    }
    this.batchSize = batchSize;
  }

  async purge(bucket: string): Promise<PurgeSummary> {
    logger.info(`Emptying S3 bucket ${bucket}`);
    const currentObjectsDeleted = await this.removeCurrentObjects(bucket);
    const { versionsDeleted, batches } = await this.removeVersions(bucket);
    logger.info(
      `Emptied S3 bucket ${bucket} (${currentObjectsDeleted} current objects, ${versionsDeleted} versions and delete markers)`
    );
    return { currentObjectsDeleted, versionsDeleted, batches };
  }

  /**
   * Best-effort delete of the latest version of every object. On a versioned
   * bucket this leaves a delete marker per key, which `removeVersions` cleans
   * up afterwards.
   */
  async removeCurrentObjects(bucket: string): Promise<number> {
    try {
      const keys: string[] = [];
      let continuationToken: string | undefined;
      for (;;) {
        const {
          Contents,
          NextContinuationToken,
        }: { Contents?: _Object[]; NextContinuationToken?: string } =
          await this.s3.send(
            new ListObjectsV2Command({
              Bucket: bucket,
              ContinuationToken: continuationToken,
            })
          );
        for (const object of Contents || []) {
          if (object.Key !== undefined) keys.push(object.Key);
        }
        continuationToken = NextContinuationToken;
        if (!continuationToken) break;
      }

      await inBatchesOf(keys, this.batchSize, async (batch) => {
        await this.s3.send(
          new DeleteObjectsCommand({
            Bucket: bucket,
            Delete: { Objects: batch.map((Key) => ({ Key })), Quiet: true },
          })
        );
      });
      if (keys.length) {
        logger.info(`Removed ${keys.length} current objects from s3://${bucket}`);
      }
      return keys.length;
    } catch (e: unknown) {
      logger.info(
        `Recursive delete of s3://${bucket} failed (${errorMessage(
          e
        )}); continuing to remove versions and delete markers`
      );
      return 0;
    }
  }

  /**
   * Lists versions and delete markers and deletes them one batch per listing
   * until a listing comes back empty. A listing that fails ends the loop; a
   * rejected delete aborts the purge.
   */
  async removeVersions(
    bucket: string
  ): Promise<Omit<PurgeSummary, "currentObjectsDeleted">> {
    let versionsDeleted = 0;
    let batches = 0;

    for (;;) {
      const batch = await this.listVersionBatch(bucket);
      if (!batch?.length) break;

      let errors: string[];
      try {
        const { Errors } = await this.s3.send(
          new DeleteObjectsCommand({
            Bucket: bucket,
            Delete: { Objects: batch, Quiet: true },
          })
        );
        errors = (Errors || []).map(
          (error) => `${error.Key}@${error.VersionId}: ${error.Code}`
        );
      } catch (e: unknown) {
        throw new PurgeError(
          `Failed to delete object versions from s3://${bucket}: ${errorMessage(
            e
          )}. Empty and delete the bucket manually.`,
          bucket,
          { cause: e }
        );
      }
      if (errors.length) {
        throw new PurgeError(
          `Failed to delete ${
            errors.length
          } object versions from s3://${bucket} (${errors.join(
            ", "
          )}). Empty and delete the bucket manually.`,
          bucket
        );
      }

      batches += 1;
      versionsDeleted += batch.length;
      logger.debug(
        `Deleted batch ${batches} of ${batch.length} versions from s3://${bucket}`
      );
    }

    return { versionsDeleted, batches };
  }

  private async listVersionBatch(
    bucket: string
  ): Promise<ObjectIdentifier[] | undefined> {
    try {
      const { Versions, DeleteMarkers } = await this.s3.send(
        new ListObjectVersionsCommand({ Bucket: bucket, MaxKeys: this.batchSize })
      );
      return [...(Versions || []), ...(DeleteMarkers || [])]
        .flatMap(({ Key, VersionId }) =>
          Key === undefined ? [] : [{ Key, VersionId }]
        )
        .slice(0, this.batchSize);
    } catch (e: unknown) {
      logger.info(
        `list-object-versions failed for s3://${bucket} (${errorMessage(
          e
        )}); assuming no versions remain`
      );
      return undefined;
    }
  }
}
