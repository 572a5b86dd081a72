import {
  AddTagsToResourceCommand,
  DeleteParameterCommand,
  GetParameterCommand,
  InvalidResourceId,
  ListTagsForResourceCommand,
  ParameterAlreadyExists,
  ParameterNotFound,
  PutParameterCommand,
  type SSMClient,
} from "@aws-sdk/client-ssm";
import { StoreError, errorMessage } from "../errors";
import { logger } from "../logger";

export const BUCKET_TAG_KEY = "tfwrapper:bucket";

/**
 * Outcome of a read against Parameter Store. Callers decide per call whether
 * an `error` counts as absence.
 */
export type Lookup<T> =
  | { status: "found"; value: T }
  | { status: "absent" }
  | { status: "error"; error: StoreError };

// Older tooling stored the CLI's rendering of an empty value
const NONE_MARKER = "None";

export function isUsableRecord(
  lookup: Lookup<string>
): lookup is { status: "found"; value: string } {
  return (
    lookup.status === "found" &&
    lookup.value.trim() !== "" &&
    lookup.value !== NONE_MARKER
  );
}

export type DeleteOutcome =
  | { status: "deleted" }
  | { status: "absent" }
  | { status: "error"; error: StoreError };

export type BackendRecord = {
  descriptor: string;
  bucket: string;
};

export type PutOptions = {
  /**
   * When false the write only succeeds if no record exists yet, which is how
   * concurrent first-time bootstraps are detected.
   */
  overwrite: boolean;
};

export type PutOutcome = "written" | "exists";

/**
 * Backend records kept in SSM Parameter Store. The value is the backend
 * descriptor itself; the bucket name rides along as a parameter tag.
 */
export class BackendStore {
  constructor(private readonly ssm: SSMClient) {}

  async get(name: string): Promise<Lookup<string>> {
    try {
      const { Parameter } = await this.ssm.send(
        new GetParameterCommand({ Name: name, WithDecryption: true })
      );
      if (Parameter?.Value === undefined) {
        return { status: "absent" };
      }
      return { status: "found", value: Parameter.Value };
    } catch (e: unknown) {
      if (e instanceof ParameterNotFound) {
        return { status: "absent" };
      }
      return {
        status: "error",
        error: new StoreError(
          `Failed to read SSM parameter ${name}: ${errorMessage(e)}`,
          name,
          { cause: e }
        ),
      };
    }
  }

  async put(
    name: string,
    record: BackendRecord,
    { overwrite }: PutOptions
  ): Promise<PutOutcome> {
    try {
      await this.ssm.send(
        new PutParameterCommand({
          Name: name,
          Value: record.descriptor,
          Type: "String",
          Overwrite: overwrite,
        })
      );
    } catch (e: unknown) {
      if (!overwrite && e instanceof ParameterAlreadyExists) {
        return "exists";
      }
      throw new StoreError(
        `Failed to put SSM parameter ${name}: ${errorMessage(e)}`,
        name,
        { cause: e }
      );
    }

    // Tags cannot be passed together with Overwrite, so they are added separately
    try {
      await this.ssm.send(
        new AddTagsToResourceCommand({
          ResourceType: "Parameter",
          ResourceId: name,
          Tags: [{ Key: BUCKET_TAG_KEY, Value: record.bucket }],
        })
      );
    } catch (e: unknown) {
      throw new StoreError(
        `Stored SSM parameter ${name} but failed to tag it with bucket ${
          record.bucket
        }: ${errorMessage(e)}`,
        name,
        { cause: e }
      );
    }
    return "written";
  }

  async bucketOf(name: string): Promise<Lookup<string>> {
    try {
      const { TagList } = await this.ssm.send(
        new ListTagsForResourceCommand({
          ResourceType: "Parameter",
          ResourceId: name,
        })
      );
      const bucket = TagList?.findLast(
        (tag) => tag.Key === BUCKET_TAG_KEY
      )?.Value;
      return bucket ? { status: "found", value: bucket } : { status: "absent" };
    } catch (e: unknown) {
      // ListTagsForResource reports a missing parameter as InvalidResourceId
      if (e instanceof ParameterNotFound || e instanceof InvalidResourceId) {
        return { status: "absent" };
      }
      return {
        status: "error",
        error: new StoreError(
          `Failed to read tags of SSM parameter ${name}: ${errorMessage(e)}`,
          name,
          { cause: e }
        ),
      };
    }
  }

  async delete(name: string): Promise<DeleteOutcome> {
    try {
      await this.ssm.send(new DeleteParameterCommand({ Name: name }));
      logger.info(`Deleted SSM parameter ${name}`);
      return { status: "deleted" };
    } catch (e: unknown) {
      if (e instanceof ParameterNotFound) {
        logger.info(`SSM parameter ${name} not found; nothing to delete`);
        return { status: "absent" };
      }
      return {
        status: "error",
        error: new StoreError(
          `Failed to delete SSM parameter ${name}: ${errorMessage(e)}`,
          name,
          { cause: e }
        ),
      };
    }
  }
}
