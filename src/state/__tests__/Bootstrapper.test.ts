import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mockClient } from "aws-sdk-client-mock";
import { PutParameterCommand, SSMClient } from "@aws-sdk/client-ssm";
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { BootstrapError, StoreError } from "../../errors";
import { buildBackendDescriptor } from "../BackendDescriptor";
import { BackendStore } from "../BackendStore";
import { Bootstrapper, findBootstrapDir } from "../Bootstrapper";
import {
  FakeParameters,
  FakeTerraform,
  SHOP_DEV_BUCKET,
  SHOP_DEV_PARAMETER,
  installParameterStore,
  makeContext,
  makeTempDir,
  removeTempDir,
} from "../../__tests__/fixtures";

const ssmMock = mockClient(SSMClient);

function descriptorFor(bucket: string) {
  return buildBackendDescriptor({
    bucket,
    region: "us-east-1",
    accountId: "123456789012",
    safeName: "shopdev",
  });
}

describe("Bootstrapper", () => {
  let root: string;
  let parameters: FakeParameters;
  let terraform: FakeTerraform;
  let bootstrapper: Bootstrapper;

  beforeEach(() => {
    root = makeTempDir();
    ssmMock.reset();
    parameters = new FakeParameters();
    installParameterStore(ssmMock, parameters);
    terraform = new FakeTerraform();
    bootstrapper = new Bootstrapper(
      new BackendStore(new SSMClient({ region: "us-east-1" })),
      terraform
    );
  });

  afterEach(() => {
    removeTempDir(root);
  });

  describe("findBootstrapDir", () => {
    it("prefers the bootstrap directory inside the target", () => {
      mkdirSync(join(root, "stack", "bootstrap"), { recursive: true });
      mkdirSync(join(root, "bootstrap"));

      expect(findBootstrapDir(makeContext(root))).toBe(
        join(root, "stack", "bootstrap")
      );
    });

    it("falls back to ./bootstrap", () => {
      mkdirSync(join(root, "bootstrap"));

      expect(findBootstrapDir(makeContext(root))).toBe(join(root, "bootstrap"));
    });

    it("ignores a file named bootstrap", () => {
      writeFileSync(join(root, "bootstrap"), "");

      expect(findBootstrapDir(makeContext(root))).toBe(undefined);
    });
  });

  it("fails before running terraform when no bootstrap directory exists", async () => {
    await expect(bootstrapper.run(makeContext(root), "create")).rejects.toThrow(
      BootstrapError
    );
    expect(terraform.calls).toEqual([]);
    expect(ssmMock.calls()).toHaveLength(0);
  });

  it("provisions, publishes and writes the descriptor into the target directory", async () => {
    const bootstrapDir = join(root, "bootstrap");
    mkdirSync(bootstrapDir);
    writeFileSync(join(bootstrapDir, "backend.tf"), "stale");

    const result = await bootstrapper.run(makeContext(root), "create");

    expect(existsSync(join(bootstrapDir, "backend.tf"))).toBe(false);
    expect(terraform.calls).toEqual([
      {
        operation: "init",
        directory: bootstrapDir,
        options: { reconfigure: true },
      },
      {
        operation: "apply",
        directory: bootstrapDir,
        vars: { environment: "dev", region: "us-east-1" },
        options: { autoApprove: true },
      },
      { operation: "output", directory: bootstrapDir },
    ]);
    expect(result).toEqual({
      bootstrapDir,
      bucket: SHOP_DEV_BUCKET,
      descriptor: descriptorFor(SHOP_DEV_BUCKET),
      published: true,
    });
    expect(parameters.values.get(SHOP_DEV_PARAMETER)).toBe(
      descriptorFor(SHOP_DEV_BUCKET)
    );
    expect(parameters.tags.get(SHOP_DEV_PARAMETER)).toEqual([
      { Key: "tfwrapper:bucket", Value: SHOP_DEV_BUCKET },
    ]);
    expect(readFileSync(join(root, "stack", "backend.tf"), "utf8")).toBe(
      descriptorFor(SHOP_DEV_BUCKET)
    );
  });

  it("uses the bucket_name output when the configuration provides one", async () => {
    mkdirSync(join(root, "bootstrap"));
    terraform.outputs = { bucket_name: "shop-state-from-output" };

    const { bucket } = await bootstrapper.run(makeContext(root), "upsert");

    expect(bucket).toBe("shop-state-from-output");
  });

  it("prefers an explicit bucket override over outputs", async () => {
    mkdirSync(join(root, "bootstrap"));
    terraform.outputs = { bucket_name: "shop-state-from-output" };

    const { bucket } = await bootstrapper.run(
      makeContext(root, { bucketOverride: "shop-override" }),
      "upsert"
    );

    expect(bucket).toBe("shop-override");
    expect(terraform.operations()).toEqual(["init", "apply"]);
  });

  it("ignores a bucket_name output that is not a string", async () => {
    mkdirSync(join(root, "bootstrap"));
    terraform.outputs = { bucket_name: 42 };

    const { bucket } = await bootstrapper.run(makeContext(root), "upsert");

    expect(bucket).toBe(SHOP_DEV_BUCKET);
  });

  it("aborts without publishing when init fails", async () => {
    mkdirSync(join(root, "bootstrap"));
    terraform.failing.add("init");

    await expect(bootstrapper.run(makeContext(root), "create")).rejects.toThrow(
      `terraform init failed in ${join(root, "bootstrap")}`
    );
    expect(terraform.operations()).toEqual(["init"]);
    expect(ssmMock.commandCalls(PutParameterCommand)).toHaveLength(0);
  });

  it("aborts without publishing when apply fails", async () => {
    mkdirSync(join(root, "bootstrap"));
    terraform.failing.add("apply");

    await expect(bootstrapper.run(makeContext(root), "create")).rejects.toThrow(
      BootstrapError
    );
    expect(ssmMock.commandCalls(PutParameterCommand)).toHaveLength(0);
    expect(existsSync(join(root, "stack", "backend.tf"))).toBe(false);
  });

  it("overwrites an existing record in upsert mode", async () => {
    mkdirSync(join(root, "bootstrap"));
    parameters.values.set(SHOP_DEV_PARAMETER, "previous");

    const result = await bootstrapper.run(makeContext(root), "upsert");

    expect(result.published).toBe(true);
    expect(parameters.values.get(SHOP_DEV_PARAMETER)).toBe(
      descriptorFor(SHOP_DEV_BUCKET)
    );
  });

  it("adopts the record of a concurrent bootstrap in create mode", async () => {
    mkdirSync(join(root, "bootstrap"));
    parameters.values.set(SHOP_DEV_PARAMETER, descriptorFor("winner-bucket"));

    const result = await bootstrapper.run(makeContext(root), "create");

    expect(result.published).toBe(false);
    expect(result.descriptor).toBe(descriptorFor("winner-bucket"));
    expect(parameters.values.get(SHOP_DEV_PARAMETER)).toBe(
      descriptorFor("winner-bucket")
    );
    expect(readFileSync(join(root, "stack", "backend.tf"), "utf8")).toBe(
      descriptorFor("winner-bucket")
    );
  });

  it("replaces an unusable record found in create mode", async () => {
    mkdirSync(join(root, "bootstrap"));
    parameters.values.set(SHOP_DEV_PARAMETER, "None");

    const result = await bootstrapper.run(makeContext(root), "create");

    expect(result.published).toBe(true);
    expect(result.descriptor).toBe(descriptorFor(SHOP_DEV_BUCKET));
    expect(parameters.values.get(SHOP_DEV_PARAMETER)).toBe(
      descriptorFor(SHOP_DEV_BUCKET)
    );
    expect(readFileSync(join(root, "stack", "backend.tf"), "utf8")).toBe(
      descriptorFor(SHOP_DEV_BUCKET)
    );
  });

  it("propagates a failed publish", async () => {
    mkdirSync(join(root, "bootstrap"));
    ssmMock.on(PutParameterCommand).rejects(new Error("access denied"));

    await expect(bootstrapper.run(makeContext(root), "upsert")).rejects.toThrow(
      StoreError
    );
    expect(existsSync(join(root, "stack", "backend.tf"))).toBe(false);
  });
});
