import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  AddTagsToResourceCommand,
  DeleteParameterCommand,
  GetParameterCommand,
  ListTagsForResourceCommand,
  ParameterAlreadyExists,
  ParameterNotFound,
  PutParameterCommand,
  type SSMClient,
  type Tag,
} from "@aws-sdk/client-ssm";
import type { AwsClientStub } from "aws-sdk-client-mock";
import { createRunContext, type RunContext } from "../context";
import type { Identity } from "../identity";
import type {
  ApplyOptions,
  InitOptions,
  Terraform,
  TerraformResult,
  TerraformVars,
} from "../terraform/Terraform";

export const SHOP_DEV: Identity = {
  appName: "shop",
  environment: "dev",
  accountId: "123456789012",
  safeName: "shopdev",
};

export const SHOP_DEV_PARAMETER = "/terraform/backend/123456789012-shopdev";
export const SHOP_DEV_BUCKET = "123456789012-shopdev-tfstate";

export function makeTempDir() {
  return mkdtempSync(join(tmpdir(), "tfwrapper-"));
}

export function removeTempDir(dir: string) {
  rmSync(dir, { recursive: true, force: true });
}

export function makeContext(
  root: string,
  overrides: { bucketOverride?: string; forceCopy?: boolean } = {}
): RunContext {
  return createRunContext({
    identity: SHOP_DEV,
    region: "us-east-1",
    targetDir: "stack",
    parameterPrefix: "/terraform/backend",
    cwd: root,
    ...overrides,
  });
}

export type TerraformOperation = "init" | "plan" | "apply" | "destroy" | "output";

export type TerraformCall = {
  operation: TerraformOperation;
  directory: string;
  vars?: TerraformVars;
  options?: InitOptions | ApplyOptions;
};

/** Records every call and succeeds unless told otherwise. */
export class FakeTerraform implements Terraform {
  readonly calls: TerraformCall[] = [];
  readonly failing = new Set<TerraformOperation>();
  outputs: Record<string, unknown> | undefined = undefined;

  init(directory: string, options: InitOptions) {
    return this.record({ operation: "init", directory, options });
  }

  plan(directory: string, vars: TerraformVars) {
    return this.record({ operation: "plan", directory, vars });
  }

  apply(directory: string, vars: TerraformVars, options: ApplyOptions) {
    return this.record({ operation: "apply", directory, vars, options });
  }

  destroy(directory: string, vars: TerraformVars, options: ApplyOptions) {
    return this.record({ operation: "destroy", directory, vars, options });
  }

  async output(directory: string) {
    this.calls.push({ operation: "output", directory });
    return this.outputs;
  }

  operations() {
    return this.calls.map(({ operation }) => operation);
  }

  private async record(call: TerraformCall): Promise<TerraformResult> {
    this.calls.push(call);
    const command = `terraform ${call.operation}`;
    return this.failing.has(call.operation)
      ? { success: false, command, exitCode: 1 }
      : { success: true, command };
  }
}

/** In-memory Parameter Store behind the aws-sdk-client-mock fakes. */
export class FakeParameters {
  readonly values = new Map<string, string>();
  readonly tags = new Map<string, Tag[]>();

  get(name: string | undefined) {
    const value = name === undefined ? undefined : this.values.get(name);
    if (name === undefined || value === undefined) {
      throw new ParameterNotFound({ message: "not found", $metadata: {} });
    }
    return { Parameter: { Name: name, Value: value } };
  }

  put(
    name: string | undefined,
    value: string | undefined,
    overwrite: boolean | undefined
  ) {
    if (name === undefined || value === undefined) {
      throw new Error("Name and Value are required");
    }
    if (this.values.has(name) && !overwrite) {
      throw new ParameterAlreadyExists({ message: "exists", $metadata: {} });
    }
    this.values.set(name, value);
    return { Version: 1 };
  }

  delete(name: string | undefined) {
    if (name === undefined || !this.values.delete(name)) {
      throw new ParameterNotFound({ message: "not found", $metadata: {} });
    }
    this.tags.delete(name);
    return {};
  }

  addTags(name: string | undefined, tags: Tag[] | undefined) {
    if (name !== undefined) {
      this.tags.set(name, [...(this.tags.get(name) ?? []), ...(tags ?? [])]);
    }
    return {};
  }

  listTags(name: string | undefined) {
    return { TagList: name === undefined ? [] : this.tags.get(name) ?? [] };
  }
}

export function installParameterStore(
  ssmMock: AwsClientStub<SSMClient>,
  parameters: FakeParameters
) {
  ssmMock
    .on(GetParameterCommand)
    .callsFake(async (input) => parameters.get(input.Name));
  ssmMock
    .on(PutParameterCommand)
    .callsFake(async (input) =>
      parameters.put(input.Name, input.Value, input.Overwrite)
    );
  ssmMock
    .on(DeleteParameterCommand)
    .callsFake(async (input) => parameters.delete(input.Name));
  ssmMock
    .on(AddTagsToResourceCommand)
    .callsFake(async (input) => parameters.addTags(input.ResourceId, input.Tags));
  ssmMock
    .on(ListTagsForResourceCommand)
    .callsFake(async (input) => parameters.listTags(input.ResourceId));
}
