import { resolve } from "node:path";
import type { Identity } from "./identity";

/**
 * Everything a command needs to know about the current run, built once after
 * the identity is synthesized and never mutated afterwards.
 */
export type RunContext = Readonly<{
  identity: Identity;
  region: string;
  /** Directory the top-level Terraform configuration lives in. */
  targetDir: string;
  /** Directory `./bootstrap` is resolved against as a fallback. */
  cwd: string;
  parameterName: string;
  forceCopy: boolean;
  bucketOverride?: string;
}>;

export type RunContextInput = {
  identity: Identity;
  region: string;
  targetDir: string;
  parameterPrefix: string;
  forceCopy?: boolean;
  bucketOverride?: string;
  cwd?: string;
};

export function parameterNameFor(prefix: string, identity: Identity) {
  return `${prefix.replace(/\/+$/, "")}/${identity.accountId}-${
    identity.safeName
  }`;
}

export function defaultBucketName(identity: Identity) {
  return `${identity.accountId}-${identity.safeName}-tfstate`;
}

export function createRunContext(input: RunContextInput): RunContext {
  const cwd = input.cwd ?? process.cwd();
  return Object.freeze({
    identity: Object.freeze({ ...input.identity }),
    region: input.region,
    targetDir: resolve(cwd, input.targetDir),
    cwd,
    parameterName: parameterNameFor(input.parameterPrefix, input.identity),
    forceCopy: input.forceCopy ?? false,
    bucketOverride: input.bucketOverride || undefined,
  });
}

export function terraformVars(context: RunContext) {
  return {
    environment: context.identity.environment,
    region: context.region,
  };
}
