import { mkdirSync } from "node:fs";
import { resolve } from "node:path";
import type { S3Client } from "@aws-sdk/client-s3";
import type { SSMClient } from "@aws-sdk/client-ssm";
import type { STSClient } from "@aws-sdk/client-sts";
import { AwsClients } from "./aws";
import { FilePropertiesSource, type PropertiesSource } from "./config";
import { createRunContext, terraformVars, type RunContext } from "./context";
import {
  ExitCodes,
  TfWrapperError,
  TerraformError,
  type ExitStatus,
} from "./errors";
import { synthesizeIdentity } from "./identity";
import { logger } from "./logger";
import { confirmOnTerminal, type Confirm } from "./prompt";
import { BackendResolver } from "./state/BackendResolver";
import { BackendStore } from "./state/BackendStore";
import { Bootstrapper } from "./state/Bootstrapper";
import { BucketPurger } from "./state/BucketPurger";
import { LifecycleManager, initTarget } from "./state/LifecycleManager";
import { cleanTerraformFiles } from "./terraform/clean";
import {
  TerraformCli,
  type Terraform,
  type TerraformResult,
} from "./terraform/Terraform";

export type AppOptions = {
  env: string;
  region: string;
  targetDir: string;
  parameterPrefix: string;
  maxAttempts: number;
  appName?: string;
  bucketOverride?: string;
  force?: boolean;
  forceCopy?: boolean;
};

/** Collaborators that default to the real AWS clients and Terraform CLI. */
export type AppDependencies = {
  ssm?: SSMClient;
  sts?: STSClient;
  s3?: S3Client;
  terraform?: Terraform;
  properties?: PropertiesSource;
  confirm?: Confirm;
  cwd?: string;
};

export class App {
  private readonly store: BackendStore;
  private readonly sts: STSClient;
  private readonly s3: S3Client;
  private readonly terraform: Terraform;
  private readonly properties: PropertiesSource;
  private readonly confirm: Confirm;
  private readonly cwd: string;

  constructor(
    private readonly options: AppOptions,
    dependencies: AppDependencies = {}
  ) {
    const clients = new AwsClients({
      region: options.region,
      maxAttempts: options.maxAttempts,
    });
    this.store = new BackendStore(
      dependencies.ssm ?? clients.createSSMClient()
    );
    this.sts = dependencies.sts ?? clients.createSTSClient();
    this.s3 = dependencies.s3 ?? clients.createS3Client();
    this.terraform = dependencies.terraform ?? new TerraformCli();
    this.cwd = dependencies.cwd ?? process.cwd();
    this.properties =
      dependencies.properties ?? new FilePropertiesSource(this.cwd);
    this.confirm = dependencies.confirm ?? confirmOnTerminal;
  }

  public async bootstrap(): Promise<ExitStatus> {
    return this.withContext(async (context) => {
      await this.createBootstrapper().run(context, "upsert");
      logger.info(
        `Bootstrap completed. You can now run terraform init/plan/apply in ${context.targetDir} using the SSM-provided backend.`
      );
    });
  }

  public async init(): Promise<ExitStatus> {
    return this.withContext(async (context) => {
      await this.createResolver().resolve(context);
      await initTarget(this.terraform, context);
    });
  }

  public async plan(): Promise<ExitStatus> {
    return this.withContext(async (context) => {
      await this.createResolver().resolve(context);
      await initTarget(this.terraform, context);
      this.check(
        await this.terraform.plan(context.targetDir, terraformVars(context)),
        `terraform plan failed in ${context.targetDir}`
      );
    });
  }

  public async apply(): Promise<ExitStatus> {
    return this.withContext(async (context) => {
      await this.createResolver().resolve(context);
      await initTarget(this.terraform, context);
      this.check(
        await this.terraform.apply(context.targetDir, terraformVars(context), {
          autoApprove: true,
        }),
        `terraform apply failed in ${context.targetDir}`
      );
    });
  }

  public async destroy(): Promise<ExitStatus> {
    return this.withContext(async (context) => {
      if (
        !(await this.confirmed(
          `Destroy the top-level stack in ${context.targetDir}? This will permanently delete resources.`
        ))
      ) {
        logger.info("Aborted top-level destroy.");
        return;
      }
      await this.createLifecycleManager().destroyStack(
        context,
        this.createResolver()
      );
    });
  }

  public async destroyAll(): Promise<ExitStatus> {
    return this.withContext(async (context) => {
      if (
        !(await this.confirmed(
          "Destroy the top-level stack and bootstrap S3 bucket? This will permanently delete resources and remove the backend SSM entry."
        ))
      ) {
        logger.info("Aborted destroy-all.");
        return;
      }
      const manager = this.createLifecycleManager();
      await manager.destroyStack(context, this.createResolver());
      const report = await manager.destroyBootstrap(context);
      if (report.warnings.length) {
        logger.info(
          "Bootstrap resources destroyed, but the bucket could not be removed. Empty and delete it manually."
        );
      } else {
        logger.info("Bootstrap resources destroyed.");
      }
    });
  }

  public async clean(): Promise<ExitStatus> {
    const targetDir = resolve(this.cwd, this.options.targetDir);
    if (
      !(await this.confirmed(
        `Clean Terraform files and directories from ${targetDir}? This will remove .terraform folders, .terraform.lock.hcl, backend.tf, and terraform.tfstate files.`
      ))
    ) {
      logger.info("Aborted clean.");
      return ExitCodes.SUCCESS;
    }
    const { failed } = cleanTerraformFiles(targetDir);
    return failed.length ? ExitCodes.FAILURE : ExitCodes.SUCCESS;
  }

  private async withContext(
    fn: (context: RunContext) => Promise<void>
  ): Promise<ExitStatus> {
    try {
      const context = await this.createContext();
      await fn(context);
      logger.info("Done.");
      return ExitCodes.SUCCESS;
    } catch (e: unknown) {
      if (e instanceof TfWrapperError) {
        logger.error(e.message);
        return e.exitCode;
      }
      throw e;
    }
  }

  private async createContext(): Promise<RunContext> {
    const identity = await synthesizeIdentity(
      { appNameOverride: this.options.appName, environment: this.options.env },
      this.sts,
      this.properties
    );
    createTargetDir(this.cwd, this.options.targetDir);
    return createRunContext({
      identity,
      region: this.options.region,
      targetDir: this.options.targetDir,
      parameterPrefix: this.options.parameterPrefix,
      forceCopy: this.options.forceCopy,
      bucketOverride: this.options.bucketOverride,
      cwd: this.cwd,
    });
  }

  private async confirmed(question: string) {
    return this.options.force || (await this.confirm(question));
  }

  private check(result: TerraformResult, message: string) {
    if (!result.success) {
      throw new TerraformError(message, result.command, result.exitCode);
    }
  }

  private createBootstrapper() {
    return new Bootstrapper(this.store, this.terraform);
  }

  private createResolver() {
    return new BackendResolver(this.store, this.createBootstrapper());
  }

  private createLifecycleManager() {
    return new LifecycleManager(
      this.store,
      this.terraform,
      new BucketPurger(this.s3),
      this.s3
    );
  }
}

function createTargetDir(cwd: string, targetDir: string) {
  const path = resolve(cwd, targetDir);
  mkdirSync(path, { recursive: true });
  return path;
}
