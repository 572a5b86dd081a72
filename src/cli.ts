#!/usr/bin/env tsx
import { Command, CommanderError } from "@commander-js/extra-typings";
import packageJson from "../package.json" with { type: "json" };
import { App } from "./app";
import { loadSettings } from "./config";
import { ExitCodes, errorMessage } from "./errors";
import { logger, setDebug } from "./logger";

function loadSettingsOrExit() {
  try {
    return loadSettings();
  } catch (e: unknown) {
    logger.error(errorMessage(e));
    process.exit(ExitCodes.USAGE);
  }
}

const settings = loadSettingsOrExit();

const program = new Command()
  .name("tfwrapper")
  .description(
    "Manage a Terraform S3 remote backend published through SSM Parameter Store"
  )
  .version(packageJson.version)
  .exitOverride((error: CommanderError) => {
    process.exit(error.exitCode === 0 ? ExitCodes.SUCCESS : ExitCodes.USAGE);
  })
  .option("-d, --debug", "Display debug logs")
  .option("-e, --env <environment>", "Environment", settings.environment)
  .option("-r, --region <region>", "AWS region", settings.region)
  .option(
    "--target-dir <path>",
    "Terraform directory to run init/plan/apply in",
    settings.targetDir
  )
  .option(
    "--app-name <name>",
    "Override app name (otherwise read from properties.<env>.json)"
  );

program.hook("preAction", () => {
  setDebug(program.opts().debug ?? false);
});

function createApp(commandOptions: { force?: boolean; forceCopy?: boolean }) {
  const options = program.opts();
  return new App({
    env: options.env,
    region: options.region,
    targetDir: options.targetDir,
    appName: options.appName,
    parameterPrefix: settings.parameterPrefix,
    maxAttempts: settings.maxAttempts,
    bucketOverride: settings.bucketOverride,
    ...commandOptions,
  });
}

program
  .command("bootstrap")
  .description(
    "Run the bootstrap terraform in ./bootstrap to create the remote backend and SSM entry"
  )
  .action(async () => {
    process.exit(await createApp({}).bootstrap());
  });

program
  .command("init")
  .description(
    "Ensure the backend exists (via SSM or bootstrap), then run 'terraform init' in the target dir"
  )
  .option(
    "--force-copy",
    "Pass -force-copy to terraform init when migrating local state into the backend",
    false
  )
  .action(async (options) => {
    process.exit(await createApp(options).init());
  });

program
  .command("plan")
  .description("Ensure the backend exists, init, then run 'terraform plan'")
  .option(
    "--force-copy",
    "Pass -force-copy to terraform init when migrating local state into the backend",
    false
  )
  .action(async (options) => {
    process.exit(await createApp(options).plan());
  });

program
  .command("apply")
  .description("Ensure the backend exists, init, then run 'terraform apply'")
  .option(
    "--force-copy",
    "Pass -force-copy to terraform init when migrating local state into the backend",
    false
  )
  .action(async (options) => {
    process.exit(await createApp(options).apply());
  });

program
  .command("destroy")
  .description("Destroy the top-level stack in the target dir only")
  .option("--force", "Skip the confirmation prompt (POTENTIALLY DANGEROUS!)", false)
  .option(
    "--force-copy",
    "Pass -force-copy to terraform init when migrating local state into the backend",
    false
  )
  .action(async (options) => {
    process.exit(await createApp(options).destroy());
  });

program
  .command("destroy-all")
  .description(
    "Destroy the top-level stack, then the backend SSM entry and the bootstrap S3 bucket"
  )
  .option("--force", "Skip the confirmation prompt (POTENTIALLY DANGEROUS!)", false)
  .option(
    "--force-copy",
    "Pass -force-copy to terraform init when migrating local state into the backend",
    false
  )
  .action(async (options) => {
    process.exit(await createApp(options).destroyAll());
  });

program
  .command("clean")
  .description(
    "Remove .terraform folders, lock files, backend.tf and local state files from the target dir"
  )
  .option("--force", "Skip the confirmation prompt", false)
  .action(async (options) => {
    process.exit(await createApp(options).clean());
  });

program.parseAsync(process.argv).catch((e: unknown) => {
  logger.error("Unexpected error:", e);
  process.exit(ExitCodes.FAILURE);
});
