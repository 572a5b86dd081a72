import { execa } from "execa";
import { Type } from "@sinclair/typebox";
import { TypeCompiler } from "@sinclair/typebox/compiler";
import { logger } from "../logger";
import { formatCommand, objectEntries } from "../util";

const TF_ENVARS = { TF_IN_AUTOMATION: "1" };

export type TerraformVars = {
  environment: string;
  region: string;
};

export type TerraformResult =
  | { success: true; command: string }
  | { success: false; command: string; exitCode: number };

export type InitOptions = {
  reconfigure: boolean;
  forceCopy?: boolean;
};

export type ApplyOptions = {
  autoApprove: boolean;
};

/**
 * The subset of the Terraform CLI this tool drives. Every call runs to
 * completion before the next one starts.
 */
export interface Terraform {
  init(directory: string, options: InitOptions): Promise<TerraformResult>;
  plan(directory: string, vars: TerraformVars): Promise<TerraformResult>;
  apply(
    directory: string,
    vars: TerraformVars,
    options: ApplyOptions
  ): Promise<TerraformResult>;
  destroy(
    directory: string,
    vars: TerraformVars,
    options: ApplyOptions
  ): Promise<TerraformResult>;
  /** Output values by name, or undefined when outputs cannot be read. */
  output(directory: string): Promise<Record<string, unknown> | undefined>;
}

export type CommandOutcome = {
  exitCode: number;
  stdout: string;
};

export type CommandRunner = (
  file: string,
  args: string[],
  options: { cwd: string; capture: boolean }
) => Promise<CommandOutcome>;

const OUTPUT_COMPILER = TypeCompiler.Compile(
  Type.Record(Type.String(), Type.Object({ value: Type.Unknown() }))
);

export const runWithExeca: CommandRunner = async (file, args, options) => {
  const result = await execa(file, args, {
    cwd: options.cwd,
    env: TF_ENVARS,
    reject: false,
    stdin: "inherit",
    stdout: options.capture ? "pipe" : "inherit",
    stderr: "inherit",
  });
  // No exit code means the process never ran or was killed by a signal
  if (result.exitCode === undefined) {
    logger.error(`Unable to run ${formatCommand(file, args)}`);
  }
  return {
    exitCode: result.exitCode ?? 1,
    stdout: typeof result.stdout === "string" ? result.stdout : "",
  };
};

function varArgs(vars: TerraformVars) {
  return objectEntries(vars).flatMap(([name, value]) => [
    "-var",
    `${name}=${value}`,
  ]);
}

export class TerraformCli implements Terraform {
  constructor(
    private readonly binary = "terraform",
    private readonly run: CommandRunner = runWithExeca
  ) {}

  init(directory: string, { reconfigure, forceCopy }: InitOptions) {
    return this.execute(directory, [
      "init",
      ...(reconfigure ? ["-reconfigure"] : []),
      "-input=false",
      ...(forceCopy ? ["-force-copy"] : []),
    ]);
  }

  plan(directory: string, vars: TerraformVars) {
    return this.execute(directory, ["plan", "-input=false", ...varArgs(vars)]);
  }

  apply(directory: string, vars: TerraformVars, { autoApprove }: ApplyOptions) {
    return this.execute(directory, [
      "apply",
      ...(autoApprove ? ["-auto-approve"] : []),
      "-input=false",
      ...varArgs(vars),
    ]);
  }

  destroy(
    directory: string,
    vars: TerraformVars,
    { autoApprove }: ApplyOptions
  ) {
    return this.execute(directory, [
      "destroy",
      ...(autoApprove ? ["-auto-approve"] : []),
      ...varArgs(vars),
    ]);
  }

  async output(directory: string) {
    const { exitCode, stdout } = await this.run(
      this.binary,
      ["output", "-json"],
      { cwd: directory, capture: true }
    );
    if (exitCode !== 0) {
      logger.debug(`terraform output exited with status ${exitCode}`);
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(stdout);
    } catch (e: unknown) {
      logger.debug("Unable to parse terraform output:", e);
      return undefined;
    }
    if (!OUTPUT_COMPILER.Check(parsed)) {
      return undefined;
    }

    const values: Record<string, unknown> = {};
    for (const [name, output] of Object.entries(parsed)) {
      values[name] = output.value;
    }
    return values;
  }

  private async execute(
    directory: string,
    args: string[]
  ): Promise<TerraformResult> {
    const command = formatCommand(this.binary, args);
    logger.command([this.binary, ...args]);
    const { exitCode } = await this.run(this.binary, args, {
      cwd: directory,
      capture: false,
    });
    if (exitCode !== 0) {
      logger.error(`Command failed (exit status ${exitCode}): ${command}`);
      return { success: false, command, exitCode };
    }
    return { success: true, command };
  }
}
