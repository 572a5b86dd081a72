import { parseDocument } from "yaml";
import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { TypeCompiler, type TypeCheck } from "@sinclair/typebox/compiler";
import { Value } from "@sinclair/typebox/value";

export const SettingsSchema = Type.Object({
  environment: Type.String({ minLength: 1, default: "dev" }),
  region: Type.String({ minLength: 1, default: "us-east-1" }),
  targetDir: Type.String({ minLength: 1, default: "." }),
  bucketOverride: Type.Optional(
    Type.String({ pattern: "^[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]$" })
  ),
  parameterPrefix: Type.String({
    pattern: "^/[A-Za-z0-9_./-]*[A-Za-z0-9_.-]$",
    default: "/terraform/backend",
  }),
  maxAttempts: Type.Integer({ minimum: 1, maximum: 20, default: 5 }),
});

export type Settings = Static<typeof SettingsSchema>;

export const PropertiesSchema = Type.Object(
  {
    app_name: Type.Optional(Type.Union([Type.String(), Type.Null()])),
  },
  { additionalProperties: true }
);

export type Properties = Static<typeof PropertiesSchema>;

const SETTINGS_COMPILER = TypeCompiler.Compile(SettingsSchema);
const PROPERTIES_COMPILER = TypeCompiler.Compile(PropertiesSchema);

function assertValid<T extends TSchema>(
  compiler: TypeCheck<T>,
  value: unknown,
  description: string
): Static<T> {
  if (compiler.Check(value)) {
    return value;
  }
  for (const error of compiler.Errors(value)) {
    console.log(`${error.message} at ${error.path || "/"}`);
  }
  throw new Error(`Invalid ${description}`);
}

// Unset and blank variables fall through to the schema defaults
function nonBlank(value: string | undefined) {
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}

/**
 * Settings derived from the process environment. Command line options take
 * precedence over these.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const raw: Record<string, string> = {};
  const sources: Record<keyof Settings, string | undefined> = {
    environment: nonBlank(env["ENV"]),
    region: nonBlank(env["AWS_REGION"]) ?? nonBlank(env["AWS_DEFAULT_REGION"]),
    targetDir: nonBlank(env["TARGET_DIR"]),
    bucketOverride: nonBlank(env["BUCKET_OVERRIDE"]),
    parameterPrefix: nonBlank(env["TFWRAPPER_PARAMETER_PREFIX"]),
    maxAttempts: nonBlank(env["AWS_MAX_ATTEMPTS"]),
  };
  for (const [name, value] of Object.entries(sources)) {
    if (value !== undefined) {
      raw[name] = value;
    }
  }

  const settings = Value.Default(
    SettingsSchema,
    Value.Convert(SettingsSchema, raw)
  );
  return assertValid(SETTINGS_COMPILER, settings, "environment settings");
}

export function propertiesPath(environment: string, cwd = process.cwd()) {
  return resolve(cwd, `properties.${environment}.json`);
}

/**
 * Source of per-environment properties. Only `app_name` is read by this tool;
 * everything else in the file belongs to the Terraform configuration.
 */
export interface PropertiesSource {
  lookup(environment: string): Properties | undefined;
}

export class FilePropertiesSource implements PropertiesSource {
  constructor(private readonly cwd: string = process.cwd()) {}

  lookup(environment: string): Properties | undefined {
    const path = propertiesPath(environment, this.cwd);
    if (!existsSync(path)) {
      return undefined;
    }
    return parseProperties(readFileSync(path).toString(), path);
  }
}

export function parseProperties(contents: string, path: string): Properties {
  const document = parseDocument(contents, { merge: true });
  if (document.errors.length) {
    throw new Error(
      `Unable to parse ${path}: ${document.errors
        .map((error) => error.message)
        .join("; ")}`
    );
  }
  return assertValid(PROPERTIES_COMPILER, document.toJSON(), path);
}
