import { GetCallerIdentityCommand, type STSClient } from "@aws-sdk/client-sts";
import { type PropertiesSource, propertiesPath } from "./config";
import { IdentityError, errorMessage } from "./errors";
import { logger } from "./logger";

export type Identity = {
  appName: string;
  environment: string;
  accountId: string;
  /** Lowercased `appName + environment`, used to namespace AWS resources. */
  safeName: string;
};

export type IdentityInput = {
  appNameOverride?: string;
  environment: string;
};

export function safeNameOf(appName: string, environment: string) {
  return `${appName}${environment}`.toLowerCase();
}

function resolveAppName(
  input: IdentityInput,
  properties: PropertiesSource
): string {
  if (input.appNameOverride) {
    return input.appNameOverride;
  }

  let appName: string | null | undefined;
  try {
    appName = properties.lookup(input.environment)?.app_name;
  } catch (e: unknown) {
    logger.warn(`Failed to read properties: ${errorMessage(e)}`);
    appName = undefined;
  }

  // The string "null" counts as unset
  if (!appName || appName === "null") {
    throw new IdentityError(
      `Unable to determine app name. Ensure ${propertiesPath(
        input.environment
      )} exists and contains an 'app_name' field, or provide --app-name.`
    );
  }
  return appName;
}

async function resolveAccountId(sts: STSClient): Promise<string> {
  let account: string | undefined;
  try {
    ({ Account: account } = await sts.send(new GetCallerIdentityCommand({})));
  } catch (e: unknown) {
    throw new IdentityError(
      "Unable to determine AWS account id. Ensure AWS credentials are configured.",
      { cause: e }
    );
  }
  if (!account) {
    throw new IdentityError(
      "Unable to determine AWS account id. Ensure AWS credentials are configured."
    );
  }
  return account;
}

/**
 * Derives the identity that namespaces every resource this tool touches.
 * Recomputed from scratch on every invocation.
 */
export async function synthesizeIdentity(
  input: IdentityInput,
  sts: STSClient,
  properties: PropertiesSource
): Promise<Identity> {
  const appName = resolveAppName(input, properties);
  const accountId = await resolveAccountId(sts);

  const identity = {
    appName,
    environment: input.environment,
    accountId,
    safeName: safeNameOf(appName, input.environment),
  };
  logger.debug("Synthesized identity", identity);
  return identity;
}
