import { S3Client } from "@aws-sdk/client-s3";
import { SSMClient } from "@aws-sdk/client-ssm";
import { STSClient } from "@aws-sdk/client-sts";
import { ConfiguredRetryStrategy } from "@aws-sdk/util-retry";
import { defaultProvider } from "@aws-sdk/credential-provider-node";
import type { AwsCredentialIdentity, Provider } from "@aws-sdk/types";
import { logger } from "./logger";
import { sleep } from "./util";

export type AwsClientOptions = {
  region: string;
  maxAttempts: number;
};

export class AwsClients {
  constructor(private readonly options: AwsClientOptions) {}

  createSSMClient(): SSMClient {
    return new SSMClient({
      region: this.options.region,
      credentials: this.createCredentialsProvider(),
      retryStrategy: this.createRetryStrategy("SSM"),
    });
  }

  createSTSClient(): STSClient {
    return new STSClient({
      region: this.options.region,
      credentials: this.createCredentialsProvider(),
      retryStrategy: this.createRetryStrategy("STS"),
    });
  }

  createS3Client(): S3Client {
    return new S3Client({
      region: this.options.region,
      credentials: this.createCredentialsProvider(),
      retryStrategy: this.createRetryStrategy("S3"),
    });
  }

  private createRetryStrategy(serviceName: string): ConfiguredRetryStrategy {
    const { maxAttempts } = this.options;

    return new ConfiguredRetryStrategy(maxAttempts, (attempt: number) => {
      const delayMs = 300 * 2 ** attempt;
      if (attempt > 0) {
        logger.warn(
          `AWS ${serviceName} throttling detected - retrying (attempt ${attempt}/${maxAttempts}, waiting ${delayMs}ms)`
        );
      }
      return delayMs;
    });
  }

  private createCredentialsProvider(): Provider<AwsCredentialIdentity> {
    const { maxAttempts } = this.options;
    const baseProvider = defaultProvider();

    return async () => {
      let lastError: Error | undefined;

      for (let attempt = 0; attempt < maxAttempts; attempt++) {
        try {
          const credentials = await baseProvider();
          if (attempt > 0) {
            logger.info(
              `AWS credentials loaded successfully after ${attempt} ${
                attempt === 1 ? "retry" : "retries"
              }`
            );
          }
          return credentials;
        } catch (error: unknown) {
          if (!(error instanceof Error)) {
            throw error;
          }
          lastError = error;

          // Only retry on credential provider errors
          if (
            error.name !== "CredentialsProviderError" &&
            error.name !== "ProviderError"
          ) {
            throw error;
          }

          const delayMs = 300 * 2 ** attempt;
          if (attempt < maxAttempts - 1) {
            logger.warn(
              `AWS credentials loading failed (attempt ${
                attempt + 1
              }/${maxAttempts}): ${error.message}. Retrying in ${delayMs}ms...`
            );
            await sleep(delayMs);
          } else {
            logger.error(
              `AWS credentials loading failed after ${maxAttempts} attempts: ${error.message}`
            );
          }
        }
      }

      throw (
        lastError ||
        new Error("Failed to load AWS credentials after multiple attempts")
      );
    };
  }
}
