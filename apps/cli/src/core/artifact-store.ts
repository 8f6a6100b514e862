import { createReadStream, statSync } from "fs";
import { basename } from "path";
import {
  S3Client,
  PutObjectCommand,
  type PutObjectCommandInput,
} from "@aws-sdk/client-s3";
import { fromIni } from "@aws-sdk/credential-providers";
import type { EmrSparkConfig } from "@emr-spark/shared";
import { ConfigError, TransportError } from "@/lib/errors.ts";

export interface S3Location {
  bucket: string;
  key: string;
}

export type PutObjectDecorator = (
  request: PutObjectCommandInput,
) => PutObjectCommandInput;

export function parseS3Url(url: string): S3Location {
  const match = url.match(/^s3:\/\/([^/]+)\/?(.*)$/);
  if (!match || !match[1]) {
    throw new ConfigError(`Not an S3 URL: "${url}"`);
  }
  return { bucket: match[1], key: match[2] ?? "" };
}

/** `s3://bucket/jars` + `app.jar` → `s3://bucket/jars/app.jar` */
export function joinS3Url(folder: string, fileName: string): string {
  const { bucket, key } = parseS3Url(folder);
  const prefix = key.replace(/\/+$/, "");
  return prefix
    ? `s3://${bucket}/${prefix}/${fileName}`
    : `s3://${bucket}/${fileName}`;
}

export function decoratorFromConfig(
  config: EmrSparkConfig,
): PutObjectDecorator | undefined {
  const sse = config.s3.server_side_encryption;
  if (!sse) return undefined;
  return (request) => ({ ...request, ServerSideEncryption: sse });
}

export function createS3Client(config: EmrSparkConfig): S3Client {
  return new S3Client({
    region: config.aws.region,
    ...(config.aws.profile
      ? { credentials: fromIni({ profile: config.aws.profile }) }
      : {}),
  });
}

/**
 * Upload a local jar into `jarFolder`, keeping its file name.
 * Returns the `s3://` location spark-submit should load.
 */
export async function uploadArtifact(
  s3: S3Client,
  localPath: string,
  jarFolder: string,
  decorate: PutObjectDecorator = (request) => request,
): Promise<string> {
  const location = joinS3Url(jarFolder, basename(localPath));
  const { bucket, key } = parseS3Url(location);

  let size: number;
  try {
    size = statSync(localPath).size;
  } catch {
    throw new ConfigError(`Artifact not found: ${localPath}`);
  }

  const body = createReadStream(localPath);
  let readError: Error | undefined;
  body.once("error", (error) => {
    readError = error;
  });

  const request = decorate({
    Bucket: bucket,
    Key: key,
    Body: body,
    ContentLength: size,
  });

  try {
    await s3.send(new PutObjectCommand(request));
  } catch (error) {
    throw new TransportError("PutObject", readError ?? error);
  } finally {
    body.destroy();
  }
  if (readError) throw new TransportError("PutObject", readError);
  return location;
}
