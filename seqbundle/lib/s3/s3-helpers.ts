import { GetObjectCommand, S3Client } from "@aws-sdk/client-s3";

export type S3Location = {
  bucket: string;
  key: string;
};

/**
 * Break an "s3://bucket/key" URI into its parts.
 *
 * @param s3Uri
 */
export function parseS3Uri(s3Uri: string): S3Location {
  const url = new URL(s3Uri);

  if (url.protocol !== "s3:")
    throw new Error(
      `Must be passed a valid S3 URI - instead got ${url.protocol} as a protocol`,
    );

  // not a proper check but might stop some invalid bucket name mixups
  if (!url.hostname || url.hostname.length < 3)
    throw new Error(
      `Must be passed a valid S3 URI - instead got ${url.host} as a possible bucket name`,
    );

  // S3 keys do not actually start with a leading / - that we will get from the url.pathname - so we remove
  const key = decodeURIComponent(url.pathname.substring(1));

  if (!key || key.endsWith("/"))
    throw new Error(`S3 URI ${s3Uri} must name an object rather than a folder`);

  return { bucket: url.hostname, key };
}

export async function getObjectBytes(
  s3Client: S3Client,
  location: S3Location,
): Promise<Buffer> {
  const getOutput = await s3Client.send(
    new GetObjectCommand({
      Bucket: location.bucket,
      Key: location.key,
    }),
  );

  if (!getOutput.Body) throw new Error("Could not get S3 content");

  return Buffer.from(await getOutput.Body.transformToByteArray());
}
