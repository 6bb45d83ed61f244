import { basename } from "node:path/posix";
import { S3Client } from "@aws-sdk/client-s3";
import { ArchiveSource, SourceArchive } from "../seqbundle-archive-source";
import { getObjectBytes, parseS3Uri, S3Location } from "./s3-helpers";

/**
 * A single archive object in an S3 bucket.
 */
export class S3ArchiveSource extends ArchiveSource {
  private readonly _location: S3Location;

  constructor(
    private s3Uri: string,
    private s3Client: S3Client = new S3Client({}),
  ) {
    super();

    this._location = parseS3Uri(s3Uri);
  }

  public get location(): string {
    return this.s3Uri;
  }

  public get bucket(): string {
    return this._location.bucket;
  }

  public get key(): string {
    return this._location.key;
  }

  public async archives(): Promise<SourceArchive[]> {
    return [
      {
        name: basename(this.key),
        load: () => getObjectBytes(this.s3Client, this._location),
      },
    ];
  }
}
