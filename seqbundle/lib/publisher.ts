import winston from "winston";
import { LimsApi } from "./lims/lims-api";
import { BuiltBundle, PublishedBundle } from "./seqbundle-types";
import { errorMessage, UploadError } from "./seqbundle-errors";
import { StageResult } from "./processing-result";

export type PublishReport = {
  published: PublishedBundle[];
  stage: StageResult;
};

/**
 * Uploads bundle archives to their owners and makes them visible to
 * the people downstream (by flipping the file's published flag).
 */
export class Publisher {
  private readonly logger: winston.Logger;

  constructor(
    private _lims: LimsApi,
    logger: winston.Logger,
  ) {
    this.logger = logger.child({ component: "publisher" });
  }

  /**
   * Upload and publish every bundle in turn. A failure for one bundle is
   * recorded and the rest carry on - only bundles that were both uploaded
   * and published count towards the files attached.
   */
  public async publish(bundles: BuiltBundle[]): Promise<PublishReport> {
    const published: PublishedBundle[] = [];
    const errors: string[] = [];

    let filesAttached = 0;

    for (const b of bundles) {
      try {
        const p = await this.uploadAndPublish(b);

        published.push(p);
        filesAttached += p.fileCount;
      } catch (e) {
        this.logger.error(`  ✗ Failed: ${errorMessage(e)}`);
        errors.push(errorMessage(e));
      }
    }

    return { published, stage: { counters: { filesAttached }, errors } };
  }

  private async uploadAndPublish(b: BuiltBundle): Promise<PublishedBundle> {
    this.logger.info(`Project: ${b.owner.name} (${b.owner.id})`);
    this.logger.info(`  Uploading: ${b.filename} (${b.fileCount} files)`);

    let fileUri: string;
    let fileId: string;

    try {
      const file = await this._lims.uploadFile(
        b.owner.uri,
        b.filename,
        b.content,
      );
      fileUri = file.uri;
      fileId = file.id;
    } catch (e) {
      throw new UploadError(
        `Failed to upload ${b.filename} to project ${b.owner.name}: ${errorMessage(e)}`,
        [{ message: errorMessage(e), owner: b.owner.name, file: b.filename }],
      );
    }

    this.logger.info(`  ✓ Uploaded as ${fileId}`);

    let isPublished: boolean;

    try {
      isPublished = (await this._lims.publishFile(fileUri)).isPublished;
    } catch (e) {
      throw new UploadError(
        `Failed to publish ${b.filename} (${fileId}): ${errorMessage(e)}`,
        [{ message: errorMessage(e), owner: b.owner.name, file: b.filename }],
      );
    }

    if (!isPublished)
      throw new UploadError(
        `Published ${b.filename} (${fileId}) but the LIMS does not report it as published`,
        [
          {
            message: "is-published was not true after update",
            owner: b.owner.name,
            file: b.filename,
          },
        ],
      );

    this.logger.info(`  ✓ Published ${b.filename}`);

    return {
      owner: b.owner,
      filename: b.filename,
      fileId,
      fileUri,
      fileCount: b.fileCount,
      filenames: b.filenames,
    };
  }
}
