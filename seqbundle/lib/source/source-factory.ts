import winston from "winston";
import { ArchiveSource } from "../seqbundle-archive-source";
import { S3ArchiveSource } from "../s3/s3-archive-source";
import { PosixArchiveSource } from "../posix/posix-archive-source";
import { LimsStepArchiveSource } from "../lims/lims-archive-source";
import { LimsApi } from "../lims/lims-api";
import { StepDetails } from "../lims/lims-records";

export class ArchiveSourceFactory {
  /**
   * Create the source of archives for a run - an explicitly given location
   * (an S3 URI or an absolute path) or otherwise the archives attached to the step.
   */
  public static CreateSource = (
    location: string | undefined,
    stepUri: string,
    details: StepDetails,
    lims: LimsApi,
    logger: winston.Logger,
  ): ArchiveSource => {
    if (!location)
      return new LimsStepArchiveSource(stepUri, details, lims, logger);
    if (location.startsWith("s3://")) return new S3ArchiveSource(location);
    else return new PosixArchiveSource(location);
  };
}
