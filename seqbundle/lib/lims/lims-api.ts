import {
  ArtifactRecord,
  FileRecord,
  ProjectRecord,
  ResearcherRecord,
  SampleRecord,
  StepDetails,
} from "./lims-records";

/**
 * The operations we need from the LIMS. Every method rejects with a
 * LimsRequestError (status 404 for a record that does not exist) or a
 * ParseError if the record came back without fields we need.
 */
export interface LimsApi {
  getStepDetails(stepUri: string): Promise<StepDetails>;

  getArtifact(uri: string): Promise<ArtifactRecord>;

  getSample(uri: string): Promise<SampleRecord>;

  getProject(uri: string): Promise<ProjectRecord>;

  getResearcher(uri: string): Promise<ResearcherRecord>;

  getFile(uri: string): Promise<FileRecord>;

  downloadFile(fileUri: string): Promise<Buffer>;

  /**
   * Create a file record attached to the given resource and upload its content.
   */
  uploadFile(
    attachedToUri: string,
    filename: string,
    content: Buffer,
  ): Promise<FileRecord>;

  /**
   * Set the published flag of a file record - returning the record as
   * it stands after the update.
   */
  publishFile(fileUri: string): Promise<FileRecord>;
}
