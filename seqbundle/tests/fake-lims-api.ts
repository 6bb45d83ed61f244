import { LimsApi } from "../lib/lims/lims-api";
import {
  ArtifactRecord,
  FileRecord,
  ProjectRecord,
  ResearcherRecord,
  SampleRecord,
  StepDetails,
} from "../lib/lims/lims-records";
import { LimsRequestError } from "../lib/seqbundle-errors";
import { UnitOfWork } from "../lib/seqbundle-types";

export const API = "https://lims.test/api/v2";

export const STEP_URI = `${API}/steps/24-100`;

export type Upload = {
  attachedTo: string;
  filename: string;
  content: Buffer;
  fileUri: string;
};

/**
 * An in-memory LIMS - records are registered by URI, and any URI can be
 * made to fail with a given status.
 */
export class FakeLimsApi implements LimsApi {
  public readonly steps = new Map<string, StepDetails>();
  public readonly artifacts = new Map<string, ArtifactRecord>();
  public readonly samples = new Map<string, SampleRecord>();
  public readonly projects = new Map<string, ProjectRecord>();
  public readonly researchers = new Map<string, ResearcherRecord>();
  public readonly files = new Map<string, FileRecord>();
  public readonly contents = new Map<string, Buffer>();

  // uri -> the status a request for it fails with
  public readonly failures = new Map<string, number>();

  public readonly uploads: Upload[] = [];
  public readonly published: string[] = [];
  public readonly requested: string[] = [];

  // when true publishing "succeeds" but the record still reads as unpublished
  public ignorePublish = false;

  private nextFileId = 1;

  public async getStepDetails(stepUri: string): Promise<StepDetails> {
    return this.lookup(this.steps, stepUri);
  }

  public async getArtifact(uri: string): Promise<ArtifactRecord> {
    return this.lookup(this.artifacts, uri);
  }

  public async getSample(uri: string): Promise<SampleRecord> {
    return this.lookup(this.samples, uri);
  }

  public async getProject(uri: string): Promise<ProjectRecord> {
    return this.lookup(this.projects, uri);
  }

  public async getResearcher(uri: string): Promise<ResearcherRecord> {
    return this.lookup(this.researchers, uri);
  }

  public async getFile(uri: string): Promise<FileRecord> {
    return this.lookup(this.files, uri);
  }

  public async downloadFile(fileUri: string): Promise<Buffer> {
    return this.lookup(this.contents, `${fileUri}/download`);
  }

  public async uploadFile(
    attachedToUri: string,
    filename: string,
    content: Buffer,
  ): Promise<FileRecord> {
    this.fail(`${attachedToUri}/upload`);

    const id = `40-${this.nextFileId++}`;
    const file: FileRecord = {
      uri: `${API}/files/${id}`,
      id,
      attachedTo: attachedToUri,
      contentLocation: `sftp://lims.test/files/${filename}`,
      originalLocation: filename,
      isPublished: false,
    };

    this.files.set(file.uri, file);
    this.uploads.push({
      attachedTo: attachedToUri,
      filename,
      content,
      fileUri: file.uri,
    });

    return file;
  }

  public async publishFile(fileUri: string): Promise<FileRecord> {
    const file = await this.getFile(fileUri);

    this.fail(`${fileUri}/publish`);

    const updated = { ...file, isPublished: !this.ignorePublish };

    this.files.set(fileUri, updated);
    this.published.push(fileUri);

    return updated;
  }

  /**
   * Register an input artifact that belongs to a project (via a sample) and
   * return it as a unit of work.
   */
  public addUnit(
    id: string,
    name: string,
    projectId: string,
    projectName = `Project ${projectId}`,
  ): UnitOfWork {
    const projectUri = `${API}/projects/${projectId}`;
    const sampleUri = `${API}/samples/S-${id}`;

    if (!this.projects.has(projectUri))
      this.projects.set(projectUri, {
        uri: projectUri,
        id: projectId,
        name: projectName,
        researcher: undefined,
      });

    this.samples.set(sampleUri, {
      uri: sampleUri,
      id: `S-${id}`,
      name: `${name}-sample`,
      project: { uri: projectUri, id: projectId },
    });

    return this.addArtifact(id, name, [sampleUri]);
  }

  public addArtifact(
    id: string,
    name: string,
    sampleUris: string[] = [],
  ): UnitOfWork {
    const uri = `${API}/artifacts/${id}`;

    this.artifacts.set(uri, {
      uri,
      id,
      name,
      type: "Analyte",
      outputType: "Analyte",
      samples: sampleUris.map((s) => ({ uri: s, id: undefined })),
      files: [],
    });

    return { id, name, uri };
  }

  public setResearcherEmail(projectId: string, email: string | undefined) {
    const projectUri = `${API}/projects/${projectId}`;
    const project = this.projects.get(projectUri);
    const researcherUri = `${API}/researchers/R-${projectId}`;

    if (!project) throw new Error(`No project ${projectId} in the fake`);

    this.projects.set(projectUri, {
      ...project,
      researcher: { uri: researcherUri, id: undefined },
    });
    this.researchers.set(researcherUri, {
      uri: researcherUri,
      firstName: "Test",
      lastName: "Researcher",
      email,
    });
  }

  /**
   * Register a step whose inputs are the given units - each mapped to its
   * own output and to the shared result file (if given).
   */
  public addStep(
    units: UnitOfWork[],
    sharedOutputId?: string,
    stepUri = STEP_URI,
  ): StepDetails {
    const mappings: StepDetails["mappings"] = [];

    for (const u of units) {
      mappings.push({
        input: { uri: u.uri, id: u.id },
        output: {
          uri: `${API}/artifacts/${u.id}-out`,
          id: `${u.id}-out`,
          outputType: "Analyte",
          generationType: "PerInput",
        },
      });

      if (sharedOutputId)
        mappings.push({
          input: { uri: u.uri, id: u.id },
          output: {
            uri: `${API}/artifacts/${sharedOutputId}`,
            id: sharedOutputId,
            outputType: "ResultFile",
            generationType: "PerAllInputs",
          },
        });
    }

    const details: StepDetails = { uri: `${stepUri}/details`, mappings };

    this.steps.set(stepUri, details);

    return details;
  }

  /**
   * Attach an archive to the shared result file of a step.
   */
  public attachFile(
    sharedOutputId: string,
    fileId: string,
    originalLocation: string,
    content: Buffer,
  ) {
    const artifactUri = `${API}/artifacts/${sharedOutputId}`;
    const fileUri = `${API}/files/${fileId}`;

    const existing = this.artifacts.get(artifactUri) ?? {
      uri: artifactUri,
      id: sharedOutputId,
      name: "Sequencing Results",
      type: "ResultFile",
      outputType: "ResultFile",
      samples: [],
      files: [],
    };

    this.artifacts.set(artifactUri, {
      ...existing,
      files: [...existing.files, { uri: fileUri, id: fileId }],
    });

    this.files.set(fileUri, {
      uri: fileUri,
      id: fileId,
      attachedTo: artifactUri,
      contentLocation: `sftp://lims.test/files/${fileId}`,
      originalLocation,
      isPublished: false,
    });

    this.contents.set(`${fileUri}/download`, content);
  }

  private lookup<T>(records: Map<string, T>, uri: string): T {
    this.requested.push(uri);
    this.fail(uri);

    const r = records.get(uri);

    if (r === undefined)
      throw new LimsRequestError(`GET ${uri} failed: 404 - Not Found`, 404);

    return r;
  }

  private fail(uri: string) {
    const status = this.failures.get(uri);

    if (status !== undefined)
      throw new LimsRequestError(
        `request for ${uri} failed: ${status} - Simulated failure`,
        status,
      );
  }
}
