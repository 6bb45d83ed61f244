import axios, { AxiosInstance, AxiosResponse } from "axios";
import winston from "winston";
import { LimsApi } from "./lims-api";
import {
  ArtifactRecord,
  exceptionMessage,
  FileRecord,
  parseArtifact,
  parseFile,
  parseProject,
  parseResearcher,
  parseSample,
  parseStepDetails,
  parseStorage,
  ProjectRecord,
  ResearcherRecord,
  SampleRecord,
  StepDetails,
} from "./lims-records";
import { setPublishedFlag, storageRequestXml } from "./lims-xml";
import { errorMessage, LimsRequestError } from "../seqbundle-errors";

export type LimsClientOptions = {
  // e.g. "https://lims.example.org" (the API lives under /api/v2)
  baseUri: string;
  username: string;
  password: string;
  timeoutMs?: number;
};

const XML_HEADERS = { "Content-Type": "application/xml" };

/**
 * The step details resource - the URI we are handed may be for the step itself.
 */
export function stepDetailsUri(stepUri: string): string {
  const trimmed = stepUri.replace(/\/+$/, "");
  return trimmed.endsWith("/details") ? trimmed : `${trimmed}/details`;
}

/**
 * A client for the LIMS REST API (XML over HTTP with basic auth).
 */
export class HttpLimsClient implements LimsApi {
  private readonly http: AxiosInstance;
  private readonly apiBase: string;
  private readonly logger: winston.Logger;

  constructor(options: LimsClientOptions, logger: winston.Logger) {
    this.apiBase = `${options.baseUri.replace(/\/+$/, "")}/api/v2`;
    this.logger = logger.child({ component: "lims" });

    this.http = axios.create({
      auth: { username: options.username, password: options.password },
      timeout: options.timeoutMs ?? 30000,
      // we decide for ourselves what is an error (so we can tell 404s apart)
      validateStatus: () => true,
    });
  }

  public async getStepDetails(stepUri: string): Promise<StepDetails> {
    return parseStepDetails(await this.getXml(stepDetailsUri(stepUri)));
  }

  public async getArtifact(uri: string): Promise<ArtifactRecord> {
    return parseArtifact(await this.getXml(uri));
  }

  public async getSample(uri: string): Promise<SampleRecord> {
    return parseSample(await this.getXml(uri));
  }

  public async getProject(uri: string): Promise<ProjectRecord> {
    return parseProject(await this.getXml(uri));
  }

  public async getResearcher(uri: string): Promise<ResearcherRecord> {
    return parseResearcher(await this.getXml(uri));
  }

  public async getFile(uri: string): Promise<FileRecord> {
    return parseFile(await this.getXml(uri));
  }

  public async downloadFile(fileUri: string): Promise<Buffer> {
    const url = `${fileUri}/download`;

    this.logger.debug(`Downloading ${url}`);

    const response = await this.send("GET", url, () =>
      this.http.get<ArrayBuffer>(url, { responseType: "arraybuffer" }),
    );

    return Buffer.from(response.data);
  }

  /**
   * Uploading is three requests - ask for a storage location, turn that
   * location into a file record and then post the content itself.
   */
  public async uploadFile(
    attachedToUri: string,
    filename: string,
    content: Buffer,
  ): Promise<FileRecord> {
    const storageUrl = `${this.apiBase}/glsstorage`;

    this.logger.debug(`Creating storage location at ${storageUrl}`);

    const storageXml = await this.postXml(
      storageUrl,
      storageRequestXml(attachedToUri, filename),
    );

    const storage = parseStorage(storageXml);

    this.logger.debug(`Got content location ${storage.contentLocation}`);

    const filesUrl = `${this.apiBase}/files`;

    // the storage response is itself the body for creating the file record
    const file = parseFile(await this.postXml(filesUrl, storageXml));

    this.logger.debug(`Created file record ${file.id}`);

    const uploadUrl = `${file.uri}/upload`;

    const form = new FormData();
    form.append(
      "file",
      new Blob([content], { type: contentTypeFor(filename) }),
      filename,
    );

    await this.send("POST", uploadUrl, () => this.http.post(uploadUrl, form));

    this.logger.debug(`Uploaded ${content.length} bytes to ${uploadUrl}`);

    return file;
  }

  public async publishFile(fileUri: string): Promise<FileRecord> {
    const original = await this.getXml(fileUri);

    const { xml, previous } = setPublishedFlag(original);

    this.logger.debug(
      `Changing is-published of ${fileUri} from '${previous ?? "(absent)"}' to 'true'`,
    );

    const response = await this.send("PUT", fileUri, () =>
      this.http.put<string>(fileUri, xml, {
        headers: XML_HEADERS,
        responseType: "text",
      }),
    );

    return parseFile(response.data);
  }

  private async getXml(url: string): Promise<string> {
    this.logger.debug(`GET ${url}`);

    const response = await this.send("GET", url, () =>
      this.http.get<string>(url, { responseType: "text" }),
    );

    return response.data;
  }

  private async postXml(url: string, body: string): Promise<string> {
    this.logger.debug(`POST ${url}`);

    const response = await this.send("POST", url, () =>
      this.http.post<string>(url, body, {
        headers: XML_HEADERS,
        responseType: "text",
      }),
    );

    return response.data;
  }

  /**
   * Make a request and turn anything other than a 2xx response with a
   * non-exception body into a LimsRequestError.
   */
  private async send<T>(
    method: string,
    url: string,
    request: () => Promise<AxiosResponse<T>>,
  ): Promise<AxiosResponse<T>> {
    let response: AxiosResponse<T>;

    try {
      response = await request();
    } catch (e) {
      throw new LimsRequestError(`${method} ${url} failed: ${errorMessage(e)}`);
    }

    const body = typeof response.data === "string" ? response.data : undefined;
    const exception = body ? exceptionMessage(body) : undefined;

    if (response.status < 200 || response.status >= 300) {
      throw new LimsRequestError(
        `${method} ${url} failed: ${response.status} - ${exception ?? response.statusText}`,
        response.status,
      );
    }

    // the LIMS can report errors in a body that came with a success status
    if (exception !== undefined)
      throw new LimsRequestError(
        `${method} ${url} failed: ${exception}`,
        response.status,
      );

    return response;
  }
}

function contentTypeFor(filename: string): string {
  return filename.toLowerCase().endsWith(".zip")
    ? "application/zip"
    : "application/octet-stream";
}
