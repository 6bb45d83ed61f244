import { basename } from "node:path/posix";
import { uniqBy } from "lodash";
import winston from "winston";
import { ArchiveSource, SourceArchive } from "../seqbundle-archive-source";
import { LimsApi } from "./lims-api";
import { ArtifactRecord, FileRecord, StepDetails } from "./lims-records";
import { ArchiveError, errorMessage } from "../seqbundle-errors";

export const ARCHIVE_EXTENSION = ".zip";

/**
 * The archives attached to a step - these are zip files uploaded to the
 * step's shared result files (outputs of type "ResultFile" generated
 * "PerAllInputs", which appear once in every input-output mapping).
 */
export class LimsStepArchiveSource extends ArchiveSource {
  private readonly logger: winston.Logger;

  constructor(
    private _stepUri: string,
    private _details: StepDetails,
    private _lims: LimsApi,
    logger: winston.Logger,
  ) {
    super();
    this.logger = logger.child({ component: "source" });
  }

  public get location(): string {
    return this._stepUri;
  }

  public async archives(): Promise<SourceArchive[]> {
    const outputs = this._details.mappings.flatMap((m) =>
      m.output ? [m.output] : [],
    );

    const sharedOutputs = uniqBy(
      outputs.filter(
        (o) =>
          o.outputType === "ResultFile" && o.generationType === "PerAllInputs",
      ),
      (o) => o.id,
    );

    const result: SourceArchive[] = [];

    for (const output of sharedOutputs) {
      let artifact: ArtifactRecord;

      try {
        artifact = await this._lims.getArtifact(output.uri);
      } catch (e) {
        result.push(
          unreadable(output.id, `Could not look up result file ${output.id}`, e),
        );
        continue;
      }

      for (const ref of artifact.files) {
        const fileName = ref.id ?? basename(ref.uri);

        let file: FileRecord;

        try {
          file = await this._lims.getFile(ref.uri);
        } catch (e) {
          result.push(
            unreadable(
              fileName,
              `Could not look up file ${fileName} on ${artifact.name}`,
              e,
            ),
          );
          continue;
        }

        const name = basename(file.originalLocation ?? "");

        if (!name.toLowerCase().endsWith(ARCHIVE_EXTENSION)) {
          this.logger.debug(
            `Skipping non-archive file ${name} on ${artifact.name}`,
          );
          continue;
        }

        this.logger.info(
          `Found archive ${name} on ${artifact.name} (${file.id})`,
        );

        result.push({
          name,
          load: () => this._lims.downloadFile(file.uri),
        });
      }
    }

    return result;
  }
}

/**
 * Something attached to the step that we could not even look up - it stands
 * in the list as an archive that fails to load.
 */
function unreadable(name: string, message: string, e: unknown): SourceArchive {
  const error = new ArchiveError(`${message}: ${errorMessage(e)}`, [
    { message: errorMessage(e), archive: name },
  ]);

  return { name, load: () => Promise.reject(error) };
}
