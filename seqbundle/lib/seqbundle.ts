import winston from "winston";
import { LimsApi } from "./lims/lims-api";
import { StepDetails } from "./lims/lims-records";
import { ErrorReport, ErrorSpecific } from "./common-types";
import { BuiltBundle, FileGroup, UnitOfWork } from "./seqbundle-types";
import { ArchiveSource, SourceArchive } from "./seqbundle-archive-source";
import { ArchiveSourceFactory } from "./source/source-factory";
import { decompose, mergeGroups } from "./archive-decomposer";
import { OwnershipResolver } from "./ownership-resolver";
import { MatchAggregator } from "./match-aggregator";
import { BundleBuilder } from "./bundle-builder";
import { Publisher } from "./publisher";
import { Notifier } from "./notifier";
import {
  mergeStages,
  ProcessingResult,
  StageResult,
} from "./processing-result";
import { errorMessage, FatalError } from "./seqbundle-errors";
import { mapInOrder } from "./pool-helper";

type StepStructureReport = {
  state: "data";

  details: StepDetails;

  // one per distinct input artifact - in step order
  units: UnitOfWork[];
};

export type StepStructure = ErrorReport | StepStructureReport;

export type PipelineOptions = {
  // an S3 URI or absolute path to read the archive from instead of the step
  archive?: string;

  // the maximum number of units being resolved at once
  concurrency?: number;

  // when absent nobody is notified
  notifier?: Notifier;

  // for tests - by default the source is created from the archive option
  source?: ArchiveSource;
};

export type GroupCollection = {
  groups: Map<string, FileGroup>;
  stage: StageResult;
};

/**
 * Takes a step - finds the sequencing files of the step's archive(s),
 * works out which project each belongs to and publishes one archive of
 * files per project.
 */
export class SequenceBundlePipeline {
  private readonly logger: winston.Logger;

  constructor(
    private _lims: LimsApi,
    logger: winston.Logger,
    private _options: PipelineOptions = {},
  ) {
    this.logger = logger;
  }

  /**
   * Fetch the step and establish its units of work - if this cannot be
   * done there is no run at all.
   *
   * @param stepUri
   */
  public async checkStep(stepUri: string): Promise<StepStructure> {
    let details: StepDetails;

    try {
      details = await this._lims.getStepDetails(stepUri);
    } catch (e) {
      return {
        state: "error",
        error: "Failed to retrieve step",
        specific: [{ message: errorMessage(e), step: stepUri }],
      };
    }

    // an input appears in as many mappings as it has outputs - we want it once
    const inputs = new Map<string, { id: string; uri: string }>();

    for (const m of details.mappings) {
      if (!inputs.has(m.input.id)) inputs.set(m.input.id, m.input);
    }

    this.logger.debug(
      `Deduplicating: ${details.mappings.length} total mappings -> ${inputs.size} unique inputs`,
    );

    const errors: ErrorSpecific[] = [];

    const units = await mapInOrder(
      Array.from(inputs.values()),
      this._options.concurrency ?? 4,
      async (input): Promise<UnitOfWork | undefined> => {
        try {
          const artifact = await this._lims.getArtifact(input.uri);
          return { id: input.id, name: artifact.name, uri: input.uri };
        } catch (e) {
          errors.push({
            message: errorMessage(e),
            step: stepUri,
            unit: input.id,
          });
          return undefined;
        }
      },
    );

    if (errors.length > 0)
      return {
        state: "error",
        error: "Failed to retrieve step inputs",
        specific: errors,
      };

    return {
      state: "data",
      details,
      units: units.filter((u): u is UnitOfWork => u !== undefined),
    };
  }

  /**
   * Read every archive of the source into file groups. An archive that
   * cannot be loaded or read is recorded and the others still processed.
   */
  public async collectGroups(source: ArchiveSource): Promise<GroupCollection> {
    const errors: string[] = [];
    const maps: Map<string, FileGroup>[] = [];

    let archivesFailed = 0;

    let archives: SourceArchive[];

    try {
      archives = await source.archives();
    } catch (e) {
      const message = `Could not list archives of ${source.location}: ${errorMessage(e)}`;

      this.logger.error(message);

      return {
        groups: new Map(),
        stage: {
          counters: { groupsFound: 0, archivesFailed: 1 },
          errors: [message],
        },
      };
    }

    if (archives.length === 0) {
      this.logger.warn(`No zip archives found for ${source.location}`);
      errors.push("No zip archives found");
    }

    for (const a of archives) {
      try {
        this.logger.info(`Processing archive: ${a.name}`);

        const groups = await decompose(await a.load(), a.name);

        this.logger.info(
          `Grouped ${a.name} into ${groups.size} unique base names`,
        );

        maps.push(groups);
      } catch (e) {
        const message = `Could not read archive ${a.name}: ${errorMessage(e)}`;

        archivesFailed++;
        this.logger.error(message);
        errors.push(message);
      }
    }

    const groups = mergeGroups(maps);

    return {
      groups,
      stage: {
        counters: { groupsFound: groups.size, archivesFailed },
        errors,
      },
    };
  }

  /**
   * Run the whole pipeline for a step.
   *
   * @param stepUri
   * @throws FatalError if the step (or its inputs) cannot be retrieved
   */
  public async run(stepUri: string): Promise<ProcessingResult> {
    const structure = await this.checkStep(stepUri);

    if (structure.state !== "data")
      throw new FatalError(
        `${structure.error}: ${structure.specific.map((s) => s.message).join("; ")}`,
        structure.specific,
      );

    this.logger.info(
      `Found ${structure.units.length} unique input artifact(s) in step`,
    );

    const source =
      this._options.source ??
      ArchiveSourceFactory.CreateSource(
        this._options.archive,
        stepUri,
        structure.details,
        this._lims,
        this.logger,
      );

    const collected = await this.collectGroups(source);

    const aggregator = new MatchAggregator(
      new OwnershipResolver(this._lims, this.logger),
      this.logger,
      this._options.concurrency,
    );

    const aggregation = await aggregator.aggregate(
      structure.units,
      collected.groups,
    );

    this.logger.info("=".repeat(50));
    this.logger.info("CREATING PROJECT ZIP FILES");
    this.logger.info("=".repeat(50));

    const builder = new BundleBuilder(this.logger);
    const built: BuiltBundle[] = [];
    const collisionErrors: string[] = [];

    for (const b of aggregation.bundles) {
      const bb = await builder.build(b);

      for (const c of bb.collisions)
        collisionErrors.push(
          `${c} was contributed more than once to ${bb.filename} - only the last copy is in the archive`,
        );

      built.push(bb);
    }

    this.logger.info("=".repeat(50));
    this.logger.info("UPLOADING ZIP FILES TO PROJECTS");
    this.logger.info("=".repeat(50));

    const publishing = await new Publisher(this._lims, this.logger).publish(
      built,
    );

    const stages: StageResult[] = [
      collected.stage,
      {
        counters: {
          unitsConsidered: aggregation.result.unitsConsidered,
          groupsMatched: aggregation.result.groupsMatched,
        },
        errors: aggregation.result.errors,
      },
      { counters: {}, errors: collisionErrors },
      publishing.stage,
    ];

    if (this._options.notifier)
      stages.push(await this._options.notifier.notifyAll(publishing.published));

    return mergeStages(stages);
  }
}
