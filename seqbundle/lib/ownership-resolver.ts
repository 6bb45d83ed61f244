import winston from "winston";
import { LimsApi } from "./lims/lims-api";
import { Owner, UnitOfWork } from "./seqbundle-types";
import { errorMessage, isNotFound, ResolutionError } from "./seqbundle-errors";

export type OwnerResolution =
  | { state: "owner"; owner: Owner }
  | { state: "not-found"; reason: string };

/**
 * Walks the chain artifact -> sample -> project to find who owns the
 * files of a unit of work.
 *
 * Nothing is cached and nothing is changed, so resolving the same unit
 * twice is safe.
 */
export class OwnershipResolver {
  private readonly logger: winston.Logger;

  constructor(
    private _lims: LimsApi,
    logger: winston.Logger,
  ) {
    this.logger = logger.child({ component: "resolver" });
  }

  /**
   * Resolve the owning project of a unit.
   *
   * @param unit the unit of work (an input artifact of the step)
   * @returns the owner, or a not-found result describing which link of the chain is missing
   * @throws ResolutionError if any lookup fails for a reason other than the record not existing
   */
  public async resolve(unit: UnitOfWork): Promise<OwnerResolution> {
    this.logger.debug(`Getting project info for artifact ${unit.name} (${unit.uri})`);

    const artifact = await this.lookup(unit, "artifact", () =>
      this._lims.getArtifact(unit.uri),
    );

    if (!artifact) return notFound("artifact not found");

    // pooled artifacts can carry several samples - the first is the submitted sample
    const sampleRef = artifact.samples[0];

    if (!sampleRef) return notFound("no sample");

    const sample = await this.lookup(unit, "sample", () =>
      this._lims.getSample(sampleRef.uri),
    );

    if (!sample) return notFound("sample not found");

    if (!sample.project) return notFound("no project");

    const projectUri = sample.project.uri;

    const project = await this.lookup(unit, "project", () =>
      this._lims.getProject(projectUri),
    );

    if (!project) return notFound("project not found");

    this.logger.debug(
      `Artifact ${unit.name} belongs to project ${project.name} (${project.id})`,
    );

    return {
      state: "owner",
      owner: { id: project.id, name: project.name, uri: project.uri },
    };
  }

  /**
   * Perform one lookup of the chain - returning undefined if the LIMS
   * says the record does not exist.
   */
  private async lookup<T>(
    unit: UnitOfWork,
    what: string,
    fetch: () => Promise<T>,
  ): Promise<T | undefined> {
    try {
      return await fetch();
    } catch (e) {
      if (isNotFound(e)) return undefined;

      throw new ResolutionError(
        `Looking up the ${what} of ${unit.name} failed: ${errorMessage(e)}`,
        [{ message: errorMessage(e), unit: unit.name }],
      );
    }
  }
}

function notFound(reason: string): OwnerResolution {
  return { state: "not-found", reason };
}
