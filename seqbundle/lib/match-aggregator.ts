import winston from "winston";
import { sumBy } from "lodash";
import { Bundle, FileGroup, Match, Owner, UnitOfWork } from "./seqbundle-types";
import { OwnershipResolver } from "./ownership-resolver";
import { matchName } from "./name-matcher";
import { errorMessage, ResolutionError } from "./seqbundle-errors";
import { mergeStages, ProcessingResult } from "./processing-result";
import { mapInOrder } from "./pool-helper";

export type AggregationReport = {
  // one per unit - in unit order
  matches: Match[];

  // one per owner - in order of the first unit that contributed to it
  bundles: Bundle[];

  result: ProcessingResult;
};

/**
 * What we learnt about a single unit before folding - gathered
 * concurrently so it must not touch anything shared.
 */
type UnitOutcome = {
  owner?: Owner;
  ownerProblem?: string;
  resolutionError?: ResolutionError;
  groupIdentifier?: string;
};

export class MatchAggregator {
  private readonly logger: winston.Logger;

  constructor(
    private _resolver: OwnershipResolver,
    logger: winston.Logger,
    private _concurrency = 4,
  ) {
    this.logger = logger.child({ component: "aggregator" });
  }

  /**
   * Resolve and match every unit, then fold the units that have both a
   * file group and an owner into one bundle per owner.
   *
   * @param units the units of work in step order
   * @param groups the file groups of the archive(s)
   */
  public async aggregate(
    units: readonly UnitOfWork[],
    groups: Map<string, FileGroup>,
  ): Promise<AggregationReport> {
    const identifiers = Array.from(groups.keys());

    this.logger.info(
      `Matching ${units.length} artifact(s) against ${identifiers.length} file group(s)`,
    );

    // the lookups fan out - but the outcomes come back in unit order
    const outcomes = await mapInOrder(units, this._concurrency, (u) =>
      this.examine(u, identifiers),
    );

    const matches: Match[] = [];
    const bundles = new Map<string, Bundle>();
    const errors: string[] = [];
    const usedIdentifiers = new Set<string>();

    for (const [i, unit] of units.entries()) {
      const outcome = outcomes[i];

      const group =
        outcome.groupIdentifier !== undefined
          ? groups.get(outcome.groupIdentifier)
          : undefined;

      matches.push({
        unit,
        group,
        owner: outcome.owner,
        ownerProblem: outcome.ownerProblem,
      });

      if (outcome.resolutionError) {
        errors.push(
          `Could not resolve project for ${unit.name}: ${outcome.resolutionError.message}`,
        );
      }

      if (!group) {
        // with no file groups at all there is nothing a unit could have matched
        if (identifiers.length > 0) {
          this.logger.error(`✗ ${unit.name.padEnd(20)} -> NO MATCH`);
          errors.push(`No matching file group for ${unit.name}`);
        }
        continue;
      }

      usedIdentifiers.add(group.identifier);

      this.logger.info(
        `✓ ${unit.name.padEnd(20)} -> ${group.identifier} (${group.files.length} files: ${group.files
          .map((f) => f.filename)
          .join(", ")})`,
      );

      if (!outcome.owner) {
        this.logger.warn(
          `Files for ${unit.name} will not be bundled - ${outcome.ownerProblem ?? "no project"}`,
        );
        continue;
      }

      let bundle = bundles.get(outcome.owner.id);

      if (!bundle) {
        bundle = { owner: outcome.owner, files: [], units: [] };
        bundles.set(outcome.owner.id, bundle);
      }

      bundle.files.push(...group.files);
      bundle.units.push(unit.name);
    }

    const unused = identifiers.filter((id) => !usedIdentifiers.has(id));

    if (unused.length > 0) {
      this.logger.warn("Unmatched file groups:");
      for (const id of unused) this.logger.warn(`  - ${id}`);
    }

    const bundleList = Array.from(bundles.values());

    return {
      matches,
      bundles: bundleList,
      result: mergeStages([
        {
          counters: {
            unitsConsidered: units.length,
            groupsFound: identifiers.length,
            groupsMatched: matches.filter(contributes).length,
            // within aggregation these are the files queued for upload
            filesAttached: sumBy(bundleList, (b) => b.files.length),
          },
          errors,
        },
      ]),
    };
  }

  private async examine(
    unit: UnitOfWork,
    identifiers: string[],
  ): Promise<UnitOutcome> {
    const outcome: UnitOutcome = {
      groupIdentifier: matchName(unit.name, identifiers),
    };

    try {
      const resolution = await this._resolver.resolve(unit);

      if (resolution.state === "owner") {
        outcome.owner = resolution.owner;
      } else {
        outcome.ownerProblem = resolution.reason;
        this.logger.warn(`Could not get project info for ${unit.name}: ${resolution.reason}`);
      }
    } catch (e) {
      const error =
        e instanceof ResolutionError
          ? e
          : new ResolutionError(errorMessage(e), [{ message: errorMessage(e), unit: unit.name }]);

      outcome.ownerProblem = error.message;
      outcome.resolutionError = error;

      this.logger.error(`Resolving ${unit.name} failed: ${error.message}`);
    }

    return outcome;
  }
}

/**
 * Only a match with both a file group and an owner ends up in a bundle.
 */
export function contributes(m: Match): boolean {
  return m.group !== undefined && m.owner !== undefined;
}
