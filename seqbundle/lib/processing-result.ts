import winston from "winston";

export type ProcessingCounters = {
  unitsConsidered: number;
  groupsFound: number;
  groupsMatched: number;
  filesAttached: number;
  archivesFailed: number;
};

/**
 * What a single stage of the pipeline contributes to the overall result.
 * Counters a stage does not know about are left out, and a later stage
 * that does set a counter overrides an earlier one.
 */
export type StageResult = {
  counters: Partial<ProcessingCounters>;
  errors: readonly string[];
};

export type ProcessingResult = Readonly<ProcessingCounters> & {
  readonly errors: readonly string[];
  readonly success: boolean;
};

const EMPTY_COUNTERS: ProcessingCounters = {
  unitsConsidered: 0,
  groupsFound: 0,
  groupsMatched: 0,
  filesAttached: 0,
  archivesFailed: 0,
};

const COUNTER_NAMES = Object.keys(EMPTY_COUNTERS).filter(
  (k): k is keyof ProcessingCounters => k in EMPTY_COUNTERS,
);

/**
 * A run is successful if it attached something - or if there was
 * nothing for it to do in the first place (no units, or no files at all
 * and no archive that we failed to read).
 */
function isSuccess(c: ProcessingCounters): boolean {
  if (c.filesAttached > 0) return true;
  if (c.unitsConsidered === 0) return true;
  return c.groupsFound === 0 && c.archivesFailed === 0;
}

/**
 * Fold the stage results (in pipeline order) into the result of a run.
 */
export function mergeStages(stages: StageResult[]): ProcessingResult {
  const counters: ProcessingCounters = { ...EMPTY_COUNTERS };
  const errors: string[] = [];

  for (const s of stages) {
    for (const name of COUNTER_NAMES) {
      const v = s.counters[name];
      if (v !== undefined) counters[name] = v;
    }
    errors.push(...s.errors);
  }

  return Object.freeze({
    ...counters,
    errors: Object.freeze(errors),
    success: isSuccess(counters),
  });
}

export function logSummary(logger: winston.Logger, result: ProcessingResult) {
  logger.info("=".repeat(80));
  logger.info("Processing Complete");
  logger.info(`Success: ${result.success}`);
  logger.info(`Units Considered: ${result.unitsConsidered}`);
  logger.info(`File Groups Found: ${result.groupsFound}`);
  logger.info(`Groups Matched: ${result.groupsMatched}`);
  logger.info(`Files Attached: ${result.filesAttached}`);

  if (result.errors.length > 0) {
    logger.warn(`Errors encountered: ${result.errors.length}`);
    for (const e of result.errors) logger.warn(`  - ${e}`);
  }

  logger.info("=".repeat(80));
}
