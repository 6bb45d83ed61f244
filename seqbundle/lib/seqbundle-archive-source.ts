/**
 * An archive found by a source - its content is only fetched when
 * asked for, so that one archive failing to load does not stop us
 * listing (and reading) the others.
 */
export type SourceArchive = {
  name: string;
  load(): Promise<Buffer>;
};

export abstract class ArchiveSource {
  /**
   * The URL/URI/path that describes where the archives come from.
   * e.g. "s3://bucket/key", "/Users/person/run.zip" or a step URI
   */
  public abstract get location(): string;

  /**
   * The archives available from this source, in the order they
   * should be read.
   */
  public abstract archives(): Promise<SourceArchive[]>;
}
