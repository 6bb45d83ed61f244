import { basename, isAbsolute } from "node:path";
import { readFile } from "node:fs/promises";
import { ArchiveSource, SourceArchive } from "../seqbundle-archive-source";

/**
 * A single archive file on a POSIX filesystem.
 */
export class PosixArchiveSource extends ArchiveSource {
  constructor(private absoluteArchivePath: string) {
    super();

    // the CLI resolves relative paths before we get here - so this is just a double-check
    if (!isAbsolute(absoluteArchivePath))
      throw new Error("Archive path must be absolute");
  }

  public get location(): string {
    return this.absoluteArchivePath;
  }

  public async archives(): Promise<SourceArchive[]> {
    return [
      {
        name: basename(this.absoluteArchivePath),
        load: async () => await readFile(this.absoluteArchivePath),
      },
    ];
  }
}
