import AdmZip from "adm-zip";
import winston from "winston";
import { uniq } from "lodash";
import { Bundle, BuiltBundle, Owner } from "./seqbundle-types";

export const BUNDLE_SUFFIX = "_sequencing_files.zip";

/**
 * Replace anything that cannot appear in a filename on common
 * filesystems (or that would read as a path) with "_".
 */
export function sanitizeArchiveName(name: string): string {
  return name.replace(/[/\\:*?"<>|\u0000-\u001f]/g, "_");
}

export function archiveNameFor(owner: Owner, suffix = BUNDLE_SUFFIX): string {
  return sanitizeArchiveName(`${owner.name}${suffix}`);
}

export class BundleBuilder {
  private readonly logger: winston.Logger;

  constructor(
    logger: winston.Logger,
    private _suffix = BUNDLE_SUFFIX,
  ) {
    this.logger = logger.child({ component: "builder" });
  }

  /**
   * Write every file of a bundle into a single zip archive under its
   * original name.
   *
   * The archive holds only one entry per name - when two contributing files
   * share a name the later payload replaces the earlier (in the position of
   * the first).
   * Such names are returned as collisions so the caller can report them.
   *
   * @param bundle
   */
  public async build(bundle: Bundle): Promise<BuiltBundle> {
    const filename = archiveNameFor(bundle.owner, this._suffix);

    this.logger.info(`Project: ${bundle.owner.name} (${bundle.owner.id})`);
    this.logger.info(`  Files to include: ${bundle.files.length}`);

    // name -> content - a repeated name keeps its first position
    const entries = new Map<string, Buffer>();
    const collisions: string[] = [];

    for (const f of bundle.files) {
      if (entries.has(f.filename)) {
        collisions.push(f.filename);
        this.logger.warn(
          `  ${f.filename} occurs more than once in ${filename} - the later copy replaces the earlier`,
        );
      }

      this.logger.debug(`    Adding: ${f.filename}`);

      entries.set(f.filename, f.content);
    }

    const zip = new AdmZip();

    for (const [name, data] of entries) zip.addFile(name, data);

    // entries with content are written DEFLATE compressed
    const content = zip.toBuffer();

    this.logger.info(`  ✓ Created ${filename} (${content.length} bytes)`);

    return {
      owner: bundle.owner,
      filename,
      content,
      fileCount: bundle.files.length,
      filenames: bundle.files.map((f) => f.filename),
      collisions: uniq(collisions),
    };
  }
}
