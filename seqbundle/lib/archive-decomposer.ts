import AdmZip from "adm-zip";
import { ArchiveError, errorMessage } from "./seqbundle-errors";
import { ArchiveFile, FileGroup } from "./seqbundle-types";
import { foldCase } from "./name-matcher";

/**
 * Path segments that mark an entry as operating system metadata rather
 * than content (e.g. the resource forks macOS puts in zips).
 */
export const METADATA_MARKERS = ["__MACOSX", ".DS_Store"];

/**
 * The group identifier for a filename - the name with its final extension
 * removed. A leading dot does not start an extension.
 *
 * @param filename a filename with no path
 */
export function baseIdentifier(filename: string): string {
  const dot = filename.lastIndexOf(".");

  if (dot <= 0) return filename;

  return filename.slice(0, dot);
}

export function isMetadataEntry(entryPath: string): boolean {
  const segments = entryPath.split("/");

  return METADATA_MARKERS.some((m) => segments.includes(m));
}

/**
 * Read a zip archive held in memory and group its files by base name.
 *
 * Directory entries and OS metadata are skipped. Groups are keyed
 * case-insensitively, but the identifier keeps the case of the first file
 * seen. The returned map iterates in order of first occurrence in the archive.
 *
 * @param archive the raw archive bytes
 * @param archiveName used only in error messages
 */
export async function decompose(
  archive: Buffer,
  archiveName = "archive",
): Promise<Map<string, FileGroup>> {
  let entries: AdmZip.IZipEntry[];

  try {
    // central directory order - which is the order the files were added
    entries = new AdmZip(archive).getEntries();
  } catch (e) {
    throw new ArchiveError(`Could not read ${archiveName} as a zip archive`, [
      { message: errorMessage(e), archive: archiveName },
    ]);
  }

  // folded identifier -> the group we are building
  const building = new Map<string, { identifier: string; files: ArchiveFile[] }>();

  for (const entry of entries) {
    if (entry.isDirectory || entry.entryName.endsWith("/")) continue;
    if (isMetadataEntry(entry.entryName)) continue;

    const segments = entry.entryName.split("/");
    const filename = segments[segments.length - 1];
    const identifier = baseIdentifier(filename);

    let content: Buffer;

    try {
      content = entry.getData();
    } catch (e) {
      throw new ArchiveError(
        `Could not extract ${entry.entryName} from ${archiveName}`,
        [{ message: errorMessage(e), archive: archiveName, file: entry.entryName }],
      );
    }

    const key = foldCase(identifier);
    const existing = building.get(key);

    if (existing) existing.files.push({ filename, content });
    else building.set(key, { identifier, files: [{ filename, content }] });
  }

  const groups = new Map<string, FileGroup>();

  for (const g of building.values()) groups.set(g.identifier, g);

  return groups;
}

/**
 * Merge the group maps of several archives (in the order the archives were read).
 *
 * When an identifier (compared case-insensitively) is in more than one map the
 * group from the later archive replaces the earlier one - but it keeps the
 * position where the identifier was first seen.
 */
export function mergeGroups(
  maps: Iterable<Map<string, FileGroup>>,
): Map<string, FileGroup> {
  const merged = new Map<string, FileGroup>();

  for (const m of maps) {
    for (const g of m.values()) {
      merged.set(foldCase(g.identifier), g);
    }
  }

  const result = new Map<string, FileGroup>();

  for (const g of merged.values()) result.set(g.identifier, g);

  return result;
}
