/**
 * A single file as it was found in an archive (and as it will be
 * written to a bundle) - the name is the last path segment of the entry.
 */
export type ArchiveFile = {
  filename: string;
  content: Buffer;
};

/**
 * All the files of an archive that share a base name (the filename with
 * its final extension removed) e.g. "Sample001.ab1" and "Sample001.seq".
 */
export type FileGroup = {
  // case is that of the first file seen with this base name
  identifier: string;

  // in the order they appeared in the archive
  files: readonly ArchiveFile[];
};

/**
 * One input artifact of the step that wants its files found.
 */
export type UnitOfWork = {
  // the LIMS id of the input artifact e.g. "2-1234"
  id: string;

  // the artifact name - which is what we match against file groups
  name: string;

  uri: string;
};

/**
 * The project that ends up receiving a bundle.
 */
export type Owner = {
  id: string;
  name: string;
  uri: string;
};

export type Match = {
  unit: UnitOfWork;
  group: FileGroup | undefined;
  owner: Owner | undefined;

  // when there is no owner - a description of why
  ownerProblem?: string;
};

export type Bundle = {
  owner: Owner;

  // every file contributed by every matching unit - including any
  // that share a filename
  files: ArchiveFile[];

  // the names of the units that contributed, in contribution order
  units: string[];
};

export type BuiltBundle = {
  owner: Owner;
  filename: string;
  content: Buffer;
  fileCount: number;
  filenames: string[];

  // filenames that were written more than once (the archive keeps only the last)
  collisions: string[];
};

export type PublishedBundle = {
  owner: Owner;
  filename: string;
  fileId: string;
  fileUri: string;
  fileCount: number;
  filenames: string[];
};
