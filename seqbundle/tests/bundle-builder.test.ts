import {
  archiveNameFor,
  BundleBuilder,
  BUNDLE_SUFFIX,
  sanitizeArchiveName,
} from "../lib/bundle-builder";
import { createSilentLogger } from "../lib/logging";
import { Bundle, Owner } from "../lib/seqbundle-types";
import { readZip } from "./zip-helper";
import "jest-extended";

const owner: Owner = {
  id: "P-1",
  name: "Smith Lab",
  uri: "https://lims.test/api/v2/projects/P-1",
};

function file(filename: string, content: string) {
  return { filename, content: Buffer.from(content) };
}

test("archive names come from the project name", () => {
  expect(BUNDLE_SUFFIX).toBe("_sequencing_files.zip");
  expect(archiveNameFor(owner)).toBe("Smith Lab_sequencing_files.zip");
  expect(archiveNameFor(owner, ".zip")).toBe("Smith Lab.zip");
});

test("characters that cannot be in a filename are replaced", () => {
  expect(sanitizeArchiveName('a/b\\c:d*e?f"g<h>i|j')).toBe(
    "a_b_c_d_e_f_g_h_i_j",
  );
  expect(sanitizeArchiveName("tab\there")).toBe("tab_here");
  expect(sanitizeArchiveName("Smith Lab (2024)")).toBe("Smith Lab (2024)");
});

test("every file is written under its own name", async () => {
  const bundle: Bundle = {
    owner,
    files: [file("S1.ab1", "one"), file("S1.seq", "ACGT"), file("S2.ab1", "two")],
    units: ["S1", "S2"],
  };

  const built = await new BundleBuilder(createSilentLogger()).build(bundle);

  expect(built.filename).toBe("Smith Lab_sequencing_files.zip");
  expect(built.owner).toBe(owner);
  expect(built.fileCount).toBe(3);
  expect(built.filenames).toEqual(["S1.ab1", "S1.seq", "S2.ab1"]);
  expect(built.collisions).toBeEmpty();

  const entries = await readZip(built.content);

  expect(Array.from(entries.keys())).toEqual(["S1.ab1", "S1.seq", "S2.ab1"]);
  expect(entries.get("S1.seq")).toBe("ACGT");
});

test("numeric filenames are written in bundle order", async () => {
  const built = await new BundleBuilder(createSilentLogger()).build({
    owner,
    files: [file("10.ab1", "a"), file("10", "b"), file("2", "c")],
    units: ["10", "2"],
  });

  const entries = await readZip(built.content);

  expect(Array.from(entries.keys())).toEqual(["10.ab1", "10", "2"]);
});

test("a repeated filename keeps the last copy and is reported", async () => {
  const bundle: Bundle = {
    owner,
    files: [
      file("S1.ab1", "first"),
      file("S1.ab1", "second"),
      file("S1.ab1", "third"),
    ],
    units: ["S1", "S1-rerun", "S1-again"],
  };

  const built = await new BundleBuilder(createSilentLogger()).build(bundle);

  expect(built.fileCount).toBe(3);
  expect(built.collisions).toEqual(["S1.ab1"]);

  const entries = await readZip(built.content);

  expect(entries.size).toBe(1);
  expect(entries.get("S1.ab1")).toBe("third");
});

test("a custom suffix is used for the archive name", async () => {
  const built = await new BundleBuilder(createSilentLogger(), "_files.zip").build({
    owner: { ...owner, name: "A/B" },
    files: [file("x.txt", "x")],
    units: ["x"],
  });

  expect(built.filename).toBe("A_B_files.zip");
});
