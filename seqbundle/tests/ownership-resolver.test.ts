import { OwnershipResolver } from "../lib/ownership-resolver";
import { ResolutionError } from "../lib/seqbundle-errors";
import { createSilentLogger } from "../lib/logging";
import { API, FakeLimsApi } from "./fake-lims-api";
import "jest-extended";

const logger = createSilentLogger();

test("resolves the project through the sample", async () => {
  const lims = new FakeLimsApi();
  const unit = lims.addUnit("2-1", "Sample001", "P-7", "Smith Lab");

  const r = await new OwnershipResolver(lims, logger).resolve(unit);

  expect(r).toEqual({
    state: "owner",
    owner: { id: "P-7", name: "Smith Lab", uri: `${API}/projects/P-7` },
  });
});

test("the first sample of a pooled artifact decides the owner", async () => {
  const lims = new FakeLimsApi();
  lims.addUnit("2-1", "A", "P-1");
  lims.addUnit("2-2", "B", "P-2");

  const pool = lims.addArtifact("2-9", "Pool", [
    `${API}/samples/S-2-2`,
    `${API}/samples/S-2-1`,
  ]);

  const r = await new OwnershipResolver(lims, logger).resolve(pool);

  expect(r.state === "owner" && r.owner.id).toBe("P-2");
});

test("a missing artifact is not found", async () => {
  const lims = new FakeLimsApi();

  const r = await new OwnershipResolver(lims, logger).resolve({
    id: "2-404",
    name: "Ghost",
    uri: `${API}/artifacts/2-404`,
  });

  expect(r).toEqual({ state: "not-found", reason: "artifact not found" });
});

test("an artifact with no sample is not found", async () => {
  const lims = new FakeLimsApi();
  const unit = lims.addArtifact("2-1", "Control");

  const r = await new OwnershipResolver(lims, logger).resolve(unit);

  expect(r).toEqual({ state: "not-found", reason: "no sample" });
});

test("a missing sample is not found", async () => {
  const lims = new FakeLimsApi();
  const unit = lims.addArtifact("2-1", "A", [`${API}/samples/gone`]);

  const r = await new OwnershipResolver(lims, logger).resolve(unit);

  expect(r).toEqual({ state: "not-found", reason: "sample not found" });
});

test("a sample with no project is not found", async () => {
  const lims = new FakeLimsApi();
  const unit = lims.addUnit("2-1", "A", "P-1");
  const sampleUri = `${API}/samples/S-2-1`;
  const sample = lims.samples.get(sampleUri);

  if (!sample) throw new Error("fake did not register the sample");

  lims.samples.set(sampleUri, { ...sample, project: undefined });

  const r = await new OwnershipResolver(lims, logger).resolve(unit);

  expect(r).toEqual({ state: "not-found", reason: "no project" });
});

test("a missing project is not found", async () => {
  const lims = new FakeLimsApi();
  const unit = lims.addUnit("2-1", "A", "P-1");

  lims.projects.clear();

  const r = await new OwnershipResolver(lims, logger).resolve(unit);

  expect(r).toEqual({ state: "not-found", reason: "project not found" });
});

test("a failure other than not found is a resolution error", async () => {
  const lims = new FakeLimsApi();
  const unit = lims.addUnit("2-1", "Sample001", "P-1");

  lims.failures.set(`${API}/samples/S-2-1`, 500);

  const attempt = new OwnershipResolver(lims, logger).resolve(unit);

  await expect(attempt).rejects.toBeInstanceOf(ResolutionError);
  await expect(attempt).rejects.toThrow(
    `Looking up the sample of Sample001 failed: request for ${API}/samples/S-2-1 failed: 500 - Simulated failure`,
  );
});

test("resolving twice gives the same answer and changes nothing", async () => {
  const lims = new FakeLimsApi();
  const unit = lims.addUnit("2-1", "A", "P-1");
  const resolver = new OwnershipResolver(lims, logger);

  const first = await resolver.resolve(unit);
  const second = await resolver.resolve(unit);

  expect(second).toEqual(first);
  expect(lims.uploads).toBeEmpty();
  expect(lims.published).toBeEmpty();
});
