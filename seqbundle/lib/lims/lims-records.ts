import { XMLParser } from "fast-xml-parser";
import { z } from "zod";
import { ParseError } from "../seqbundle-errors";

/**
 * The parser used for reading records. Namespace prefixes are dropped so
 * that "art:artifact" and "file:file" read as "artifact" and "file", and
 * element text is always left as a string (sample names like "001" must
 * not become numbers).
 */
export const recordParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
});

/**
 * A single element can come back as an object, a repeated element as an
 * array and a missing (or empty) one as undefined/"" - this always gives
 * an array.
 */
function manyOf<S extends z.ZodTypeAny>(schema: S) {
  return z.preprocess((v) => {
    if (v === undefined || v === "") return [];
    return Array.isArray(v) ? v : [v];
  }, z.array(schema));
}

const nonEmpty = z.string().min(1);

const referenceSchema = z
  .object({
    "@_uri": nonEmpty,
    "@_limsid": nonEmpty.optional(),
  })
  .transform((r) => ({ uri: r["@_uri"], id: r["@_limsid"] }));

export type Reference = z.output<typeof referenceSchema>;

const inputSchema = z
  .object({
    "@_uri": nonEmpty,
    "@_limsid": nonEmpty,
  })
  .transform((r) => ({ uri: r["@_uri"], id: r["@_limsid"] }));

const outputSchema = z
  .object({
    "@_uri": nonEmpty,
    "@_limsid": nonEmpty,
    "@_output-type": z.string().optional(),
    "@_output-generation-type": z.string().optional(),
  })
  .transform((o) => ({
    uri: o["@_uri"],
    id: o["@_limsid"],
    outputType: o["@_output-type"],
    generationType: o["@_output-generation-type"],
  }));

const inputOutputMapSchema = z.object({
  input: inputSchema,
  output: outputSchema.optional(),
});

export type InputOutputMapping = z.output<typeof inputOutputMapSchema>;

const stepDetailsSchema = z
  .object({
    "@_uri": z.string().optional(),
    "input-output-maps": z.preprocess(
      (v) => (v === undefined || v === "" ? {} : v),
      z.object({ "input-output-map": manyOf(inputOutputMapSchema) }),
    ),
  })
  .transform((d) => ({
    uri: d["@_uri"],
    mappings: d["input-output-maps"]["input-output-map"],
  }));

export type StepDetails = z.output<typeof stepDetailsSchema>;

const artifactSchema = z
  .object({
    "@_uri": nonEmpty,
    "@_limsid": nonEmpty,
    name: nonEmpty,
    type: z.string().optional(),
    "output-type": z.string().optional(),
    sample: manyOf(referenceSchema),
    file: manyOf(referenceSchema),
  })
  .transform((a) => ({
    uri: a["@_uri"],
    id: a["@_limsid"],
    name: a.name,
    type: a.type,
    outputType: a["output-type"],
    samples: a.sample,
    files: a.file,
  }));

export type ArtifactRecord = z.output<typeof artifactSchema>;

const sampleSchema = z
  .object({
    "@_uri": nonEmpty,
    "@_limsid": nonEmpty,
    name: nonEmpty,
    project: referenceSchema.optional(),
  })
  .transform((s) => ({
    uri: s["@_uri"],
    id: s["@_limsid"],
    name: s.name,
    project: s.project,
  }));

export type SampleRecord = z.output<typeof sampleSchema>;

const projectSchema = z
  .object({
    "@_uri": nonEmpty,
    "@_limsid": nonEmpty,
    name: nonEmpty,
    researcher: referenceSchema.optional(),
  })
  .transform((p) => ({
    uri: p["@_uri"],
    id: p["@_limsid"],
    name: p.name,
    researcher: p.researcher,
  }));

export type ProjectRecord = z.output<typeof projectSchema>;

const researcherSchema = z
  .object({
    "@_uri": nonEmpty,
    "first-name": z.string().optional(),
    "last-name": z.string().optional(),
    email: z.string().optional(),
  })
  .transform((r) => ({
    uri: r["@_uri"],
    firstName: r["first-name"],
    lastName: r["last-name"],
    // an empty element means no email
    email: r.email ? r.email : undefined,
  }));

export type ResearcherRecord = z.output<typeof researcherSchema>;

const fileSchema = z
  .object({
    "@_uri": nonEmpty,
    "@_limsid": nonEmpty,
    "attached-to": z.string().optional(),
    "content-location": z.string().optional(),
    "original-location": z.string().optional(),
    "is-published": z.string().optional(),
  })
  .transform((f) => ({
    uri: f["@_uri"],
    id: f["@_limsid"],
    attachedTo: f["attached-to"],
    contentLocation: f["content-location"],
    originalLocation: f["original-location"],
    isPublished: f["is-published"] === "true",
  }));

export type FileRecord = z.output<typeof fileSchema>;

/**
 * The storage location handed out before a file record can be created - it has
 * no identity of its own yet, just a content location.
 */
const storageSchema = z
  .object({
    "content-location": nonEmpty,
  })
  .transform((s) => ({ contentLocation: s["content-location"] }));

export type StorageRecord = z.output<typeof storageSchema>;

const exceptionSchema = z.object({
  "@_code": z.string().optional(),
  message: z.string().optional(),
});

export function parseXml(xml: string): Record<string, unknown> {
  const doc: unknown = recordParser.parse(xml);

  if (typeof doc !== "object" || doc === null || Array.isArray(doc))
    throw new ParseError("Response was not an XML document");

  return Object.fromEntries(Object.entries(doc));
}

/**
 * If the document is a LIMS exception return its message.
 */
export function exceptionMessage(xml: string): string | undefined {
  let doc: Record<string, unknown>;

  try {
    doc = parseXml(xml);
  } catch {
    return undefined;
  }

  if (!("exception" in doc)) return undefined;

  const e = exceptionSchema.safeParse(doc["exception"]);

  if (!e.success) return "Unknown error";

  return e.data.message ?? "Unknown error";
}

function parseRecord<S extends z.ZodTypeAny>(
  rootElement: string,
  schema: S,
  xml: string,
): z.output<S> {
  const doc = parseXml(xml);

  const result = schema.safeParse(doc[rootElement]);

  if (!result.success)
    throw new ParseError(
      `Could not read ${rootElement} record`,
      result.error.issues.map((i) => ({
        message: `${rootElement}.${i.path.join(".")}: ${i.message}`,
      })),
    );

  return result.data;
}

export const parseStepDetails = (xml: string): StepDetails =>
  parseRecord("details", stepDetailsSchema, xml);

export const parseArtifact = (xml: string): ArtifactRecord =>
  parseRecord("artifact", artifactSchema, xml);

export const parseSample = (xml: string): SampleRecord =>
  parseRecord("sample", sampleSchema, xml);

export const parseProject = (xml: string): ProjectRecord =>
  parseRecord("project", projectSchema, xml);

export const parseResearcher = (xml: string): ResearcherRecord =>
  parseRecord("researcher", researcherSchema, xml);

export const parseFile = (xml: string): FileRecord =>
  parseRecord("file", fileSchema, xml);

export const parseStorage = (xml: string): StorageRecord =>
  parseRecord("file", storageSchema, xml);
