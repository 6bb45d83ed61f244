import { parseFile, parseXml } from "../lib/lims/lims-records";
import {
  FILE_NAMESPACE,
  setPublishedFlag,
  storageRequestXml,
} from "../lib/lims/lims-xml";
import { ParseError } from "../lib/seqbundle-errors";
import "jest-extended";

const API = "https://lims.test/api/v2";

const FILE_XML = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<file:file xmlns:file="${FILE_NAMESPACE}" uri="${API}/files/40-1" limsid="40-1">
  <attached-to>${API}/projects/P-1</attached-to>
  <content-location>sftp://lims.test/files/P-1/a.zip</content-location>
  <original-location>a.zip</original-location>
  <is-published>false</is-published>
</file:file>`;

test("storage request names what the file is attached to", () => {
  const doc = parseXml(storageRequestXml(`${API}/projects/P-1`, "Smith Lab.zip"));

  expect(doc["file"]).toEqual({
    "attached-to": `${API}/projects/P-1`,
    "original-location": "Smith Lab.zip",
  });
});

test("storage request declares the file namespace", () => {
  expect(storageRequestXml("x", "y")).toContain(
    `xmlns:file="${FILE_NAMESPACE}"`,
  );
});

test("the published flag is changed and everything else kept", () => {
  const { xml, previous } = setPublishedFlag(FILE_XML);

  expect(previous).toBe("false");
  expect(parseFile(xml)).toEqual({
    uri: `${API}/files/40-1`,
    id: "40-1",
    attachedTo: `${API}/projects/P-1`,
    contentLocation: "sftp://lims.test/files/P-1/a.zip",
    originalLocation: "a.zip",
    isPublished: true,
  });
});

test("the published flag is added when missing", () => {
  const { xml, previous } = setPublishedFlag(
    `<file:file xmlns:file="${FILE_NAMESPACE}" uri="${API}/files/40-2" limsid="40-2"><original-location>b.zip</original-location></file:file>`,
  );

  expect(previous).toBeUndefined();

  const file = parseFile(xml);

  expect(file.isPublished).toBeTrue();
  expect(file.originalLocation).toBe("b.zip");
});

test("setting the flag twice is the same as once", () => {
  const once = setPublishedFlag(FILE_XML);
  const twice = setPublishedFlag(once.xml);

  expect(twice.previous).toBe("true");
  expect(twice.xml).toBe(once.xml);
});

test("a document with no root element cannot be updated", () => {
  expect(() => setPublishedFlag("")).toThrow(ParseError);
});
