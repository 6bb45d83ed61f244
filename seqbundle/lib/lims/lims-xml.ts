import { XMLBuilder, XMLParser } from "fast-xml-parser";
import { ParseError } from "../seqbundle-errors";

export const FILE_NAMESPACE = "http://genologics.com/ri/file";

/**
 * An element (or text node) in the ordered representation of a document - used
 * when we must write back a document we were given with nothing but our
 * own change made to it.
 */
type OrderedNode = Record<string, unknown>;

const orderedOptions = {
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseTagValue: false,
  parseAttributeValue: false,
};

const orderedParser = new XMLParser(orderedOptions);

const orderedBuilder = new XMLBuilder(orderedOptions);

const payloadBuilder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
});

function isOrderedNode(value: unknown): value is OrderedNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isOrderedNodes(value: unknown): value is OrderedNode[] {
  return Array.isArray(value) && value.every(isOrderedNode);
}

/**
 * The tag of an element node (and not a text, comment or processing instruction node).
 */
function elementName(node: OrderedNode): string | undefined {
  return Object.keys(node).find(
    (k) => k !== ":@" && !k.startsWith("#") && !k.startsWith("?"),
  );
}

function localName(tag: string): string {
  const colon = tag.indexOf(":");
  return colon >= 0 ? tag.slice(colon + 1) : tag;
}

/**
 * The body we send when asking for a storage location for a new file.
 */
export function storageRequestXml(
  attachedToUri: string,
  originalLocation: string,
): string {
  return payloadBuilder.build({
    "file:file": {
      "@_xmlns:file": FILE_NAMESPACE,
      "attached-to": attachedToUri,
      "original-location": originalLocation,
    },
  });
}

/**
 * Given the XML of a file record, return the same document with its
 * "is-published" element set to true (appending the element if the record
 * does not have one). Every other element and attribute is left as it was.
 *
 * @param fileXml the file record as fetched from the LIMS
 * @returns the updated document and the previous published value (if any)
 */
export function setPublishedFlag(fileXml: string): {
  xml: string;
  previous: string | undefined;
} {
  const doc: unknown = orderedParser.parse(fileXml);

  if (!isOrderedNodes(doc))
    throw new ParseError("File record was not an XML document");

  const root = doc.find((n) => elementName(n) !== undefined);
  const rootName = root ? elementName(root) : undefined;

  if (!root || !rootName) throw new ParseError("File record has no root element");

  const children = root[rootName];

  if (!isOrderedNodes(children))
    throw new ParseError(`File record root ${rootName} has unexpected content`);

  const published = children.find((n) => {
    const name = elementName(n);
    return name !== undefined && localName(name) === "is-published";
  });

  let previous: string | undefined = undefined;

  if (published) {
    const name = elementName(published);
    if (name) {
      const current = published[name];
      if (isOrderedNodes(current)) {
        const text = current.find((n) => "#text" in n);
        if (text) previous = String(text["#text"]);
      }
      published[name] = [{ "#text": "true" }];
    }
  } else {
    children.push({ "is-published": [{ "#text": "true" }] });
  }

  return { xml: orderedBuilder.build(doc), previous };
}
