import { MetadataNamespaceAlreadyRegisteredError } from "../errors/motion-photo.errors";

export const GCAMERA_PREFIX = "GCamera";
export const GCAMERA_NAMESPACE = "http://ns.google.com/photos/1.0/camera/";

// Prefixes that structure the packet rather than carry properties.
const STRUCTURAL_PREFIXES = new Set(["x", "rdf", "xmlns", "xml"]);

const DESCRIPTION_TAG = "<rdf:Description";

export type XmpValue = string | number;

export function createXmpPacket(): string {
  return [
    '<?xpacket begin="\uFEFF" id="W5M0MpCehiHzreSzNTczkc9d"?>',
    '<x:xmpmeta xmlns:x="adobe:ns:meta/">',
    '  <rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#">',
    '    <rdf:Description rdf:about=""/>',
    "  </rdf:RDF>",
    "</x:xmpmeta>",
    '<?xpacket end="w"?>',
  ].join("\n");
}

interface OpenTag {
  start: number;
  // Index just past the closing ">".
  end: number;
  selfClosing: boolean;
}

function readOpenTag(xml: string, start: number): OpenTag {
  let quote: string | null = null;
  for (let i = start + 1; i < xml.length; i++) {
    const char = xml[i];
    if (quote) {
      if (char === quote) quote = null;
    } else if (char === '"' || char === "'") {
      quote = char;
    } else if (char === ">") {
      return { start, end: i + 1, selfClosing: xml[i - 1] === "/" };
    }
  }
  throw new Error(`Unterminated tag at offset ${start}`);
}

function descriptionTags(xml: string): OpenTag[] {
  const tags: OpenTag[] = [];
  let index = xml.indexOf(DESCRIPTION_TAG);
  while (index !== -1) {
    const tag = readOpenTag(xml, index);
    tags.push(tag);
    index = xml.indexOf(DESCRIPTION_TAG, tag.end);
  }
  return tags;
}

function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/"/g, "&quot;")
    .replace(/</g, "&lt;");
}

function unescapeXml(value: string): string {
  return value
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&amp;/g, "&");
}

/**
 * Guarantees at least one rdf:Description to hang properties on.
 */
function ensureDescription(xml: string): string {
  if (xml.includes(DESCRIPTION_TAG)) {
    return xml;
  }
  const rdfStart = xml.indexOf("<rdf:RDF");
  if (rdfStart === -1) {
    throw new Error("XMP packet has no rdf:RDF element");
  }
  const rdf = readOpenTag(xml, rdfStart);
  return `${xml.slice(0, rdf.end)}\n    <rdf:Description rdf:about=""/>${xml.slice(rdf.end)}`;
}

/**
 * Lists the property names (prefix:Name) present in a packet, in document
 * order, both as attributes and as elements.
 */
export function listXmpKeys(xml: string): string[] {
  const keys = new Set<string>();
  const attributePattern = /\s([A-Za-z_][\w.-]*):([A-Za-z_][\w.-]*)\s*=\s*["']/g;
  const elementPattern = /<([A-Za-z_][\w.-]*):([A-Za-z_][\w.-]*)[\s/>]/g;

  for (const pattern of [attributePattern, elementPattern]) {
    for (const match of xml.matchAll(pattern)) {
      const [, prefix, name] = match;
      if (!STRUCTURAL_PREFIXES.has(prefix)) {
        keys.add(`${prefix}:${name}`);
      }
    }
  }
  return [...keys];
}

export function isNamespaceRegistered(xml: string, prefix: string): boolean {
  return new RegExp(`\\sxmlns:${prefix}\\s*=`).test(xml);
}

/**
 * Declares a namespace prefix on the first rdf:Description.
 * @throws MetadataNamespaceAlreadyRegisteredError when the prefix is already declared.
 */
export function registerNamespace(xml: string, prefix: string, uri: string): string {
  if (isNamespaceRegistered(xml, prefix)) {
    throw new MetadataNamespaceAlreadyRegisteredError(prefix);
  }
  const withDescription = ensureDescription(xml);
  const [target] = descriptionTags(withDescription);
  return insertAttributes(withDescription, target, [[`xmlns:${prefix}`, uri]]);
}

function insertAttributes(xml: string, tag: OpenTag, attributes: [string, string][]): string {
  const insertAt = tag.selfClosing ? tag.end - 2 : tag.end - 1;
  const text = attributes.map(([name, value]) => ` ${name}="${escapeAttribute(value)}"`).join("");
  return `${xml.slice(0, insertAt).trimEnd()}${text}${xml.slice(insertAt)}`;
}

function removeProperty(xml: string, prefix: string, name: string): string {
  const qualified = `${prefix}:${name}`;
  return xml
    .replace(new RegExp(`\\s+${qualified}\\s*=\\s*("[^"]*"|'[^']*')`, "g"), "")
    .replace(new RegExp(`\\s*<${qualified}(\\s[^>]*)?/>`, "g"), "")
    .replace(new RegExp(`\\s*<${qualified}(\\s[^>]*)?>[\\s\\S]*?</${qualified}>`, "g"), "");
}

/**
 * Sets simple properties as attributes of the rdf:Description that declares
 * the prefix (or the first one). Earlier values of the same properties are
 * removed, whether written as attributes or elements.
 */
export function setXmpProperties(
  xml: string,
  prefix: string,
  properties: Record<string, XmpValue>,
): string {
  let result = ensureDescription(xml);
  for (const name of Object.keys(properties)) {
    result = removeProperty(result, prefix, name);
  }

  const tags = descriptionTags(result);
  const target =
    tags.find((tag) => isNamespaceRegistered(result.slice(tag.start, tag.end), prefix)) ?? tags[0];

  return insertAttributes(
    result,
    target,
    Object.entries(properties).map(([name, value]) => [`${prefix}:${name}`, String(value)]),
  );
}

export function readXmpProperties(xml: string, prefix: string): Record<string, string> {
  const properties: Record<string, string> = {};
  const attributePattern = new RegExp(`\\s${prefix}:([\\w.-]+)\\s*=\\s*(?:"([^"]*)"|'([^']*)')`, "g");
  const elementPattern = new RegExp(`<${prefix}:([\\w.-]+)(?:\\s[^>]*)?>([^<]*)</${prefix}:\\1>`, "g");

  for (const match of xml.matchAll(attributePattern)) {
    properties[match[1]] = unescapeXml(match[2] ?? match[3] ?? "");
  }
  for (const match of xml.matchAll(elementPattern)) {
    properties[match[1]] = unescapeXml(match[2].trim());
  }
  return properties;
}
