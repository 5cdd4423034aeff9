import { XMLParser, XMLValidator } from "fast-xml-parser";
import * as fs from "fs";
import { ProjectFileError } from "./errors.js";

/** The parts of an MSBuild project file the dependency graph needs */
export interface ParsedProjectFile {
  filePath: string;
  /** Text of the first AssemblyName element, when present and not blank */
  assemblyName?: string;
  /** Include attribute of each ProjectReference, as written in the file */
  projectReferences: string[];
  /** Include attribute of each PackageReference */
  packageReferences: string[];
}

// preserveOrder output: each element is { [tag]: children[], ":@"?: attributes },
// each text node is { "#text": value }.
const ATTRIBUTES_KEY = ":@";
const TEXT_KEY = "#text";

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: "",
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

type ElementVisitor = (tag: string, attributes: Record<string, unknown>, children: unknown[]) => void;

/** Visit every element under nodes, in document order. */
function visitElements(nodes: unknown[], visit: ElementVisitor): void {
  for (const item of nodes) {
    if (!isRecord(item)) continue;
    const attrs = item[ATTRIBUTES_KEY];
    const attributes = isRecord(attrs) ? attrs : {};

    for (const [tag, value] of Object.entries(item)) {
      if (tag === ATTRIBUTES_KEY || tag === TEXT_KEY) continue;
      const children: unknown[] = Array.isArray(value) ? value : [];
      visit(tag, attributes, children);
      visitElements(children, visit);
    }
  }
}

function textOf(nodes: unknown[]): string {
  let text = "";
  for (const item of nodes) {
    if (!isRecord(item)) continue;
    for (const [key, value] of Object.entries(item)) {
      if (key === TEXT_KEY) text += String(value);
      else if (key !== ATTRIBUTES_KEY && Array.isArray(value)) text += textOf(value);
    }
  }
  return text;
}

function includeOf(attributes: Record<string, unknown>): string | undefined {
  const include = attributes["Include"];
  if (typeof include !== "string") return undefined;
  const trimmed = include.trim();
  return trimmed === "" ? undefined : trimmed;
}

/**
 * Parse project file text directly (no file I/O).
 * Throws ProjectFileError when the text is not well-formed XML.
 */
export function parseProjectSource(filePath: string, sourceText: string): ParsedProjectFile {
  const text = sourceText.charCodeAt(0) === 0xfeff ? sourceText.slice(1) : sourceText;

  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    throw new ProjectFileError(filePath, `${validation.err.msg} (line ${validation.err.line})`);
  }

  const document: unknown = parser.parse(text);
  const result: ParsedProjectFile = {
    filePath,
    projectReferences: [],
    packageReferences: [],
  };

  let sawAssemblyName = false;

  visitElements(Array.isArray(document) ? document : [], (tag, attributes, children) => {
    switch (tag) {
      case "AssemblyName": {
        // Only the first one counts, even when it is blank.
        if (sawAssemblyName) return;
        sawAssemblyName = true;
        const name = textOf(children).trim();
        if (name) result.assemblyName = name;
        return;
      }
      case "ProjectReference": {
        const include = includeOf(attributes);
        if (include) result.projectReferences.push(include);
        return;
      }
      case "PackageReference": {
        const include = includeOf(attributes);
        if (include) result.packageReferences.push(include);
        return;
      }
    }
  });

  return result;
}

export function parseProjectFile(filePath: string): ParsedProjectFile {
  return parseProjectSource(filePath, fs.readFileSync(filePath, "utf-8"));
}
