import * as fs from "fs";
import * as path from "path";
import type { UnitRecord } from "./builder.js";
import { parseProjectFile } from "./projectFile.js";
import type { ParsedProjectFile } from "./projectFile.js";

export const PROJECT_FILE_EXTENSION = ".csproj";

/**
 * Recursively collect project files under rootDir, sorted by path.
 * Symlinked directories are not followed.
 */
export function findProjectFiles(rootDir: string): string[] {
  const found: string[] = [];
  const pending: string[] = [path.resolve(rootDir)];

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) break;

    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        pending.push(fullPath);
      } else if (entry.isFile() && entry.name.toLowerCase().endsWith(PROJECT_FILE_EXTENSION)) {
        found.push(fullPath);
      }
    }
  }

  return found.sort();
}

/**
 * File name without directory or last extension.
 * Accepts both "/" and "\" separators, since project references are often
 * written with Windows paths.
 */
export function projectStem(filePath: string): string {
  return path.posix.parse(filePath.replace(/\\/g, "/")).name;
}

function unitName(parsed: ParsedProjectFile): string {
  return parsed.assemblyName ?? projectStem(parsed.filePath);
}

/**
 * Scan rootDir and turn each project file into a unit record.
 *
 * A project reference that points at another scanned file takes that file's
 * unit name; anything else falls back to the stem of the referenced path.
 */
export function loadUnitRecords(rootDir: string): UnitRecord[] {
  const parsedFiles = findProjectFiles(rootDir).map((file) => parseProjectFile(file));

  const namesByPath = new Map<string, string>();
  for (const parsed of parsedFiles) {
    namesByPath.set(parsed.filePath, unitName(parsed));
  }

  return parsedFiles.map((parsed) => {
    const baseDir = path.dirname(parsed.filePath);
    return {
      name: unitName(parsed),
      projectReferences: parsed.projectReferences.map((include) => {
        const resolved = path.resolve(baseDir, include.replace(/\\/g, "/"));
        return namesByPath.get(resolved) ?? projectStem(include);
      }),
      packageReferences: parsed.packageReferences,
    };
  });
}
