import type { DependencyGraph } from "./types.js";
import { getNode } from "./types.js";
import { renderFullTree, renderTree } from "./treePrinter.js";
import { renderDependsOn } from "./dependsOn.js";
import { collectClosure, renderClosure } from "./closure.js";
import { findPaths, renderPaths } from "./paths.js";

export const COMMAND_NAMES = ["tree", "entry", "entry-simple", "depends-on", "path"] as const;

export type CommandName = (typeof COMMAND_NAMES)[number];

export function isCommandName(value: string): value is CommandName {
  const names: readonly string[] = COMMAND_NAMES;
  return names.includes(value);
}

export type CommandRequest =
  | { command: "tree" }
  | { command: "entry" | "entry-simple"; source: string }
  | { command: "depends-on"; target: string }
  | { command: "path"; source: string; target: string };

export type RequestResolution =
  | { ok: true; request: CommandRequest }
  | { ok: false; message: string };

export type CommandResult =
  | { status: "ok"; lines: string[] }
  | { status: "not-found"; message: string };

export interface QueryOptions {
  source?: string;
  target?: string;
}

/**
 * Check that a command has the options it needs.
 * Empty strings count as missing.
 */
export function resolveRequest(command: CommandName, opts: QueryOptions): RequestResolution {
  const { source, target } = opts;
  switch (command) {
    case "tree":
      return { ok: true, request: { command } };
    case "entry":
    case "entry-simple":
      if (!source) {
        return { ok: false, message: `Error: --source is required for '${command}'.` };
      }
      return { ok: true, request: { command, source } };
    case "depends-on":
      if (!target) {
        return { ok: false, message: `Error: --target is required for '${command}'.` };
      }
      return { ok: true, request: { command, target } };
    case "path":
      if (!source || !target) {
        return { ok: false, message: "Error: --source and --target are required for 'path'." };
      }
      return { ok: true, request: { command, source, target } };
  }
}

function notFound(message: string): CommandResult {
  return { status: "not-found", message };
}

/** Run a query against a built graph. Never mutates the graph. */
export function runCommand(graph: DependencyGraph, request: CommandRequest): CommandResult {
  switch (request.command) {
    case "tree":
      return { status: "ok", lines: renderFullTree(graph) };

    case "entry": {
      const root = getNode(graph, request.source);
      if (!root) return notFound(`Project '${request.source}' not found.`);
      return { status: "ok", lines: renderTree(graph, root) };
    }

    case "entry-simple": {
      const root = getNode(graph, request.source);
      if (!root) return notFound(`Project '${request.source}' not found.`);
      return { status: "ok", lines: renderClosure(collectClosure(graph, root)) };
    }

    case "depends-on": {
      const target = getNode(graph, request.target);
      if (!target) return notFound(`Target '${request.target}' not found.`);
      return { status: "ok", lines: renderDependsOn(graph, target) };
    }

    case "path": {
      const source = getNode(graph, request.source);
      if (!source) return notFound(`Source '${request.source}' not found.`);
      const target = getNode(graph, request.target);
      if (!target) return notFound(`Target '${request.target}' not found.`);
      const paths = findPaths(graph, source, target);
      return { status: "ok", lines: renderPaths(paths, request.source, request.target) };
    }
  }
}
