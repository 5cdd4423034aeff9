import { Command, CommanderError } from "commander";
import * as fs from "fs";
import * as path from "path";
import { buildGraph } from "./builder.js";
import { loadUnitRecords } from "./scanner.js";
import { isCommandName, resolveRequest, runCommand } from "./commands.js";
import { ConfigurationError } from "./errors.js";

export interface OutputSink {
  write(text: string): void;
}

export interface CliIO {
  stdout: OutputSink;
  stderr: OutputSink;
}

interface CliOptions {
  path?: string;
  source?: string;
  target?: string;
  verbose: boolean;
}

const COMMANDS_HELP = `
Commands:
  tree             Print full dependency tree for each project.
  entry            Print dependency tree for a single project.
  entry-simple     Print flat list of dependencies (projects then NuGets) for a single project.
  depends-on       Print tree of projects depending on a target assembly/NuGet.
  path             Print paths from source assembly to target assembly.`;

const OPTION_NAMES = new Set(["--path", "--source", "--target", "--verbose", "--help"]);
const VALUE_OPTIONS = new Set(["--path", "--source", "--target"]);

/**
 * Lower-case known option names so "--Path" and "--PATH" both mean "--path".
 * Values are left alone, both after "=" and as the argument following an
 * option that takes one, so "--source --Web" keeps "--Web". Unknown options
 * keep their spelling for the warning.
 */
export function normalizeArgv(argv: readonly string[]): string[] {
  const normalized: string[] = [];
  let expectsValue = false;

  for (const arg of argv) {
    if (expectsValue || !arg.startsWith("--")) {
      normalized.push(arg);
      expectsValue = false;
      continue;
    }

    const eq = arg.indexOf("=");
    const name = (eq === -1 ? arg : arg.slice(0, eq)).toLowerCase();
    if (!OPTION_NAMES.has(name)) {
      normalized.push(arg);
      continue;
    }
    normalized.push(eq === -1 ? name : name + arg.slice(eq));
    expectsValue = eq === -1 && VALUE_OPTIONS.has(name);
  }

  return normalized;
}

function resolveRootDir(folder: string | undefined): string {
  if (!folder || !fs.existsSync(folder) || !fs.statSync(folder).isDirectory()) {
    throw new ConfigurationError(
      "Invalid or missing path. Use --path <folder> to specify the solution directory.",
    );
  }
  return path.resolve(folder);
}

function execute(
  program: Command,
  commandArg: string | undefined,
  opts: CliOptions,
  io: CliIO,
): void {
  if (commandArg === undefined) {
    program.outputHelp();
    return;
  }

  // Anything commander did not recognise after the command is reported and skipped.
  for (const arg of program.args.slice(1)) {
    io.stderr.write(`Unknown option ${arg}\n`);
  }

  const command = commandArg.toLowerCase();
  if (!isCommandName(command)) {
    io.stderr.write(`Unknown command: ${command}\n`);
    program.outputHelp();
    return;
  }

  const rootDir = resolveRootDir(opts.path);

  const resolution = resolveRequest(command, opts);
  if (!resolution.ok) {
    io.stderr.write(resolution.message + "\n");
    return;
  }

  if (opts.verbose) {
    io.stderr.write(`Scanning ${rootDir}\n`);
  }
  const startTime = Date.now();

  const records = loadUnitRecords(rootDir);
  const graph = buildGraph(records);

  if (opts.verbose) {
    io.stderr.write(
      `Graph built from ${records.length} project files: ${graph.nodes.size} nodes, ${graph.edges.length} edges (${Date.now() - startTime}ms)\n`,
    );
  }

  const result = runCommand(graph, resolution.request);
  if (result.status === "not-found") {
    io.stderr.write(result.message + "\n");
    return;
  }

  for (const line of result.lines) {
    io.stdout.write(line + "\n");
  }
}

export function createProgram(io: CliIO): Command {
  const program = new Command();

  program
    .name("csproj-depgraph")
    .description("Answer dependency questions about the .csproj projects under a folder")
    .argument("[command]", "tree, entry, entry-simple, depends-on or path")
    .option("--path <folder>", "Folder to scan for .csproj files")
    .option("--source <name>", "Source project (entry, entry-simple, path)")
    .option("--target <name>", "Target project or package (depends-on, path)")
    .option("--verbose", "Show progress on stderr", false)
    .addHelpText("after", COMMANDS_HELP)
    .configureOutput({
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(str),
    })
    .allowUnknownOption()
    .allowExcessArguments()
    .exitOverride()
    .action((command: string | undefined, opts: CliOptions) => {
      execute(program, command, opts, io);
    });

  return program;
}

/**
 * Parse argv (without the node and script entries) and run one command.
 * Every outcome is reported on io; nothing here sets an exit code.
 */
export function run(argv: readonly string[], io: CliIO): void {
  const program = createProgram(io);
  try {
    program.parse(normalizeArgv(argv), { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) {
      // commander has already written its message (or the help text)
      return;
    }
    io.stderr.write(`Unhandled error: ${err instanceof Error ? err.message : String(err)}\n`);
  }
}
