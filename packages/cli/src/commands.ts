import fs from "node:fs/promises";
import {
  type ConversionReport,
  type Fetcher,
  type InputDescriptor,
  type OutputSink,
  FetchService,
  OutputCollector,
  inputToCalldataDescriptors,
  inputToEip712Descriptors,
  parseInputDescriptorFromString,
  reduceSignature,
  resolveDescriptor,
  signatureToSelector,
  stringifyResolvedDescriptor,
} from "@clearsign/core";
import { getFlag, getIntegerFlag, getPositionals, hasFlag } from "./args";
import { code, formatEntryLine, statusBadge, table } from "./formatter";

/** Where the CLI reads and writes; replaced in tests. */
export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
  readFile(path: string): Promise<string>;
  writeFile(path: string, content: string): Promise<void>;
}

export const nodeIo: CliIo = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
  readFile: (path) => fs.readFile(path, "utf-8"),
  writeFile: (path, content) => fs.writeFile(path, content, "utf-8"),
};

export interface CliOptions {
  io?: CliIo;
  /** Fetcher for descriptors referencing ABIs or schemas by URL. */
  createFetcher?: () => Fetcher;
}

const HELP = `ClearSign CLI

Usage:
  clearsign resolve <descriptor.json> [--out <file>] [--compact] [--offline]
  clearsign calldata <descriptor.json> [--chain-id <id>] [--out <file>] [--compact] [--offline]
  clearsign eip712 <descriptor.json> [--chain-id <id>] [--out <file>] [--compact] [--offline]
  clearsign selector <signature>

Environment:
  CLEARSIGN_CACHE_DIR        HTTP cache directory (default: $XDG_CACHE_HOME/clearsign)
  CLEARSIGN_CACHE_TTL        cache lifetime in seconds
  CLEARSIGN_HTTP_TIMEOUT_MS  request timeout
  SOURCIFY_API_HOST, SOURCIFY_API_KEY

Examples:
  clearsign resolve calldata-usdc.json --out resolved.json
  clearsign calldata calldata-usdc.json --chain-id 1
  clearsign selector "transfer(address to,uint256 amount)"
`;

interface Command {
  args: string[];
  io: CliIo;
  fetcher?: Fetcher;
}

async function readDescriptor({ args, io }: Command): Promise<InputDescriptor> {
  const [file] = getPositionals(args);
  if (!file) throw new Error("Missing descriptor file.");
  const parsed = parseInputDescriptorFromString(await io.readFile(file));
  if (!parsed.success) throw new Error(parsed.error);
  return parsed.descriptor;
}

async function emit({ args, io }: Command, json: string) {
  const outPath = getFlag(args, "--out");
  if (outPath) {
    await io.writeFile(outPath, `${json}\n`);
    io.stderr(`Saved output to ${outPath}`);
    return;
  }
  io.stdout(json);
}

function chainIdOption(args: string[]): number | undefined {
  const chainId = getIntegerFlag(args, "--chain-id");
  if (chainId === null) throw new Error(`Invalid --chain-id value "${getFlag(args, "--chain-id")}".`);
  return chainId;
}

function printReport<T>(io: CliIo, report: ConversionReport<T>) {
  for (const entry of report.entries) io.stderr(formatEntryLine(entry));
  io.stderr(
    table([
      ["Status", statusBadge(report.status)],
      ["Artifacts", code(String(report.artifacts.length))],
    ])
  );
}

async function runResolve(command: Command): Promise<number> {
  const input = await readDescriptor(command);
  const out = new OutputCollector();
  const resolved = await resolveDescriptor(input, { fetcher: command.fetcher, out });
  for (const entry of out.entries) command.io.stderr(formatEntryLine(entry));
  if (resolved === null) return 1;
  await emit(command, stringifyResolvedDescriptor(resolved, hasFlag(command.args, "--compact")));
  return 0;
}

async function runConvert(
  command: Command,
  convert: (input: InputDescriptor, options: { chainId?: number; fetcher?: Fetcher }) => Promise<ConversionReport<unknown>>
): Promise<number> {
  const chainId = chainIdOption(command.args);
  const input = await readDescriptor(command);
  const report = await convert(input, { chainId, fetcher: command.fetcher });
  printReport(command.io, report);
  if (report.status === "failure") return 1;
  await emit(command, JSON.stringify(report.artifacts, null, hasFlag(command.args, "--compact") ? undefined : 2));
  return 0;
}

function runSelector({ args, io }: Command): number {
  const [signature] = getPositionals(args);
  if (!signature) throw new Error("Missing function signature.");
  const reduced = reduceSignature(signature);
  io.stdout(`${signatureToSelector(reduced)} ${reduced}`);
  return 0;
}

/** Run one CLI invocation and return its exit code. */
export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const io = options.io ?? nodeIo;
  const [name, ...args] = argv;

  if (!name || name === "help" || name === "--help" || name === "-h") {
    io.stdout(HELP);
    return 0;
  }

  const cacheWarnings: OutputSink = { add: (entry) => io.stderr(formatEntryLine(entry)) };
  const createFetcher = options.createFetcher ?? (() => FetchService.fromEnv(process.env, cacheWarnings));

  try {
    const command: Command = { args, io, fetcher: hasFlag(args, "--offline") ? undefined : createFetcher() };
    switch (name) {
      case "resolve":
        return await runResolve(command);
      case "calldata":
        return await runConvert(command, inputToCalldataDescriptors);
      case "eip712":
        return await runConvert(command, inputToEip712Descriptors);
      case "selector":
        return runSelector(command);
    }
  } catch (err) {
    io.stderr(err instanceof Error ? err.message : String(err));
    return 1;
  }

  io.stderr(`Unknown command: ${name}`);
  io.stdout(HELP);
  return 1;
}
