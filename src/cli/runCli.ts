import { writeFile } from "node:fs/promises";
import { createServer } from "node:http";
import path from "node:path";
import process from "node:process";
import { pathToFileURL } from "node:url";

import { getServiceMeta } from "../api/registry.js";
import { generateClient, renderClient } from "../codegen/typescript.js";
import { toNodeListener } from "../http/node.js";
import { createRouter } from "../http/router.js";
import { loadConfig, loggerFromConfig } from "../internal/config.js";
import type { Logger } from "../internal/logger.js";
import { isRecord, toErrorMessage } from "../internal/utils.js";
import type { Convention, MethodIndex } from "../rpc/method.js";
import { scan } from "../rpc/scanner.js";
import { generateOpenAPI, renderOpenAPI, type OpenAPIFormat } from "../schema/openapi.js";

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  cwd: string;
  env: NodeJS.ProcessEnv;
}

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  cwd: process.cwd(),
  env: process.env
};

const USAGE = [
  "expose-rpc",
  "",
  "Usage:",
  "  expose-rpc openapi <module> [--export <name>] [--format json|yaml] [--title <title>] [--version <version>]",
  "                              [--server <url>]... [--convention positional|payload] [--out <file>]",
  "  expose-rpc client <module> [--export <name>] [--name <Api>] [--shim <scope.Name=type>]...",
  "                             [--convention positional|payload] [--out <file>]",
  "  expose-rpc serve <module> [--export <name>] [--port <port>] [--prefix <path>] [--openapi]",
  "                            [--convention positional|payload]",
  "",
  "Notes:",
  '  - <module> exports the service object or class ("default" unless --export is given).',
  '  - Use "--help" for this message.'
].join("\n");

type FlagShape = "value" | "list" | "switch";

const commandFlags = new Map<string, Readonly<Record<string, FlagShape>>>([
  [
    "openapi",
    { export: "value", format: "value", title: "value", version: "value", server: "list", convention: "value", out: "value" }
  ],
  ["client", { export: "value", name: "value", shim: "list", convention: "value", out: "value" }],
  ["serve", { export: "value", port: "value", prefix: "value", openapi: "switch", convention: "value" }]
]);

interface CommandLine {
  values: Map<string, string[]>;
  switches: Set<string>;
  positional: string[];
}

/**
 * Splits `tokens` against the flags one command accepts. Value flags take
 * `--k v` or `--k=v` and may appear once; list flags repeat; switches take
 * no value. Everything after `--` is ignored.
 */
function parseCommandLine(tokens: string[], shapes: Readonly<Record<string, FlagShape>>): CommandLine {
  const line: CommandLine = { values: new Map(), switches: new Set(), positional: [] };

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === "--") break;
    if (!token.startsWith("--")) {
      line.positional.push(token);
      continue;
    }

    const eq = token.indexOf("=");
    const key = eq === -1 ? token.slice(2) : token.slice(2, eq);
    const shape = Object.hasOwn(shapes, key) ? shapes[key] : undefined;
    if (!shape) throw new Error(`Unknown flag: --${key}`);

    if (shape === "switch") {
      if (eq !== -1) throw new Error(`Flag --${key} takes no value`);
      line.switches.add(key);
      continue;
    }

    let value: string;
    if (eq !== -1) {
      value = token.slice(eq + 1);
    } else {
      const next = tokens[i + 1];
      if (next === undefined || next.startsWith("--")) throw new Error(`Missing value for --${key}`);
      value = next;
      i++;
    }

    const seen = line.values.get(key);
    if (!seen) line.values.set(key, [value]);
    else if (shape === "list") seen.push(value);
    else throw new Error(`Flag --${key} may be given only once`);
  }

  return line;
}

function valueFlag(line: CommandLine, key: string): string | undefined {
  return line.values.get(key)?.[0];
}

function conventionFlag(line: CommandLine): Convention {
  const value = valueFlag(line, "convention") ?? "positional";
  if (value !== "positional" && value !== "payload") {
    throw new Error(`Invalid --convention: expected positional or payload, got "${value}"`);
  }
  return value;
}

function formatFlag(line: CommandLine): OpenAPIFormat {
  const value = valueFlag(line, "format") ?? "json";
  if (value !== "json" && value !== "yaml") throw new Error(`Invalid --format: expected json or yaml, got "${value}"`);
  return value;
}

function parseShims(entries: string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const entry of entries) {
    const eq = entry.indexOf("=");
    if (eq <= 0 || eq === entry.length - 1) throw new Error(`Invalid --shim "${entry}": expected scope.Name=type`);
    out[entry.slice(0, eq)] = entry.slice(eq + 1);
  }
  return out;
}

type LoadedService = { receiver: object; serviceName?: string };

async function loadService(modulePath: string, exportName: string, cwd: string): Promise<LoadedService> {
  const url = pathToFileURL(path.resolve(cwd, modulePath)).href;
  const mod: unknown = await import(url);
  const value = isRecord(mod) ? mod[exportName] : undefined;

  if (typeof value === "function") {
    // Classes are instantiated without arguments.
    const instance: unknown = Reflect.construct(value, []);
    if (!instance || typeof instance !== "object") throw new Error(`Export "${exportName}" did not construct an object`);
    return { receiver: instance, serviceName: getServiceMeta(value)?.name ?? value.name };
  }
  if (value && typeof value === "object") {
    const proto: unknown = Object.getPrototypeOf(value);
    const ctor = isRecord(proto) ? proto.constructor : undefined;
    const meta = typeof ctor === "function" ? getServiceMeta(ctor) : undefined;
    return { receiver: value, serviceName: meta?.name };
  }
  throw new Error(`Module "${modulePath}" has no object or class export "${exportName}"`);
}

async function emit(io: CliIO, out: string | undefined, text: string, logger: Logger): Promise<void> {
  if (!out) {
    io.stdout(text);
    return;
  }
  const target = path.resolve(io.cwd, out);
  await writeFile(target, text, "utf-8");
  logger.info("written", { file: target });
}

async function indexFor(line: CommandLine, modulePath: string, io: CliIO, logger: Logger) {
  const loaded = await loadService(modulePath, valueFlag(line, "export") ?? "default", io.cwd);
  const index: MethodIndex = scan(loaded.receiver, { convention: conventionFlag(line), logger });
  if (index.size === 0) logger.warn("no exposed methods found", { module: modulePath });
  return { index, serviceName: loaded.serviceName };
}

function listen(port: number, listener: ReturnType<typeof toNodeListener>): Promise<void> {
  return new Promise((resolve, reject) => {
    const server = createServer(listener);
    server.once("error", reject);
    server.listen(port, () => resolve());
  });
}

/**
 * Runs one CLI invocation. `argv` is `process.argv`-shaped.
 * Resolves to the exit code; `serve` resolves once the server is listening.
 */
export async function runCli(argv: string[], io: CliIO = defaultIO): Promise<number> {
  const tokens = argv.slice(2);
  if (tokens.length === 0 || tokens.includes("--help") || tokens.includes("-h")) {
    io.stdout(USAGE + "\n");
    return 0;
  }

  const [command, ...rest] = tokens;
  const shapes = commandFlags.get(command);
  if (!shapes) {
    io.stderr(`Unknown command: ${command}\n\n${USAGE}\n`);
    return 1;
  }

  try {
    const config = loadConfig(io.env);
    const logger = loggerFromConfig(config, (line) => io.stderr(line + "\n"));

    const line = parseCommandLine(rest, shapes);
    const modulePath = line.positional[0];
    if (!modulePath) throw new Error("Missing required argument: <module>");

    const { index, serviceName } = await indexFor(line, modulePath, io, logger);

    if (command === "openapi") {
      const doc = generateOpenAPI(index, {
        title: valueFlag(line, "title") ?? serviceName,
        version: valueFlag(line, "version"),
        servers: line.values.get("server") ?? []
      });
      await emit(io, valueFlag(line, "out"), renderOpenAPI(doc, formatFlag(line)), logger);
      return 0;
    }

    if (command === "client") {
      const doc = generateClient(index, {
        name: valueFlag(line, "name") ?? serviceName,
        shims: parseShims(line.values.get("shim") ?? [])
      });
      await emit(io, valueFlag(line, "out"), renderClient(doc), logger);
      return 0;
    }

    const port = Number(valueFlag(line, "port") ?? "8080");
    if (!Number.isInteger(port) || port < 0 || port > 65535) throw new Error(`Invalid --port: ${String(port)}`);
    const router = createRouter(index, { prefix: valueFlag(line, "prefix"), openapi: line.switches.has("openapi"), logger });
    await listen(port, toNodeListener(router, { maxBodyBytes: config.maxBodyBytes, logger }));
    logger.info("listening", { port, methods: index.size });
    return 0;
  } catch (err) {
    io.stderr(toErrorMessage(err) + "\n");
    return 1;
  }
}
