import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { parse as parseYaml } from "yaml";
import { afterEach, describe, expect, it } from "vitest";

import { runCli, type CliIO } from "../src/cli/runCli.js";

const fixtures = fileURLToPath(new URL("./fixtures/", import.meta.url));

function makeIO(env: NodeJS.ProcessEnv = {}) {
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIO = {
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
    cwd: fixtures,
    env
  };
  return { io, stdout: () => out.join(""), stderr: () => err.join("") };
}

function run(args: string[], env?: NodeJS.ProcessEnv) {
  const io = makeIO(env);
  return runCli(["node", "expose-rpc", ...args], io.io).then((code) => ({ code, ...io }));
}

describe("runCli", () => {
  let tmp: string | undefined;

  afterEach(async () => {
    if (tmp) await rm(tmp, { recursive: true, force: true });
    tmp = undefined;
  });

  it("prints usage", async () => {
    const res = await run(["--help"]);
    expect(res.code).toBe(0);
    expect(res.stdout().startsWith("expose-rpc\n\nUsage:\n")).toBe(true);
    expect((await run([])).code).toBe(0);
  });

  it("rejects unknown commands", async () => {
    const res = await run(["deploy"]);
    expect(res.code).toBe(1);
    expect(res.stderr().startsWith("Unknown command: deploy\n")).toBe(true);
  });

  it("generates an OpenAPI document titled after the service", async () => {
    const res = await run(["openapi", "calc-service.ts"]);
    expect(res.code).toBe(0);
    const doc: { paths: Record<string, unknown> } = JSON.parse(res.stdout());
    expect(doc).toMatchObject({ openapi: "3.1.0", info: { title: "Calc", version: "1.0.0" } });
    expect(Object.keys(doc.paths)).toEqual(["/add", "/fail", "/origin", "/sumall", "/whoami"]);
  });

  it("renders YAML with flags applied", async () => {
    const res = await run([
      "openapi",
      "calc-service.ts",
      "--format",
      "yaml",
      "--title=Sums",
      "--version",
      "0.2.0",
      "--server",
      "http://a.test",
      "--server",
      "http://b.test"
    ]);
    expect(res.code).toBe(0);
    expect(res.stdout().split("\n")[0]).toBe("openapi: 3.1.0");
    expect(parseYaml(res.stdout())).toMatchObject({
      info: { title: "Sums", version: "0.2.0" },
      servers: [{ url: "http://a.test" }, { url: "http://b.test" }]
    });
  });

  it("generates a client named after the service", async () => {
    const res = await run(["client", "calc-service.ts"]);
    expect(res.code).toBe(0);
    expect(res.stdout().split("\n")).toContain("export default class Calc {");
  });

  it("instantiates class exports", async () => {
    const res = await run(["client", "calc-service.ts", "--export", "Calc", "--name", "Calculator"]);
    expect(res.code).toBe(0);
    expect(res.stdout().split("\n")).toContain("export default class Calculator {");
  });

  it("writes to --out", async () => {
    tmp = await mkdtemp(path.join(os.tmpdir(), "expose-rpc-"));
    const target = path.join(tmp, "openapi.json");
    const res = await run(["openapi", "calc-service.ts", "--out", target]);
    expect(res.code).toBe(0);
    expect(res.stdout()).toBe("");
    expect(JSON.parse(await readFile(target, "utf-8"))).toMatchObject({ info: { title: "Calc" } });
  });

  it("reports skipped methods at debug level", async () => {
    const res = await run(["openapi", "calc-service.ts"], { EXPOSE_RPC_LOG_LEVEL: "debug" });
    expect(res.code).toBe(0);
    expect(res.stderr().split("\n")).toContain('[expose-rpc] debug method skipped method="_hidden" reason="not public"');
  });

  it("rejects bad input", async () => {
    await expect(run(["openapi", "calc-service.ts", "--bogus"])).resolves.toMatchObject({ code: 1 });
    expect((await run(["openapi", "calc-service.ts", "--bogus"])).stderr()).toBe("Unknown flag: --bogus\n");
    expect((await run(["openapi"])).stderr()).toBe("Missing required argument: <module>\n");
    expect((await run(["openapi", "calc-service.ts", "--title"])).stderr()).toBe("Missing value for --title\n");
    expect((await run(["openapi", "calc-service.ts", "--convention", "rest"])).stderr()).toBe(
      'Invalid --convention: expected positional or payload, got "rest"\n'
    );
    expect((await run(["openapi", "calc-service.ts", "--export", "nothing"])).stderr()).toBe(
      'Module "calc-service.ts" has no object or class export "nothing"\n'
    );
    expect((await run(["openapi", "does-not-exist.ts"])).code).toBe(1);
  });

  it("checks flags against the command before loading the module", async () => {
    expect((await run(["client", "calc-service.ts", "--server", "http://a.test"])).stderr()).toBe("Unknown flag: --server\n");
    expect((await run(["openapi", "calc-service.ts", "--title", "A", "--title=B"])).stderr()).toBe(
      "Flag --title may be given only once\n"
    );
    expect((await run(["openapi", "calc-service.ts", "--title", "--out", "x.json"])).stderr()).toBe(
      "Missing value for --title\n"
    );
    expect((await run(["serve", "calc-service.ts", "--openapi=true"])).stderr()).toBe("Flag --openapi takes no value\n");
    expect((await run(["openapi", "does-not-exist.ts", "--bogus"])).stderr()).toBe("Unknown flag: --bogus\n");
  });

  it("rejects a bad environment", async () => {
    const res = await run(["openapi", "calc-service.ts"], { EXPOSE_RPC_LOG_LEVEL: "loud" });
    expect(res.code).toBe(1);
    expect(res.stderr().startsWith("Invalid EXPOSE_RPC_LOG_LEVEL: ")).toBe(true);
  });
});
