import { describe, expect, it } from "vitest";

import { Rpc } from "../src/api/api.js";
import { createRouter, createSessionRouter } from "../src/http/router.js";
import { createLogger } from "../src/internal/logger.js";
import { scan } from "../src/rpc/scanner.js";
import { t } from "../src/types/descriptor.js";
import { Calc } from "./fixtures/calc-service.js";

const TEXT = { "Content-Type": "text/plain; charset=utf-8" };
const JSON_TYPE = { "Content-Type": "application/json" };

describe("createRouter", () => {
  const router = createRouter(scan(new Calc()));

  it("dispatches POST requests by lower-cased name", async () => {
    await expect(router({ method: "POST", path: "/add", body: "[2,3]" })).resolves.toEqual({
      status: 200,
      headers: JSON_TYPE,
      body: "5"
    });
    await expect(router({ method: "post", path: "/ADD", body: "[1,1]" })).resolves.toMatchObject({ status: 200, body: "2" });
    await expect(router({ method: "POST", path: "/sumAll", body: "[[1,2,3]]" })).resolves.toMatchObject({ body: "6" });
    await expect(router({ method: "POST", path: "/%61dd", body: "[0,1]" })).resolves.toMatchObject({ body: "1" });
  });

  it("only accepts POST", async () => {
    await expect(router({ method: "GET", path: "/add" })).resolves.toEqual({
      status: 405,
      headers: { ...TEXT, Allow: "POST" },
      body: "Method Not Allowed"
    });
  });

  it("answers unknown and empty names with 404", async () => {
    await expect(router({ method: "POST", path: "/nope" })).resolves.toEqual({
      status: 404,
      headers: TEXT,
      body: "Unknown method: nope"
    });
    await expect(router({ method: "POST", path: "/" })).resolves.toMatchObject({ status: 404, body: "Unknown method: " });
    await expect(router({ method: "POST", path: "/%E0%A4%A" })).resolves.toMatchObject({ status: 404 });
  });

  it("maps decode failures to 400 and method failures to 500", async () => {
    await expect(router({ method: "POST", path: "/add", body: "[1]" })).resolves.toEqual({
      status: 400,
      headers: TEXT,
      body: "not enough arguments, expected 2"
    });
    await expect(router({ method: "POST", path: "/fail", body: '["boom"]' })).resolves.toEqual({
      status: 500,
      headers: TEXT,
      body: "boom"
    });
  });

  it("answers 200 with an empty body when nothing is produced", async () => {
    await expect(router({ method: "POST", path: "/fail", body: '[""]' })).resolves.toEqual({
      status: 200,
      headers: {},
      body: ""
    });
  });

  it("hands request headers to the call context", async () => {
    await expect(router({ method: "POST", path: "/whoami", headers: { "x-user": "ann" } })).resolves.toMatchObject({
      body: '"ann"'
    });
  });

  it("logs unknown methods at debug", async () => {
    const lines: string[] = [];
    const logged = createRouter(scan(new Calc()), { logger: createLogger({ level: "debug", sink: (l) => lines.push(l) }) });
    await logged({ method: "POST", path: "/missing" });
    expect(lines).toEqual(['[expose-rpc] debug unknown method method="missing"']);
  });
});

describe("createRouter options", () => {
  it("strips the prefix and the query string", async () => {
    const router = createRouter(scan(new Calc()), { prefix: "/api/" });
    await expect(router({ method: "POST", path: "/api/add?trace=1", body: "[2,2]" })).resolves.toMatchObject({
      status: 200,
      body: "4"
    });
    await expect(router({ method: "POST", path: "/other/add", body: "[2,2]" })).resolves.toMatchObject({ status: 404 });
  });

  it("serves the schema document when asked to", async () => {
    const router = createRouter(scan(new Calc()), { prefix: "/api", openapi: { title: "Calc" } });
    const res = await router({ method: "GET", path: "/api/openapi.json" });
    expect(res.status).toBe(200);
    expect(res.headers).toEqual(JSON_TYPE);
    const doc: unknown = JSON.parse(res.body);
    expect(doc).toMatchObject({ openapi: "3.1.0", info: { title: "Calc", version: "1.0.0" } });
    await expect(router({ method: "GET", path: "/api/openapi.json" })).resolves.toEqual(res);
  });

  it("does not serve the schema by default", async () => {
    const router = createRouter(scan(new Calc()));
    await expect(router({ method: "GET", path: "/openapi.json" })).resolves.toMatchObject({ status: 405 });
  });

  it("routes payload methods by exact name and answers 204 without a value", async () => {
    const state: { greeted: string[] } = { greeted: [] };
    const service = {
      sayHello(name: string) {
        state.greeted.push(name);
        return `Hello ${name}`;
      },
      reset() {
        state.greeted = [];
      }
    };
    Rpc.declare(service, "sayHello", { params: [{ name: "name", type: t.string() }], results: [t.string()] });
    Rpc.declare(service, "reset", { params: [] });
    const router = createRouter(scan(service, { convention: "payload" }));

    await expect(router({ method: "POST", path: "/sayHello", body: '"Ann"' })).resolves.toEqual({
      status: 200,
      headers: JSON_TYPE,
      body: '"Hello Ann"'
    });
    await expect(router({ method: "POST", path: "/sayhello", body: '"Ann"' })).resolves.toMatchObject({ status: 404 });
    await expect(router({ method: "POST", path: "/reset" })).resolves.toEqual({ status: 204, headers: {}, body: "" });
    expect(state.greeted).toEqual([]);
  });
});

describe("createSessionRouter", () => {
  class Session {
    constructor(readonly user: string) {}

    @Rpc.method({ results: t.string() })
    whoAmI(): string {
      return this.user;
    }
  }

  it("builds a receiver per request and matches names case-insensitively", async () => {
    const router = createSessionRouter(Session, (ctx) => new Session(ctx.headers["x-user"] ?? "guest"));
    await expect(router({ method: "POST", path: "/whoami", headers: { "x-user": "ann" } })).resolves.toMatchObject({
      status: 200,
      body: '"ann"'
    });
    await expect(router({ method: "POST", path: "/WHOAMI" })).resolves.toMatchObject({ body: '"guest"' });
  });

  it("answers 500 when the factory fails", async () => {
    const router = createSessionRouter(Session, () => {
      throw new Error("session expired");
    });
    await expect(router({ method: "POST", path: "/whoAmI" })).resolves.toEqual({
      status: 500,
      headers: TEXT,
      body: "session expired"
    });
  });
});
