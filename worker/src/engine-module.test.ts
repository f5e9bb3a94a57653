import { describe, it, expect } from "vitest";
import { fileURLToPath, pathToFileURL } from "node:url";
import { isBridgeError } from "@enginebridge/core";
import { loadEngine, toImportSpecifier } from "./engine-module.js";

const fixture = (name: string) => fileURLToPath(new URL(`./testing/fixtures/${name}`, import.meta.url));

describe("toImportSpecifier", () => {
  it("turns absolute and relative paths into file URLs", () => {
    expect(toImportSpecifier("/opt/engines/rwkv.js")).toBe(pathToFileURL("/opt/engines/rwkv.js").href);
    expect(toImportSpecifier("./engines/rwkv.js", "/srv/app")).toBe("file:///srv/app/engines/rwkv.js");
    expect(toImportSpecifier("../rwkv.js", "/srv/app")).toBe("file:///srv/rwkv.js");
  });

  it("leaves file URLs and package names alone", () => {
    expect(toImportSpecifier("file:///opt/rwkv.js")).toBe("file:///opt/rwkv.js");
    expect(toImportSpecifier("@acme/rwkv-engine")).toBe("@acme/rwkv-engine");
  });
});

describe("loadEngine", () => {
  it("creates the engine exported by the module", async () => {
    const engine = await loadEngine(fixture("engine-module.ts"));
    await expect(engine.embed("hello")).resolves.toEqual([0.5, 0.5]);
  });

  it("rejects a module without createEngine()", async () => {
    const err: unknown = await loadEngine(fixture("empty-module.ts")).catch((e: unknown) => e);
    expect(isBridgeError(err, "CONFIG_ERROR")).toBe(true);
    expect(err instanceof Error ? err.message : "").toBe(
      `Engine module ${fixture("empty-module.ts")} does not export createEngine()`
    );
  });

  it("rejects an object that does not implement the contract", async () => {
    const err: unknown = await loadEngine(fixture("not-an-engine-module.ts")).catch((e: unknown) => e);
    expect(isBridgeError(err, "CONFIG_ERROR")).toBe(true);
  });

  it("rejects a module that cannot be found", async () => {
    const err: unknown = await loadEngine(fixture("missing-module.ts")).catch((e: unknown) => e);
    expect(isBridgeError(err, "CONFIG_ERROR")).toBe(true);
  });
});
