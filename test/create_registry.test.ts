// test/create_registry.test.ts

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  InMemoryEnumStore,
  InvalidConfigError,
  createIdRegistry,
  loggerConfig,
} from "../src";

describe("createIdRegistry", () => {
  const originalHandler = loggerConfig.handler;
  const originalLevel = loggerConfig.level;
  let dir: string;

  beforeEach(() => {
    loggerConfig.handler = vi.fn();
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "create-registry-"));
  });

  afterEach(() => {
    loggerConfig.handler = originalHandler;
    loggerConfig.level = originalLevel;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("should create the store file under the index root", () => {
    const registry = createIdRegistry({ indexRoot: dir });
    registry.register("words");

    expect(fs.readFileSync(path.join(dir, "indices.enum"), "utf8")).toBe("words\n");
  });

  it("should honour a custom file name", () => {
    const registry = createIdRegistry({ indexRoot: dir, fileName: "ids.txt" });
    registry.register("words");

    expect(fs.readFileSync(path.join(dir, "ids.txt"), "utf8")).toBe("words\n");
  });

  it("should prefer an explicit store", () => {
    const store = new InMemoryEnumStore(["alpha"]);
    const registry = createIdRegistry({ store, indexRoot: dir });

    expect(registry.register("beta").id).toBe(2);
    expect(fs.existsSync(path.join(dir, "indices.enum"))).toBe(false);
  });

  it("should require a store or an index root", () => {
    expect(() => createIdRegistry({})).toThrow(InvalidConfigError);
    expect(() => createIdRegistry({ indexRoot: "" })).toThrow(
      "Either store or indexRoot must be provided",
    );
  });

  it("should validate maxIds", () => {
    const store = new InMemoryEnumStore([]);

    expect(() => createIdRegistry({ store, maxIds: 0 })).toThrow(InvalidConfigError);
    expect(() => createIdRegistry({ store, maxIds: 40000 })).toThrow(
      "maxIds must be an integer in [1, 32767], got 40000",
    );
    expect(() => createIdRegistry({ store, maxIds: 1.5 })).toThrow(InvalidConfigError);
    expect(createIdRegistry({ store, maxIds: 5 }).maxIds).toBe(5);
  });

  it("should apply the log level", () => {
    createIdRegistry({ store: new InMemoryEnumStore([]), logLevel: "error" });

    expect(loggerConfig.level).toBe("error");
    expect(loggerConfig.handler).not.toHaveBeenCalled();
  });

  it("should pass the owner resolver through", () => {
    const registry = createIdRegistry({
      store: new InMemoryEnumStore([]),
      resolveOwner: () => "plugin-a",
    });

    const handle = registry.register("words");
    expect(registry.getOwner(handle)).toBe("plugin-a");
  });
});
