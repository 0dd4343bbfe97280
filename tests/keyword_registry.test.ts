import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { AppError } from "../src/tracker/errors.js";
import { KeywordRegistry } from "../src/tracker/keyword_registry.js";

describe("KeywordRegistry", () => {
  let dir: string;
  let file: string;
  let tick: number;
  const clock = () => new Date(Date.UTC(2024, 2, 1, 0, tick++));

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "keyword-registry-"));
    file = path.join(dir, "state", "keywords.json");
    tick = 0;
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("registers a keyword under its normalized form", async () => {
    const registry = new KeywordRegistry(file, clock);

    const entry = await registry.add({ keyword: "  Unified   Namespace ", platforms: ["youtube", "reddit", "reddit"] });

    expect(entry).toEqual({
      keyword: "Unified   Namespace",
      normalized: "unified namespace",
      platforms: ["reddit", "youtube"],
      enabled: true,
      createdAt: "2024-03-01T00:00:00.000Z",
    });
    expect(JSON.parse(await readFile(file, "utf-8"))).toEqual({
      keywords: {
        "unified namespace": {
          keyword: "Unified   Namespace",
          platforms: ["reddit", "youtube"],
          enabled: true,
          createdAt: "2024-03-01T00:00:00.000Z",
        },
      },
    });
  });

  it("keeps the creation time when a keyword is updated", async () => {
    const registry = new KeywordRegistry(file, clock);

    await registry.add({ keyword: "mqtt" });
    const updated = await registry.add({ keyword: "MQTT", enabled: false });

    expect(updated.createdAt).toBe("2024-03-01T00:00:00.000Z");
    expect(updated.keyword).toBe("MQTT");
    expect(await registry.listEnabled()).toEqual([]);
  });

  it("lists keywords sorted and filters disabled ones", async () => {
    const registry = new KeywordRegistry(file, clock);
    await registry.add({ keyword: "zigbee" });
    await registry.add({ keyword: "mqtt", enabled: false });
    await registry.add({ keyword: "matter" });

    expect((await registry.list()).map((entry) => entry.normalized)).toEqual(["matter", "mqtt", "zigbee"]);
    expect((await registry.listEnabled()).map((entry) => entry.normalized)).toEqual(["matter", "zigbee"]);
  });

  it("removes keywords by any spelling of their normalized form", async () => {
    const registry = new KeywordRegistry(file, clock);
    await registry.add({ keyword: "opc ua" });

    expect(await registry.remove(" OPC  UA")).toBe(true);
    expect(await registry.remove("opc ua")).toBe(false);
    expect(await registry.list()).toEqual([]);
  });

  it("seeds only keywords that are not registered yet", async () => {
    const registry = new KeywordRegistry(file, clock);
    await registry.add({ keyword: "mqtt", platforms: ["reddit"] });

    expect(await registry.seed(["MQTT ", "", "opc ua", "opc ua"])).toBe(1);
    expect(await registry.list()).toEqual([
      { keyword: "mqtt", normalized: "mqtt", platforms: ["reddit"], enabled: true, createdAt: "2024-03-01T00:00:00.000Z" },
      { keyword: "opc ua", normalized: "opc ua", platforms: [], enabled: true, createdAt: "2024-03-01T00:01:00.000Z" },
    ]);
  });

  it("applies concurrent changes one after another", async () => {
    const registry = new KeywordRegistry(file, clock);

    await Promise.all(["a", "b", "c", "d"].map((keyword) => registry.add({ keyword })));

    expect((await registry.list()).map((entry) => entry.normalized)).toEqual(["a", "b", "c", "d"]);
  });

  it("refuses to overwrite a registry file it cannot parse", async () => {
    const registry = new KeywordRegistry(file, clock);
    await registry.add({ keyword: "mqtt" });
    await writeFile(file, "[]");

    await expect(registry.add({ keyword: "matter" })).rejects.toBeInstanceOf(AppError);
    expect(await readFile(file, "utf-8")).toBe("[]");
  });
});
