// ---------------------------------------------------------------------------
// Tests for the catalog registry loader.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, it, expect, beforeEach, afterEach } from "vitest";

import {
  loadCatalogRegistry,
  parseCatalogRegistry,
} from "../../../src/config/catalog-registry.js";
import { ConfigurationError } from "../../../src/core/errors.js";

const PROJECT_ROOT = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "..",
  "..",
  "..",
);

describe("parseCatalogRegistry", () => {
  it("returns catalogs in document order with enabled defaulting to true", () => {
    const catalogs = parseCatalogRegistry({
      catalogs: [
        { id: "north", baseUrl: "https://libby.example.com/library/north" },
        { id: "south", baseUrl: "https://libby.example.com/library/south", enabled: false },
      ],
    });

    expect(catalogs).toEqual([
      { id: "north", baseUrl: "https://libby.example.com/library/north", enabled: true },
      { id: "south", baseUrl: "https://libby.example.com/library/south", enabled: false },
    ]);
  });

  it("rejects a registry without catalogs", () => {
    expect(() => parseCatalogRegistry({ catalogs: [] })).toThrow(ConfigurationError);
    expect(() => parseCatalogRegistry(null)).toThrow(ConfigurationError);
  });

  it("rejects an invalid base URL", () => {
    expect(() =>
      parseCatalogRegistry({ catalogs: [{ id: "north", baseUrl: "not a url" }] }),
    ).toThrow(/catalogs\.0\.baseUrl/);
  });

  it("rejects duplicate ids", () => {
    expect(() =>
      parseCatalogRegistry({
        catalogs: [
          { id: "north", baseUrl: "https://a.example.com" },
          { id: "north", baseUrl: "https://b.example.com" },
        ],
      }),
    ).toThrow('Invalid catalog registry: duplicate catalog id "north"');
  });
});

describe("loadCatalogRegistry", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "catalogs-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("loads a YAML registry", () => {
    const file = path.join(dir, "catalogs.yaml");
    fs.writeFileSync(
      file,
      [
        "catalogs:",
        "  - id: north",
        "    baseUrl: https://libby.example.com/library/north",
        "  - id: south side",
        "    baseUrl: https://libby.example.com/library/south",
        "    enabled: false",
        "",
      ].join("\n"),
    );

    expect(loadCatalogRegistry(file).map((c) => [c.id, c.enabled])).toEqual([
      ["north", true],
      ["south side", false],
    ]);
  });

  it("throws ConfigurationError for a missing file", () => {
    expect(() => loadCatalogRegistry(path.join(dir, "nope.yaml"))).toThrow(
      ConfigurationError,
    );
  });

  it("throws ConfigurationError for malformed YAML", () => {
    const file = path.join(dir, "bad.yaml");
    fs.writeFileSync(file, "catalogs: [\n  - id: north\n");
    expect(() => loadCatalogRegistry(file)).toThrow(ConfigurationError);
  });

  it("ships a default registry with the three enabled catalogs", () => {
    const catalogs = loadCatalogRegistry(
      path.join(PROJECT_ROOT, "config", "catalogs.yaml"),
    );
    expect(catalogs.filter((c) => c.enabled).map((c) => c.id)).toEqual([
      "hawaii",
      "utah",
      "livermore",
    ]);
  });
});
