/**
 * Tests for configuration loading and resolution
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { findConfig, loadConfig, resolveConfig, validateConfig } from "./config.js";
import type { MetaderiveConfig } from "./types.js";

describe("Config", () => {
  describe("validateConfig", () => {
    it("should accept a complete configuration", () => {
      const result = validateConfig({
        sources: ["src/api.ts"],
        schemaModule: "schemas.js",
        targets: [{ interface: "Shop", schema: "routes", exportName: "shop" }],
      });

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.targets).to.deep.equal([
          { interface: "Shop", schema: "routes", exportName: "shop" },
        ]);
      }
    });

    it("should require sources", () => {
      const result = validateConfig({ schemaModule: "schemas.js", targets: [] });
      expect(result).to.deep.equal({
        ok: false,
        error: "metaderive.json: 'sources' must list at least one file",
      });
    });

    it("should require a schema module", () => {
      const result = validateConfig({ sources: ["a.ts"], targets: [] });
      expect(result).to.deep.equal({
        ok: false,
        error: "metaderive.json: 'schemaModule' is required",
      });
    });

    it("should name the malformed target", () => {
      const result = validateConfig({
        sources: ["a.ts"],
        schemaModule: "schemas.js",
        targets: [{ interface: "Shop", schema: "routes" }, { interface: "Cart" }],
      });
      expect(result).to.deep.equal({
        ok: false,
        error:
          "metaderive.json: targets[1] needs string 'interface' and 'schema' fields",
      });
    });

    it("should reject a non-boolean includeTimestamp", () => {
      const result = validateConfig({
        sources: ["a.ts"],
        schemaModule: "schemas.js",
        includeTimestamp: "no",
        targets: [],
      });
      expect(result.ok).to.equal(false);
    });
  });

  describe("files", () => {
    let tempDir = "";

    before(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "metaderive-config-"));
      fs.mkdirSync(path.join(tempDir, "src", "nested"), { recursive: true });
      fs.writeFileSync(
        path.join(tempDir, "metaderive.json"),
        JSON.stringify({
          sources: ["src/api.ts"],
          schemaModule: "schemas.js",
          targets: [],
        })
      );
      fs.writeFileSync(path.join(tempDir, "src", "broken.json"), "{ sources: ");
    });

    after(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it("should find the config in a parent directory", () => {
      expect(findConfig(path.join(tempDir, "src", "nested"))).to.equal(
        path.join(tempDir, "metaderive.json")
      );
    });

    it("should load and validate the config", () => {
      const result = loadConfig(path.join(tempDir, "metaderive.json"));
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.schemaModule).to.equal("schemas.js");
      }
    });

    it("should report missing files", () => {
      const missing = path.join(tempDir, "missing.json");
      expect(loadConfig(missing)).to.deep.equal({
        ok: false,
        error: `Config file not found: ${missing}`,
      });
    });

    it("should report invalid JSON", () => {
      const result = loadConfig(path.join(tempDir, "src", "broken.json"));
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error.startsWith("Failed to parse metaderive.json: ")).to.equal(
          true
        );
      }
    });
  });

  describe("resolveConfig", () => {
    const config: MetaderiveConfig = {
      sources: ["src/api.ts"],
      schemaModule: "dist/schemas.js",
      targets: [{ interface: "Shop", schema: "routes" }],
    };

    it("should resolve paths against the project root", () => {
      const result = resolveConfig(config, {}, "/work/app");
      expect(result.sources).to.deep.equal(["/work/app/src/api.ts"]);
      expect(result.schemaModule).to.equal("/work/app/dist/schemas.js");
      expect(result.outputDirectory).to.equal("/work/app/generated");
      expect(result.includeTimestamp).to.equal(true);
      expect(result.verbose).to.equal(false);
      expect(result.quiet).to.equal(false);
    });

    it("should prefer the configured output directory", () => {
      const result = resolveConfig(
        { ...config, outputDirectory: "src/gen" },
        {},
        "/work/app"
      );
      expect(result.outputDirectory).to.equal("/work/app/src/gen");
    });

    it("should let CLI options override the file", () => {
      const result = resolveConfig(
        { ...config, outputDirectory: "src/gen" },
        { out: "/tmp/out", quiet: true },
        "/work/app"
      );
      expect(result.outputDirectory).to.equal("/tmp/out");
      expect(result.quiet).to.equal(true);
    });
  });
});
