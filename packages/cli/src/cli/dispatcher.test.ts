/**
 * Tests for the CLI dispatcher
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { runCli } from "./dispatcher.js";

const engineUrl = new URL("../../../engine/src/index.ts", import.meta.url).href;

describe("runCli", () => {
  let tempDir = "";

  before(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "metaderive-cli-"));
    fs.writeFileSync(
      path.join(tempDir, "api.ts"),
      "export interface Shop {\n  load(id: string): string;\n}\n"
    );
    fs.writeFileSync(
      path.join(tempDir, "schemas.mjs"),
      [
        `import { AnnotationRegistry, captureName, defineSchema, many, perMethod } from ${JSON.stringify(engineUrl)};`,
        "export const annotations = new AnnotationRegistry();",
        'const endpoint = defineSchema("Endpoint", "method", { name: captureName() });',
        'export const routes = defineSchema("Routes", "interface", { endpoints: perMethod(endpoint, { cardinality: many }) });',
        "",
      ].join("\n")
    );
    fs.writeFileSync(
      path.join(tempDir, "metaderive.json"),
      JSON.stringify({
        sources: ["api.ts"],
        schemaModule: "schemas.mjs",
        includeTimestamp: false,
        targets: [{ interface: "Shop", schema: "routes" }],
      })
    );
    fs.writeFileSync(
      path.join(tempDir, "invalid.json"),
      JSON.stringify({ sources: [], schemaModule: "schemas.mjs", targets: [] })
    );
  });

  after(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should generate the configured targets", async () => {
    const exitCode = await runCli([
      "generate",
      "--quiet",
      "--config",
      path.join(tempDir, "metaderive.json"),
    ]);

    expect(exitCode).to.equal(0);
    expect(
      fs.existsSync(path.join(tempDir, "generated", "Shop.metadata.ts"))
    ).to.equal(true);
  });

  it("should return 3 without a config file", async () => {
    const exitCode = await runCli([
      "generate",
      "--config",
      path.join(tempDir, "missing.json"),
    ]);
    expect(exitCode).to.equal(3);
  });

  it("should return 1 for an invalid config file", async () => {
    const exitCode = await runCli([
      "generate",
      "--config",
      path.join(tempDir, "invalid.json"),
    ]);
    expect(exitCode).to.equal(1);
  });

  it("should return 1 for unknown commands", async () => {
    expect(await runCli(["publish"])).to.equal(1);
  });

  it("should return 0 for version", async () => {
    expect(await runCli(["--version"])).to.equal(0);
  });
});
