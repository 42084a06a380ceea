/**
 * Tests for inspect command
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  ALIAS,
  AnnotationRegistry,
  createAnnotation,
  defineAnnotation,
  realInterface,
  realMethod,
  realParam,
  type Schema,
} from "@metaderive/engine";
import type { ResolvedConfig, SchemaModule } from "../types.js";
import { formatInterface, inspectCommand } from "./inspect.js";

const GET = defineAnnotation("GET");
const Path = defineAnnotation("path", { parameters: ["name"] });

describe("Inspect Command", () => {
  describe("formatInterface", () => {
    it("should list methods and parameters with their annotations", () => {
      const closeable = realInterface("Closeable", {
        methods: [realMethod("close")],
      });
      const store = realInterface("Store", {
        annotations: [createAnnotation(ALIAS, { name: "store" })],
        supertypes: [closeable],
        methods: [
          realMethod("get", {
            annotations: [createAnnotation(GET)],
            groups: [
              [
                realParam("key", {
                  type: "string",
                  annotations: [createAnnotation(Path, { name: "k" })],
                  flags: ["hasDefault"],
                }),
              ],
            ],
            resultType: "string",
          }),
          ...closeable.methods,
        ],
      });

      expect(formatInterface(store)).to.deep.equal([
        "interface Store extends Closeable @alias(name=store)",
        "  method Store.get: string @GET",
        "    param key: string (flags: hasDefault) @path(name=k)",
        "  method Closeable.close: void",
      ]);
    });
  });

  describe("inspectCommand", () => {
    let tempDir = "";
    const config = (): ResolvedConfig => ({
      projectRoot: tempDir,
      sources: [path.join(tempDir, "api.ts")],
      schemaModule: path.join(tempDir, "schemas.js"),
      outputDirectory: path.join(tempDir, "generated"),
      includeTimestamp: false,
      targets: [],
      verbose: false,
      quiet: true,
    });
    const schemaModule: SchemaModule = {
      schemas: new Map<string, Schema<unknown>>(),
      annotations: new AnnotationRegistry([GET]),
    };

    before(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "metaderive-inspect-"));
      fs.writeFileSync(
        path.join(tempDir, "api.ts"),
        "export interface Shop {\n  /** @GET */\n  load(id: string): string;\n}\n"
      );
      fs.writeFileSync(
        path.join(tempDir, "other.ts"),
        "export interface Cart { clear(): void; }\n"
      );
    });

    after(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it("should load the configured sources", () => {
      const result = inspectCommand(config(), schemaModule);

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.map((iface) => iface.name)).to.deep.equal(["Shop"]);
        expect(result.value[0]?.methods[0]?.annotations.length).to.equal(1);
      }
    });

    it("should load a single file when one is given", () => {
      const result = inspectCommand(
        config(),
        schemaModule,
        path.join(tempDir, "other.ts")
      );

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.map((iface) => iface.name)).to.deep.equal(["Cart"]);
      }
    });

    it("should fail for missing files", () => {
      const result = inspectCommand(
        config(),
        schemaModule,
        path.join(tempDir, "missing.ts")
      );

      expect(result).to.deep.equal({
        ok: false,
        error: "Failed to load interface sources",
      });
    });
  });
});
