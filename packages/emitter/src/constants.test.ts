/**
 * Tests for the generated file header
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { generateFileHeader } from "./constants.js";

describe("generateFileHeader", () => {
  it("should include the given timestamp", () => {
    const header = generateFileHeader("src/shop.ts", {
      timestamp: "2024-01-01T00:00:00.000Z",
    });

    expect(header).to.equal(
      [
        "// Generated from: src/shop.ts",
        "// Generated at: 2024-01-01T00:00:00.000Z",
        "// WARNING: Do not modify this file manually",
        "",
      ].join("\n")
    );
  });

  it("should omit the timestamp when asked", () => {
    const header = generateFileHeader("src/shop.ts", { includeTimestamp: false });

    expect(header.split("\n")).to.deep.equal([
      "// Generated from: src/shop.ts",
      "// WARNING: Do not modify this file manually",
      "",
    ]);
  });

  it("should list several sources", () => {
    const header = generateFileHeader(["src/shop.ts", "src/cart.ts"], {
      includeTimestamp: false,
    });

    expect(header.split("\n")[0]).to.equal(
      "// Generated from: src/shop.ts, src/cart.ts"
    );
  });
});
