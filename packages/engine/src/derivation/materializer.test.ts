/**
 * Tests for the direct value materializer
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  ALIAS,
  TAG,
  createAnnotation,
  defineAnnotation,
} from "../model/annotations.js";
import { realInterface, realMethod, realParam } from "../model/builders.js";
import { ContextRegistry, createToken, emptyResolver } from "../context/registry.js";
import type { CompiledDirectParam } from "../schema/compile.js";
import { many, single } from "../schema/dsl.js";
import { materializeDirect, type MaterializeContext } from "./materializer.js";
import type { Subject } from "./subject.js";

const Role = defineAnnotation("role", { parent: TAG, parameters: ["name"] });
const Audit = defineAnnotation("audit");

const base = {
  name: "x",
  description: "parameter `x` of schema Test",
};
const plain: MaterializeContext = { resolver: emptyResolver, embedded: false };

const overridden = realMethod("remove", {
  annotations: [createAnnotation(Role, { name: "admin" })],
});
const method = realMethod("remove", {
  owner: "Users",
  annotations: [
    createAnnotation(Role, { name: "owner" }),
    createAnnotation(ALIAS, { name: "delete" }),
  ],
  overrides: [overridden],
  groups: [[realParam("id", { flags: ["hasDefault"] })]],
});
const iface = realInterface("Users", {
  annotations: [createAnnotation(Audit)],
  methods: [method],
});
const onMethod: Subject = { kind: "method", method, iface };

const build = (param: CompiledDirectParam, subject: Subject, ctx = plain) => {
  const result = materializeDirect(param, subject, ctx);
  return result.ok ? result.value(3) : result.error.map((d) => d.message);
};

describe("materializeDirect", () => {
  it("should capture the own or aliased name", () => {
    expect(build({ ...base, kind: "name", useAlias: false }, onMethod)).to.deep.equal({
      kind: "literal",
      value: "remove",
    });
    expect(build({ ...base, kind: "name", useAlias: true }, onMethod)).to.deep.equal({
      kind: "literal",
      value: "delete",
    });
  });

  it("should capture annotations inherited through overrides", () => {
    const node = build(
      { ...base, kind: "annotation", annotationClass: Role, cardinality: many },
      onMethod
    );

    expect(node).to.deep.equal({
      kind: "list",
      items: [
        { kind: "annotation", annotation: method.annotations[0] },
        { kind: "annotation", annotation: overridden.annotations[0] },
      ],
    });
  });

  it("should report ambiguous single annotations", () => {
    expect(
      build({ ...base, kind: "annotation", annotationClass: Role, cardinality: single }, onMethod)
    ).to.deep.equal([
      "parameter `x` of schema Test: several matching annotations found on method Users.remove: @role(name=owner), @role(name=admin)",
    ]);
  });

  it("should check presence on the enclosing declaration only when embedded", () => {
    const presence: CompiledDirectParam = {
      ...base,
      kind: "presence",
      annotationClass: Audit,
    };

    expect(build(presence, onMethod)).to.deep.equal({ kind: "literal", value: false });
    expect(build(presence, onMethod, { ...plain, embedded: true })).to.deep.equal({
      kind: "literal",
      value: true,
    });
  });

  it("should capture position with the index in the match", () => {
    const [param] = method.parameterGroups.flat();
    if (!param) {
      throw new Error("fixture method has a parameter");
    }
    const subject: Subject = { kind: "parameter", param, method };

    expect(build({ ...base, kind: "position" }, subject)).to.deep.equal({
      kind: "position",
      position: { index: 0, indexOfGroup: 0, indexInGroup: 0, indexInMatch: 3 },
    });
    expect(build({ ...base, kind: "flags" }, subject)).to.deep.equal({
      kind: "literal",
      value: 8,
    });
  });

  describe("contextual lookups", () => {
    const Limit = createToken<number>("Limit");

    it("should keep the reference found while matching", () => {
      const registry = new ContextRegistry().register(Limit, 50);
      const node = build(
        { ...base, kind: "contextual", token: Limit, strict: false },
        onMethod,
        { ...plain, resolver: registry }
      );

      expect(node).to.deep.equal({
        kind: "lookup",
        token: Limit,
        ref: { token: Limit, value: 50, source: undefined },
        requestedBy: base.description,
        location: undefined,
      });
    });

    it("should defer a missing non-strict instance", () => {
      const node = build({ ...base, kind: "contextual", token: Limit, strict: false }, onMethod);

      expect(node).to.deep.include({ kind: "lookup", ref: undefined });
    });

    it("should fail a missing strict instance", () => {
      expect(
        build({ ...base, kind: "contextual", token: Limit, strict: true }, onMethod)
      ).to.deep.equal([
        "parameter `x` of schema Test: no instance of Limit is registered (required by method Users.remove)",
      ]);
    });
  });
});
