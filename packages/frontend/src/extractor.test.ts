/**
 * Tests for interface extraction
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  ALIAS,
  AnnotationRegistry,
  TAG,
  defineAnnotation,
  describeParamFlags,
  formatAnnotation,
  methodAnnotations,
  type RealInterface,
} from "@metaderive/engine";
import { extractFromSource } from "./extractor.js";

const Verb = defineAnnotation("verb", { parent: TAG });
const GET = defineAnnotation("GET", { parent: Verb });
const POST = defineAnnotation("POST", { parent: Verb });
const Doc = defineAnnotation("doc", { parameters: ["text"] });

const registry = new AnnotationRegistry([GET, POST, Doc]);

const source = [
  "/**",
  " * User operations",
  " * @doc Users",
  " */",
  "export interface UserApi extends Base {",
  "  /**",
  "   * @GET",
  "   * @alias fetchUser",
  "   * @param id the user id",
  "   */",
  "  load(id: string, /** @doc lookup-options */ options?: LoadOptions): Promise<User>;",
  "  /** @POST */",
  "  save(this: Session, user: User, ...tags: string[]): void;",
  "  ping(): void;",
  "  watch(onChange: () => void): void;",
  "}",
  "",
  "interface Base {",
  "  /** @GET */",
  "  ping(): void;",
  "  health(): string;",
  "}",
  "",
  "interface Orphan extends Missing {}",
].join("\n");

const extracted = extractFromSource(source, "api.ts", registry);

const get = (name: string): RealInterface => {
  const iface = extracted.interfaces.get(name);
  if (!iface) {
    throw new Error(`interface ${name} was not extracted`);
  }
  return iface;
};

const method = (iface: RealInterface, name: string) => {
  const found = iface.methods.find((m) => m.name === name);
  if (!found) {
    throw new Error(`method ${name} was not extracted`);
  }
  return found;
};

describe("extractFromSource", () => {
  it("should extract every top-level interface", () => {
    expect([...extracted.interfaces.keys()].sort()).to.deep.equal([
      "Base",
      "Orphan",
      "UserApi",
    ]);
  });

  it("should read registered doc tags as annotations", () => {
    const api = get("UserApi");

    expect(api.annotations.map(formatAnnotation)).to.deep.equal(["@doc(text=Users)"]);
    expect(method(api, "load").annotations.map(formatAnnotation)).to.deep.equal([
      "@GET",
      "@alias(name=fetchUser)",
    ]);
    expect(method(api, "load").annotations[1]?.annotationClass).to.equal(ALIAS);
  });

  it("should list own methods before inherited ones", () => {
    expect(get("UserApi").methods.map((m) => `${m.owner}.${m.name}`)).to.deep.equal([
      "UserApi.load",
      "UserApi.save",
      "UserApi.ping",
      "UserApi.watch",
      "Base.health",
    ]);
  });

  it("should link overriding methods to the methods they override", () => {
    const ping = method(get("UserApi"), "ping");

    expect(ping.overrides.map((m) => m.owner)).to.deep.equal(["Base"]);
    expect(methodAnnotations(ping).map(formatAnnotation)).to.deep.equal(["@GET"]);
  });

  it("should extract parameters with types, annotations and flags", () => {
    const api = get("UserApi");
    const paramsOf = (name: string) =>
      method(api, name).parameterGroups.flat().map((p) => ({
        name: p.name,
        type: p.type,
        flags: describeParamFlags(p.flags),
        annotations: p.annotations.map(formatAnnotation),
      }));

    expect(paramsOf("load")).to.deep.equal([
      { name: "id", type: "string", flags: "none", annotations: [] },
      {
        name: "options",
        type: "LoadOptions",
        flags: "hasDefault",
        annotations: ["@doc(text=lookup-options)"],
      },
    ]);
    expect(paramsOf("save").map((p) => [p.name, p.flags])).to.deep.equal([
      ["this", "contextual"],
      ["user", "none"],
      ["tags", "variadic"],
    ]);
    expect(paramsOf("watch").map((p) => p.flags)).to.deep.equal(["lazy"]);
  });

  it("should record result types and locations", () => {
    const load = method(get("UserApi"), "load");

    expect(load.resultType).to.equal("Promise<User>");
    expect(load.location).to.deep.equal({
      file: "api.ts",
      line: 11,
      column: 3,
      length: 4,
    });
  });

  it("should warn about unresolved supertypes and keep the interface", () => {
    expect(get("Orphan").supertypes).to.deep.equal([]);
    expect(
      extracted.diagnostics.diagnostics.map((d) => [d.code, d.severity, d.message])
    ).to.deep.equal([
      [
        "MD4003",
        "warning",
        "Supertype Missing of interface Orphan could not be resolved; its methods are ignored",
      ],
    ]);
    expect(extracted.diagnostics.hasErrors).to.equal(false);
  });

  it("should merge declarations sharing a name", () => {
    const merged = extractFromSource(
      "interface Repo { find(): void; }\ninterface Repo { save(): void; }",
      "repo.ts",
      registry
    );

    expect(merged.interfaces.get("Repo")?.methods.map((m) => m.name)).to.deep.equal([
      "find",
      "save",
    ]);
  });
});
