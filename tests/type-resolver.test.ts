import { describe, it, expect } from "vitest";
import { resolveTypeRef, isRequired, definitionRef } from "../src/type-resolver.js";
import { DEFAULT_OPTIONS } from "../src/options.js";
import type { ConversionOptions, IntrospectionTypeRef } from "../src/types.js";

const opts: ConversionOptions = { ...DEFAULT_OPTIONS };
const nullableItems: ConversionOptions = { ...DEFAULT_OPTIONS, nullableArrayItems: true };

const scalar = (name: string): IntrospectionTypeRef => ({ kind: "SCALAR", name, ofType: null });
const named = (kind: string, name: string): IntrospectionTypeRef => ({ kind, name, ofType: null });
const nonNull = (ofType: IntrospectionTypeRef): IntrospectionTypeRef => ({ kind: "NON_NULL", name: null, ofType });
const list = (ofType: IntrospectionTypeRef): IntrospectionTypeRef => ({ kind: "LIST", name: null, ofType });

describe("isRequired", () => {
  it("is true for an outer NON_NULL", () => {
    expect(isRequired(nonNull(scalar("String")))).toBe(true);
    expect(isRequired(nonNull(list(nonNull(scalar("String")))))).toBe(true);
  });

  it("is false for a list of non-null items", () => {
    expect(isRequired(list(nonNull(scalar("String"))))).toBe(false);
  });

  it("is false for bare scalars and named types", () => {
    expect(isRequired(scalar("Int"))).toBe(false);
    expect(isRequired(named("OBJECT", "User"))).toBe(false);
  });
});

describe("resolveTypeRef", () => {
  it("delegates scalars to the scalar mapper", () => {
    expect(resolveTypeRef(scalar("Int"), opts)).toEqual({ type: "number", title: "Int" });
  });

  it("passes idTypeMapping through to ID scalars", () => {
    const node = resolveTypeRef(scalar("ID"), { ...opts, idTypeMapping: "both" });
    expect(node.type).toEqual(["string", "number"]);
  });

  it.each(["OBJECT", "INTERFACE", "INPUT_OBJECT", "ENUM", "UNION"])(
    "references %s types through definitions",
    (kind) => {
      expect(resolveTypeRef(named(kind, "Thing"), opts)).toEqual({
        $ref: "#/definitions/Thing",
      });
    }
  );

  it("unwraps NON_NULL without marking the node", () => {
    expect(resolveTypeRef(nonNull(scalar("Int")), opts)).toEqual({
      type: "number",
      title: "Int",
    });
  });

  it("ignores NON_NULL around a list", () => {
    const inner = list(scalar("Float"));
    expect(resolveTypeRef(nonNull(inner), opts)).toEqual(resolveTypeRef(inner, opts));
  });

  it("wraps lists as arrays", () => {
    expect(resolveTypeRef(list(named("OBJECT", "User")), opts)).toEqual({
      type: "array",
      items: { $ref: "#/definitions/User" },
    });
  });

  it("handles nested lists", () => {
    expect(resolveTypeRef(list(list(scalar("Int"))), opts)).toEqual({
      type: "array",
      items: { type: "array", items: { type: "number", title: "Int" } },
    });
  });

  it("keeps plain items for nullable elements unless nullableArrayItems is set", () => {
    expect(resolveTypeRef(list(scalar("Int")), opts).items).toEqual({
      type: "number",
      title: "Int",
    });
  });

  it("allows null for nullable elements when nullableArrayItems is set", () => {
    expect(resolveTypeRef(list(scalar("Int")), nullableItems)).toEqual({
      type: "array",
      items: { anyOf: [{ type: "number", title: "Int" }, { type: "null" }] },
    });
  });

  it("does not allow null for NON_NULL elements even with nullableArrayItems", () => {
    expect(resolveTypeRef(list(nonNull(named("OBJECT", "User"))), nullableItems)).toEqual({
      type: "array",
      items: { $ref: "#/definitions/User" },
    });
  });

  describe("malformed chains", () => {
    it("returns an empty node for NON_NULL without ofType", () => {
      expect(resolveTypeRef({ kind: "NON_NULL", name: null, ofType: null }, opts)).toEqual({});
    });

    it("returns an untyped array for LIST without ofType", () => {
      expect(resolveTypeRef({ kind: "LIST" }, opts)).toEqual({ type: "array" });
    });

    it("returns an empty node for a nameless scalar", () => {
      expect(resolveTypeRef({ kind: "SCALAR", name: null }, opts)).toEqual({});
    });

    it("returns an empty node for a nameless named type", () => {
      expect(resolveTypeRef({ kind: "OBJECT" }, opts)).toEqual({});
    });
  });
});

describe("definitionRef", () => {
  it("points into definitions", () => {
    expect(definitionRef("Post")).toEqual({ $ref: "#/definitions/Post" });
  });
});
