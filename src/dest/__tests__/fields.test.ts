import { describe, it, expect } from "vitest";

import { d, resolveFields } from "../index.js";
import type { ResolvedField } from "../index.js";

const summary = (fields: readonly ResolvedField[]) =>
  fields.map((f) => [f.name, f.steps.map((s) => s.key).join(".")]);

describe("resolveFields", () => {
  it("renames tagged fields and hides '-'", () => {
    const type = d.struct({
      FullName: d.field(d.string(), { name: "Name" }),
      Secret: d.field(d.string(), { name: "-" }),
      Age: d.int32(),
    });
    expect(summary(resolveFields(type))).toEqual([
      ["Name", "FullName"],
      ["Age", "Age"],
    ]);
  });

  it("promotes embedded fields unless a shallower field shadows them", () => {
    const Inner = d.struct({
      InnerName: d.field(d.string(), { name: "Name" }),
      Extra: d.int32(),
    });
    const Outer = d.struct({
      Inner: d.embedded(Inner),
      OuterName: d.field(d.string(), { name: "Name" }),
    });
    expect(summary(resolveFields(Outer))).toEqual([
      ["Name", "OuterName"],
      ["Extra", "Inner.Extra"],
    ]);
  });

  it("prefers the tagged field among fields at the same depth", () => {
    const type = d.struct({
      OtherName: d.field(d.string(), { name: "Name" }),
      Name: d.string(),
    });
    expect(summary(resolveFields(type))).toEqual([["Name", "OtherName"]]);
  });

  it("drops names that stay ambiguous", () => {
    const A = d.struct({ X: d.int32() });
    const B = d.struct({ X: d.int32() });
    expect(resolveFields(d.struct({ A: d.embedded(A), B: d.embedded(B) }))).toEqual([]);
  });

  it("follows optional embedded structs", () => {
    const Base = d.struct({ ID: d.int32() });
    const type = d.struct({ Base: d.embedded(d.optional(Base)), Title: d.string() });
    const fields = resolveFields(type);
    expect(summary(fields)).toEqual([
      ["Title", "Title"],
      ["ID", "Base.ID"],
    ]);
    expect(fields[1].depth).toBe(1);
  });

  it("caches per struct type", () => {
    const type = d.struct({ A: d.string() });
    expect(resolveFields(type)).toBe(resolveFields(type));
  });
});
