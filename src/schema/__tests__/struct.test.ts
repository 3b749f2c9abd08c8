import { describe, it, expect } from "vitest";

import { d, isRecord } from "../../dest/index.js";
import { DestinationError, SchemaPrepareError } from "../../errors.js";
import { max, minLen } from "../../validators/index.js";
import { integer, prop, slice, string, struct } from "../index.js";
import { runSchema } from "./helpers.js";

const Person = d.struct({
  Name: d.string(),
  Age: d.int32(),
  Email: d.optional(d.string()),
  Tags: d.array(d.string()),
});

const personSchema = () =>
  struct(
    prop("Name", string(minLen(1))),
    prop("Age", integer()),
    prop("Email", string()),
    prop("Tags", slice(string())),
  );

const run = (json: string) => runSchema(personSchema(), Person, json, { path: "/" });

// =============================================================================
// Decoding
// =============================================================================

describe("struct() — decoding", () => {
  it("fills every declared field", async () => {
    const { issues, value } = await run('{"Name":"Ann","Age":31,"Email":"ann@example.com","Tags":["a","b"]}');
    expect(issues).toEqual([]);
    expect(value).toEqual({ Name: "Ann", Age: 31, Email: "ann@example.com", Tags: ["a", "b"] });
  });

  it("matches keys case-insensitively when no exact match exists", async () => {
    const { issues, value } = await run('{"name":"Ann","AGE":3,"tags":[]}');
    expect(issues).toEqual([]);
    expect(value).toEqual({ Name: "Ann", Age: 3, Email: undefined, Tags: [] });
  });

  it("prefers exact matches", async () => {
    const type = d.struct({ id: d.int32(), ID: d.int32() });
    const schema = struct(prop("id", integer()), prop("ID", integer()));
    const { value } = await runSchema(schema, type, '{"ID":1,"id":2}');
    expect(value).toEqual({ id: 2, ID: 1 });
  });

  it("skips unknown keys whatever their value", async () => {
    const { issues, value } = await run(
      '{"Name":"A","junk":{"x":[1,{"y":null}]},"Age":1,"more":[[]],"Tags":[],"z":"}","n":-1.5e3}',
    );
    expect(issues).toEqual([]);
    expect(value).toEqual({ Name: "A", Age: 1, Email: undefined, Tags: [] });
  });

  it("tolerates a trailing comma before the closing brace", async () => {
    expect((await run('{"Name":"A","Age":1,"Tags":[],}')).issues).toEqual([]);
  });

  it("leaves omitted optional fields undefined", async () => {
    const { value } = await run('{"Name":"A","Age":1,"Tags":[]}');
    expect(value).toEqual({ Name: "A", Age: 1, Email: undefined, Tags: [] });
  });
});

// =============================================================================
// Missing properties, null and defaults
// =============================================================================

describe("struct() — missing properties", () => {
  it("reports each missing required property in declaration order", async () => {
    const type = d.struct({ First: d.string(), Last: d.string() });
    const { issues } = await runSchema(struct(prop("First", string()), prop("Last", string())), type, "{}", {
      path: "/",
    });
    expect(issues).toEqual([
      { path: "/First", message: "Property is required" },
      { path: "/Last", message: "Property is required" },
    ]);
  });

  it("lists value issues before missing properties", async () => {
    const { issues } = await run('{"Name":""}');
    expect(issues).toEqual([
      { path: "/Name", message: "Must be at least 1 characters long" },
      { path: "/Age", message: "Property is required" },
      { path: "/Tags", message: "Property is required" },
    ]);
  });

  it("treats null as not provided", async () => {
    const optional = await runSchema(personSchema(), Person, '{"Name":"A","Age":1,"Tags":[],"Email":null}', {
      initial: { Name: "", Age: 0, Email: "old", Tags: [] },
    });
    expect(optional.issues).toEqual([]);
    expect(optional.value).toEqual({ Name: "A", Age: 1, Email: undefined, Tags: [] });

    const required = await run('{"Name":null,"Age":1,"Tags":[]}');
    expect(required.issues).toEqual([{ path: "/Name", message: "Property is required" }]);
  });

  it("assigns defaults without validating them", async () => {
    const type = d.struct({ Role: d.string(), Code: d.string(), Tags: d.array(d.string()) });
    const schema = struct(
      prop("Role", string(), { default: "user" }),
      prop("Code", string(minLen(5)), { default: "ab" }),
      prop("Tags", slice(string()), { default: ["x"] }),
    );
    const { issues, value } = await runSchema(schema, type, "{}");
    expect(issues).toEqual([]);
    expect(value).toEqual({ Role: "user", Code: "ab", Tags: ["x"] });
  });

  it("hands out a fresh copy of a default each time", async () => {
    const fallback = ["x"];
    const type = d.struct({ Tags: d.array(d.string()) });
    const schema = struct(prop("Tags", slice(string()), { default: fallback }));
    const tagsOf = (value: unknown) => (isRecord(value) ? value.Tags : undefined);

    const first = await runSchema(schema, type, "{}");
    const second = await runSchema(schema, type, "{}");
    expect(tagsOf(first.value)).toEqual(["x"]);
    expect(tagsOf(first.value)).not.toBe(fallback);
    expect(tagsOf(first.value)).not.toBe(tagsOf(second.value));
  });
});

// =============================================================================
// Nesting
// =============================================================================

describe("struct() — nesting", () => {
  it("builds paths through nested objects and arrays", async () => {
    const type = d.struct({
      inner: d.struct({ n: d.int32() }),
      items: d.array(d.struct({ name: d.string() })),
    });
    const schema = struct(
      prop("inner", struct(prop("n", integer(max(1))))),
      prop("items", slice(struct(prop("name", string(minLen(2)))))),
    );
    const { issues } = await runSchema(schema, type, '{"inner":{"n":5},"items":[{"name":"ok"},{"name":"x"}]}', {
      path: "/",
    });
    expect(issues).toEqual([
      { path: "/inner/n", message: "Must be less than or equal to 1" },
      { path: "/items/1/name", message: "Must be at least 2 characters long" },
    ]);
  });

  it("allocates optional structs only when present", async () => {
    const type = d.struct({ addr: d.optional(d.struct({ city: d.string() })) });
    const schema = () => struct(prop("addr", struct(prop("city", string()))));

    expect((await runSchema(schema(), type, "{}")).value).toEqual({ addr: undefined });
    expect((await runSchema(schema(), type, '{"addr":{"city":"Rome"}}')).value).toEqual({
      addr: { city: "Rome" },
    });
  });

  it("writes promoted fields into embedded structs", async () => {
    const Base = d.struct({ ID: d.int32() });
    const schema = () => struct(prop("ID", integer()), prop("Title", string()));

    const plain = d.struct({ Base: d.embedded(Base), Title: d.string() });
    expect((await runSchema(schema(), plain, '{"ID":7,"Title":"t"}')).value).toEqual({
      Base: { ID: 7 },
      Title: "t",
    });

    const optional = d.struct({ Base: d.embedded(d.optional(Base)), Title: d.string() });
    const { issues, value } = await runSchema(schema(), optional, '{"ID":7,"Title":"t"}');
    expect(issues).toEqual([]);
    expect(value).toEqual({ Base: { ID: 7 }, Title: "t" });
  });

  it("does not allocate an absent embedded struct to clear a null field", async () => {
    const Meta = d.struct({ Note: d.optional(d.string()) });
    const type = d.struct({ Meta: d.embedded(d.optional(Meta)), Title: d.string() });
    const schema = struct(prop("Note", string()), prop("Title", string()));
    const { issues, value } = await runSchema(schema, type, '{"Note":null,"Title":"t"}');
    expect(issues).toEqual([]);
    expect(value).toEqual({ Meta: undefined, Title: "t" });
  });

  it("reports a missing promoted field by its JSON name", async () => {
    const type = d.struct({ Base: d.embedded(d.struct({ ID: d.int32() })) });
    const { issues } = await runSchema(struct(prop("ID", integer())), type, "{}", { path: "/" });
    expect(issues).toEqual([{ path: "/ID", message: "Property is required" }]);
  });

  it("keeps decoding siblings after a wrongly typed value", async () => {
    const { issues, value } = await run('{"Name":{"a":[1,2]},"Age":"x","Tags":["ok"]}');
    expect(issues).toEqual([
      { path: "/Name", message: "Must be a string, got an object" },
      { path: "/Age", message: 'Must be an integer, got "x"' },
    ]);
    expect(value).toEqual({ Name: "", Age: 0, Email: undefined, Tags: ["ok"] });
  });
});

// =============================================================================
// Malformed input and configuration
// =============================================================================

describe("struct() — malformed input", () => {
  it("requires a colon after each key", async () => {
    await expect(run('{"Name" "A"}')).rejects.toThrow("Expected ':' not string (at byte 11)");
  });

  it("requires a separator between members", async () => {
    await expect(run('{"Name":"A" "Age":1}')).rejects.toThrow("Expected ',' or '}' not string (at byte 17)");
  });

  it("requires an object", async () => {
    await expect(run("[1]")).rejects.toThrow("Expected '{' not '[' (at byte 1)");
  });

  it("requires string keys", async () => {
    await expect(run("{1:2}")).rejects.toThrow("Expected object property name or '}' not number (at byte 2)");
  });

  it("needs an object to write into", async () => {
    await expect(runSchema(personSchema(), Person, "{}", { initial: undefined })).rejects.toBeInstanceOf(
      DestinationError,
    );
  });
});

describe("struct() — prepare", () => {
  it("requires a field for every prop", () => {
    const type = d.struct({ Name: d.string() });
    expect(() => struct(prop("Nope", string()), prop("Other", string())).prepare(type)).toThrow(
      new SchemaPrepareError("No field for props: Nope, Other on struct {Name:string}"),
    );
  });

  it("checks defaults against the field type", () => {
    const type = d.struct({ Age: d.int32() });
    expect(() => struct(prop("Age", integer(), { default: "x" })).prepare(type)).toThrow(
      "Default for prop Age is not a valid int32",
    );
    expect(() => struct(prop("Age", integer(), { default: null })).prepare(type)).toThrow(
      "Default for prop Age must not be null or undefined",
    );
  });

  it("prepares child schemas against the field type", () => {
    const type = d.struct({ Name: d.string() });
    expect(() => struct(prop("Name", integer())).prepare(type)).toThrow(
      "Integer schema wants an integer type, not string",
    );
  });

  it("rejects fields with nested optional types", () => {
    const type = d.struct({ Note: d.optional(d.optional(d.string())) });
    expect(() => struct(prop("Note", string())).prepare(type)).toThrow(
      new SchemaPrepareError("Field for prop Note has a nested optional type string??"),
    );
  });

  it("may be prepared again only for a structurally equal type", () => {
    const schema = struct(prop("x", string()));
    schema.prepare(d.struct({ a: d.field(d.string(), { name: "x" }) }));
    expect(() => schema.prepare(d.struct({ a: d.field(d.string(), { name: "x" }) }))).not.toThrow();
    expect(() => schema.prepare(d.struct({ a: d.string() }))).toThrow("No field for props: x on struct {a:string}");
    expect(() => schema.prepare(d.struct({ x: d.string() }))).toThrow(
      "Struct schema is bound to {a:string} and cannot be reused for {x:string}",
    );
  });

  it("refuses non-struct destinations", () => {
    expect(() => struct().prepare(d.array(d.string()))).toThrow("Struct schema wants a struct type, not string[]");
  });
});
