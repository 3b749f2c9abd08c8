import { describe, it, expect } from "vitest";

import { d } from "../../dest/index.js";
import { minLen } from "../../validators/index.js";
import { enumOf, integer, slice, string } from "../index.js";
import { runSchema } from "./helpers.js";

describe("enumOf()", () => {
  it("accepts allowed values", async () => {
    const { issues, value } = await runSchema(enumOf(string(), "red", "green"), d.string(), '"red"');
    expect(issues).toEqual([]);
    expect(value).toBe("red");
  });

  it("lists the allowed values on a mismatch", async () => {
    expect((await runSchema(enumOf(string(), "red", "green"), d.string(), '"blue"')).issues).toEqual([
      { path: "/v", message: "Must be one of: red,green" },
    ]);
    expect((await runSchema(enumOf(integer(), 1, 2), d.int32(), "3")).issues).toEqual([
      { path: "/v", message: "Must be one of: 1,2" },
    ]);
  });

  it("passes the wrapped schema's issues through unchanged", async () => {
    expect((await runSchema(enumOf(string(minLen(10)), "red"), d.string(), '"red"')).issues).toEqual([
      { path: "/v", message: "Must be at least 10 characters long" },
    ]);
  });

  it("compares structurally", async () => {
    const schema = () => enumOf(slice(integer()), [1, 2], [3]);
    expect((await runSchema(schema(), d.array(d.int32()), "[3]")).issues).toEqual([]);
    expect((await runSchema(schema(), d.array(d.int32()), "[1]")).issues).toEqual([
      { path: "/v", message: "Must be one of: 1,2,3" },
    ]);
  });

  it("checks the allowed values against the destination type", () => {
    expect(() => enumOf(integer(), 1, "a").prepare(d.int32())).toThrow("Enum value a is not a valid int32");
  });
});
