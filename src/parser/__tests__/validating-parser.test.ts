import { describe, it, expect, vi } from "vitest";

import { d } from "../../dest/index.js";
import {
  DestinationError,
  InputTooLargeError,
  JsonSyntaxError,
  SchemaPrepareError,
  ValidationFailedError,
} from "../../errors.js";
import type { LogEntry } from "../../logging.js";
import type { ByteReader } from "../../ports/byte-reader.port.js";
import { integer, prop, slice, string, struct } from "../../schema/index.js";
import { max, min, minLen } from "../../validators/index.js";
import { createParser, tryCreateParser } from "../validating-parser.js";

// =============================================================================
// Helpers
// =============================================================================

const Person = d.struct({
  Name: d.string(),
  Age: d.int32(),
  Email: d.optional(d.string()),
  Tags: d.array(d.string()),
});

const personSchema = () =>
  struct(
    prop("Name", string(minLen(1))),
    prop("Age", integer(min(0))),
    prop("Email", string()),
    prop("Tags", slice(string())),
  );

const personParser = () => createParser(Person, personSchema());

async function* chunks(parts: string[]): AsyncIterable<string> {
  for (const part of parts) yield part;
}

const END_OF_INPUT = [{ path: "/", message: "Unexpected end of input" }];

// =============================================================================
// Decoding
// =============================================================================

describe("ValidatingParser.parse", () => {
  it("decodes a valid document", async () => {
    const result = await personParser().parse('{"Name":"Ann","Age":42,"Tags":["x"]}');
    expect(result).toEqual({
      success: true,
      data: { Name: "Ann", Age: 42, Email: undefined, Tags: ["x"] },
    });
  });

  it("returns issues together with the partial data", async () => {
    const result = await personParser().parse('{"Name":"","Age":-1,"Email":"e"}');
    expect(result).toEqual({
      success: false,
      issues: [
        { path: "/Name", message: "Must be at least 1 characters long" },
        { path: "/Age", message: "Must be greater than or equal to 0" },
        { path: "/Tags", message: "Property is required" },
      ],
      data: { Name: "", Age: 0, Email: "e", Tags: [] },
    });
  });

  it("decodes documents split into arbitrary chunks", async () => {
    const parser = createParser(Person, personSchema(), { readSize: 16 });
    const result = await parser.parse(chunks(['{"Na', 'me":"A', 'nn","Age":4', '2,"Tags":["x"]}']));
    expect(result.success).toBe(true);
    expect(result.data).toEqual({ Name: "Ann", Age: 42, Email: undefined, Tags: ["x"] });
  });

  it("decodes into array roots", async () => {
    const parser = createParser(d.array(d.int64()), slice(integer(max(5))));
    expect(await parser.parse("[1,7,3]")).toEqual({
      success: false,
      issues: [{ path: "/1/", message: "Must be less than or equal to 5" }],
      data: [1n, 0n, 3n],
    });
  });

  it("serves concurrent parses independently", async () => {
    const parser = personParser();
    const [a, b] = await Promise.all([
      parser.parse(chunks(['{"Name":"A",', '"Age":1,"Tags":[]}'])),
      parser.parse(chunks(['{"Name":"B",', '"Age":2,"Tags":["t"]}'])),
    ]);
    expect(a.data).toEqual({ Name: "A", Age: 1, Email: undefined, Tags: [] });
    expect(b.data).toEqual({ Name: "B", Age: 2, Email: undefined, Tags: ["t"] });
  });
});

describe("ValidatingParser.parseInto", () => {
  it("reuses the destination without leaking earlier documents", async () => {
    const parser = personParser();
    const dest = Person.zero();

    const first = await parser.parseInto('{"Name":"","Age":1,"Tags":["a","b","c"]}', dest);
    expect(first).toEqual([{ path: "/Name", message: "Must be at least 1 characters long" }]);

    const second = await parser.parseInto('{"Name":"B","Age":2,"Tags":["z"]}', dest);
    expect(second).toEqual([]);
    expect(dest).toEqual({ Name: "B", Age: 2, Email: undefined, Tags: ["z"] });
  });

  it("resets fields the next document leaves out", async () => {
    const parser = personParser();
    const dest = Person.zero();

    await parser.parseInto('{"Name":"A","Age":1,"Email":"old@example.com","Tags":["a"]}', dest);
    const issues = await parser.parseInto('{"Name":"B","Tags":[]}', dest);
    expect(issues).toEqual([{ path: "/Age", message: "Property is required" }]);
    expect(dest).toEqual({ Name: "B", Age: 0, Email: undefined, Tags: [] });
  });

  it("rejects destinations of another type", async () => {
    await expect(
      personParser().parseInto("{}", { Name: "A", Age: 1.5, Email: undefined, Tags: [] }),
    ).rejects.toBeInstanceOf(DestinationError);
  });
});

describe("ValidatingParser.parseOrThrow", () => {
  it("returns the data of a valid document", async () => {
    const data = await personParser().parseOrThrow('{"Name":"A","Age":1,"Tags":[]}');
    expect(data.Name).toBe("A");
  });

  it("throws the issues of an invalid document", async () => {
    const error = await personParser()
      .parseOrThrow("{}")
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ValidationFailedError);
    expect(error).toMatchObject({
      message: "Validation failed: /Name: Property is required (and 2 more)",
      issues: [
        { path: "/Name", message: "Property is required" },
        { path: "/Age", message: "Property is required" },
        { path: "/Tags", message: "Property is required" },
      ],
    });
  });
});

// =============================================================================
// End of input, malformed input, reader failures
// =============================================================================

describe("ValidatingParser — end of input", () => {
  it("reports empty input as a single root issue", async () => {
    expect(await personParser().parse("")).toMatchObject({ success: false, issues: END_OF_INPUT });
    expect(await personParser().parse(" \n ")).toMatchObject({ success: false, issues: END_OF_INPUT });
  });

  it("reports a reader that only signals the end", async () => {
    const reader: ByteReader = { read: async () => null };
    expect(await personParser().parseInto(reader, Person.zero())).toEqual(END_OF_INPUT);
  });

  it("reports a truncated document as a single root issue", async () => {
    expect(await personParser().parseInto('{"Name":"A","Tags":["x"', Person.zero())).toEqual(END_OF_INPUT);
  });
});

describe("ValidatingParser — malformed input", () => {
  it("throws syntax errors with the byte offset", async () => {
    const error = await personParser()
      .parse('{"Name": tru}')
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(JsonSyntaxError);
    expect(error).toMatchObject({ message: "Expected 'true' (at byte 9)", offset: 9 });
  });

  it("rejects content after the top-level value", async () => {
    await expect(personParser().parse('{"Name":"A","Age":1,"Tags":[]} {}')).rejects.toThrow(
      "Unexpected '{' after the top-level value (at byte 31)",
    );
  });

  it("allows trailing content when configured", async () => {
    const parser = createParser(Person, personSchema(), { allowTrailingContent: true });
    expect((await parser.parse('{"Name":"A","Age":1,"Tags":[]} {}')).success).toBe(true);
  });

  it("accepts trailing whitespace", async () => {
    expect((await personParser().parse('{"Name":"A","Age":1,"Tags":[]} \n')).success).toBe(true);
  });

  it("rethrows reader failures unchanged", async () => {
    const failure = new Error("connection reset");
    const reader: ByteReader = {
      read: async () => {
        throw failure;
      },
    };
    await expect(personParser().parse(reader)).rejects.toBe(failure);
  });

  it("stops reading past maxBytes", async () => {
    const parser = createParser(Person, personSchema(), { maxBytes: 10 });
    await expect(parser.parse('{"Name":"Ann","Age":42,"Tags":[]}')).rejects.toBeInstanceOf(InputTooLargeError);
  });
});

// =============================================================================
// Construction
// =============================================================================

describe("createParser", () => {
  it("requires a struct or array destination", () => {
    expect(() => createParser(d.string(), string())).toThrow(
      new SchemaPrepareError("Destination must be a struct or array type, not string"),
    );
  });

  it("validates options", () => {
    expect(() => createParser(Person, personSchema(), { readSize: 8 })).toThrow(
      "Invalid parser options: readSize: Number must be greater than or equal to 16",
    );
  });
});

describe("tryCreateParser", () => {
  it("returns the parser", () => {
    const result = tryCreateParser(Person, personSchema());
    expect(result.success).toBe(true);
  });

  it("returns configuration errors instead of throwing", () => {
    const result = tryCreateParser(d.struct({ Name: d.string() }), struct(prop("Nope", string())));
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(SchemaPrepareError);
      expect(result.error.message).toBe("No field for props: Nope on struct {Name:string}");
    }
  });
});

// =============================================================================
// Logging
// =============================================================================

describe("ValidatingParser — logging", () => {
  it("logs lifecycle events at or above the configured level", async () => {
    const logger = vi.fn<(entry: LogEntry) => void>();
    const parser = createParser(Person, personSchema(), { logger, logLevel: "debug" });
    expect(logger).toHaveBeenLastCalledWith(
      expect.objectContaining({ level: "debug", event: "parser:ready", data: { type: Person.name } }),
    );

    await parser.parse("{}");
    expect(logger).toHaveBeenLastCalledWith(
      expect.objectContaining({ level: "info", event: "parse:invalid", data: { issues: 3, bytesRead: 2 } }),
    );

    await parser.parse('{"Name":"A","Age":1,"Tags":[]}');
    expect(logger).toHaveBeenLastCalledWith(
      expect.objectContaining({ level: "debug", event: "parse:ok", data: { bytesRead: 30 } }),
    );
  });

  it("logs fatal errors with their code", async () => {
    const logger = vi.fn<(entry: LogEntry) => void>();
    const parser = createParser(Person, personSchema(), { logger });
    expect(logger).not.toHaveBeenCalled();

    await expect(parser.parse("[")).rejects.toBeInstanceOf(JsonSyntaxError);
    expect(logger).toHaveBeenCalledTimes(1);
    expect(logger).toHaveBeenCalledWith(
      expect.objectContaining({
        level: "error",
        event: "parse:error",
        data: { code: "SYNTAX_ERROR", message: "Expected '{' not '[' (at byte 1)", bytesRead: 1 },
      }),
    );
  });
});
