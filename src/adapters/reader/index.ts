import type { ByteReader } from "../../ports/byte-reader.port.js";
import { BytesReader } from "./bytes-reader.adapter.js";
import { IterableReader } from "./iterable-reader.adapter.js";
import type { ChunkSource } from "./iterable-reader.adapter.js";

/** Anything a parser accepts as a document. */
export type ParseInput = ByteReader | ChunkSource | Uint8Array | string;

export function toByteReader(input: ParseInput): ByteReader {
  if (typeof input === "string" || input instanceof Uint8Array) return new BytesReader(input);
  // Node streams also have a `read` method, with different semantics
  if (isChunkSource(input)) return new IterableReader(input);
  return input;
}

function isChunkSource(input: ByteReader | ChunkSource): input is ChunkSource {
  return Symbol.asyncIterator in input;
}

export { BytesReader, IterableReader };
export type { ChunkSource };
