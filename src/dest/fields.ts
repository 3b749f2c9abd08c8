// =============================================================================
// Field Resolution — Flatten a struct descriptor into its JSON-visible fields
// =============================================================================

import { FieldSpec, unwrapOptional } from "./types.js";
import type { AnyDestType, StructShape, StructType } from "./types.js";

/** One hop from a struct object to one of its members. */
export interface FieldStep {
  readonly key: string;
  /** Declared type of the member, optional layer included. */
  readonly type: AnyDestType;
}

export interface ResolvedField {
  /** The JSON name this field answers to. */
  readonly name: string;
  /** Keys to follow from the outer struct: embedded hops first, the field last. */
  readonly steps: readonly FieldStep[];
  /** Declared type of the field itself, optional layer included. */
  readonly type: AnyDestType;
  readonly depth: number;
  readonly tagged: boolean;
}

interface PendingStruct {
  readonly struct: StructType<StructShape>;
  readonly steps: readonly FieldStep[];
}

const cache = new WeakMap<StructType<StructShape>, readonly ResolvedField[]>();

/**
 * Every field a JSON key can address, in declaration order.
 *
 * Embedded structs contribute their fields one level deeper. For each name
 * the shallowest candidates win; at equal depth a single tagged field wins
 * over untagged ones; any other tie hides the name altogether.
 */
export function resolveFields(struct: StructType<StructShape>): readonly ResolvedField[] {
  const cached = cache.get(struct);
  if (cached) return cached;

  const candidates: ResolvedField[] = [];
  const visited = new Set<StructType<StructShape>>();
  let level: PendingStruct[] = [{ struct, steps: [] }];

  for (let depth = 0; level.length > 0; depth++) {
    const next: PendingStruct[] = [];

    for (const { struct: current, steps } of level) {
      if (visited.has(current)) continue;
      visited.add(current);

      for (const [key, member] of Object.entries(current.shape)) {
        const spec = member instanceof FieldSpec ? member : new FieldSpec(member);
        if (spec.tag === "-") continue;

        const step: FieldStep = { key, type: spec.type };
        const inner = unwrapOptional(spec.type);
        if (spec.embedded && inner.kind === "struct") {
          next.push({ struct: inner, steps: [...steps, step] });
          continue;
        }

        candidates.push({
          name: spec.tag ?? key,
          steps: [...steps, step],
          type: spec.type,
          depth,
          tagged: spec.tag !== undefined,
        });
      }
    }

    level = next;
  }

  const fields = pickDominant(candidates);
  cache.set(struct, fields);
  return fields;
}

function pickDominant(candidates: readonly ResolvedField[]): ResolvedField[] {
  const byName = new Map<string, ResolvedField[]>();
  for (const field of candidates) {
    const group = byName.get(field.name);
    if (group) group.push(field);
    else byName.set(field.name, [field]);
  }

  const fields: ResolvedField[] = [];
  for (const group of byName.values()) {
    const depth = Math.min(...group.map((f) => f.depth));
    const shallowest = group.filter((f) => f.depth === depth);
    if (shallowest.length === 1) {
      fields.push(shallowest[0]);
      continue;
    }
    const tagged = shallowest.filter((f) => f.tagged);
    if (tagged.length === 1) fields.push(tagged[0]);
  }
  return fields;
}
