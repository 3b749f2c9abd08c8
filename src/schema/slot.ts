import type { Slot } from "../ports/schema.port.js";

export function keySlot(target: Record<string, unknown>, key: string): Slot {
  return {
    get: () => target[key],
    set: (value) => {
      target[key] = value;
    },
  };
}

export function indexSlot(target: unknown[], index: number): Slot {
  return {
    get: () => target[index],
    set: (value) => {
      target[index] = value;
    },
  };
}
