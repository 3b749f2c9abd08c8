/** The path a container hands to its children: always ends in `/`. */
export function containerPath(path: string): string {
  return path.endsWith("/") ? path : `${path}/`;
}

/** Path of the element at `index`, e.g. `/items/0/`. */
export function elementPath(path: string, index: number): string {
  return `${containerPath(path)}${index}/`;
}
