/**
 * Paths that bypass enforcement. An entry ending in `*` matches every path
 * starting with the text before the `*`; any other entry matches exactly.
 */
export class SkipList {
  private readonly exact: ReadonlySet<string>;
  private readonly prefixes: readonly string[];

  constructor(entries: readonly string[]) {
    const exact = new Set<string>();
    const prefixes: string[] = [];
    for (const entry of entries) {
      if (entry.endsWith('*')) {
        prefixes.push(entry.slice(0, -1));
      } else {
        exact.add(entry);
      }
    }
    this.exact = exact;
    this.prefixes = Object.freeze(prefixes);
  }

  matches(path: string): boolean {
    return this.exact.has(path) || this.prefixes.some((prefix) => path.startsWith(prefix));
  }
}
