/** Unique function-reference names seen across a run. The run coordinator is the only writer. */
export class FunctionCatalog {
  private readonly names = new Set<string>();

  merge(names: Iterable<string>): void {
    for (const name of names) {
      this.names.add(name);
    }
  }

  get size(): number {
    return this.names.size;
  }

  sorted(): string[] {
    return [...this.names].sort();
  }
}
