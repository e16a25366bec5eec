/**
 * Run-time context entries keyed by a value type's `typeTag`.
 *
 * Shared by every value of that type within one runtime. Entries are not
 * guarded: a host running dispatches from several workers must serialise
 * writes itself.
 */
export class ContextRegistry {
  private entries = new Map<string, string[]>();

  /** Live entry list for a tag. First access initialises it to empty. */
  get(typeTag: string): string[] {
    let list = this.entries.get(typeTag);
    if (!list) {
      list = [];
      this.entries.set(typeTag, list);
    }
    return list;
  }

  add(typeTag: string, ...items: string[]): void {
    this.get(typeTag).push(...items);
  }

  set(typeTag: string, items: string[]): void {
    this.entries.set(typeTag, [...items]);
  }

  clear(typeTag?: string): void {
    if (typeTag === undefined) {
      this.entries.clear();
    } else {
      this.entries.set(typeTag, []);
    }
  }

  tags(): string[] {
    return Array.from(this.entries.keys());
  }

  render(typeTag: string): string {
    const joined = this.get(typeTag).join('\n');
    return joined ? `\n[DYNAMIC CONTEXT]\n${joined}` : '';
  }
}

export function renderStaticContext(text: string): string {
  return text ? `\n[STATIC CONTEXT]\n${text}` : '';
}
