/** Index of a distinct identifier text in an {@link IdentNameInterner}. */
export type IdentTextId = number;

/**
 * Deduplicates identifier text. Each distinct spelling is stored once and
 * keeps the id it was first given for the lifetime of the interner.
 */
export class IdentNameInterner {
  private readonly texts: string[] = [];
  private readonly idsByText = new Map<string, IdentTextId>();

  get size(): number {
    return this.texts.length;
  }

  insert(text: string): IdentTextId {
    const existing = this.idsByText.get(text);
    if (existing !== undefined) {
      return existing;
    }

    const id = this.texts.length;
    this.texts.push(text);
    this.idsByText.set(text, id);
    return id;
  }

  has(text: string): boolean {
    return this.idsByText.has(text);
  }

  textOf(id: IdentTextId): string {
    const text = this.texts[id];
    if (text === undefined) {
      throw new RangeError(`identifier text ${id} does not exist`);
    }

    return text;
  }

  sameText(first: IdentTextId, second: IdentTextId): boolean {
    this.textOf(first);
    this.textOf(second);
    return first === second;
  }

  /** Ids whose text equals `text` exactly. Never inserts. */
  *lookup(text: string): IterableIterator<IdentTextId> {
    const id = this.idsByText.get(text);
    if (id !== undefined) {
      yield id;
    }
  }
}
