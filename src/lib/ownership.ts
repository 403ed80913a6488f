import path from 'path';

type TrieNode<T> = {
  children: Map<string, TrieNode<T>>;
  value?: T;
};

function segments(p: string): string[] {
  return path.resolve(p).split(path.sep).filter(Boolean);
}

/**
 * Maps directories to values and answers "which directory owns this path" by
 * longest ancestor prefix. Matching is per path segment, so `/ws/core2` is not
 * owned by `/ws/core`.
 */
export class OwnershipIndex<T> {
  private readonly root: TrieNode<T> = { children: new Map() };
  private readonly entries = new Map<string, T>();

  get size(): number {
    return this.entries.size;
  }

  insert(directory: string, value: T) {
    let node = this.root;
    for (const segment of segments(directory)) {
      let next = node.children.get(segment);
      if (!next) {
        next = { children: new Map() };
        node.children.set(segment, next);
      }
      node = next;
    }
    node.value = value;
    this.entries.set(path.resolve(directory), value);
  }

  lookupOwner(p: string): T | undefined {
    let node = this.root;
    let owner = node.value;
    for (const segment of segments(p)) {
      const next = node.children.get(segment);
      if (!next) break;
      node = next;
      if (node.value !== undefined) owner = node.value;
    }
    return owner;
  }

  values(): T[] {
    return Array.from(this.entries.values());
  }
}
