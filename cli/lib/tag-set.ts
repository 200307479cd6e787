import { TAG_SOURCES, TagSource } from './types';

interface SourcedName {
  name: string;
  source: TagSource;
}

/**
 * Insertion-ordered, deduplicated set of tag names, partitioned by the source
 * that attached each name. A name attached by several sources appears once in
 * the combined view and once in each source partition.
 */
export class TagSet implements Iterable<string> {
  private readonly names: string[] = [];
  private readonly partitions = new Map<TagSource, string[]>();

  private constructor(entries: Iterable<SourcedName>) {
    const seen = new Set<string>();
    for (const { name, source } of entries) {
      if (!seen.has(name)) {
        seen.add(name);
        this.names.push(name);
      }
      const partition = this.partitions.get(source) ?? [];
      if (!partition.includes(name)) {
        partition.push(name);
        this.partitions.set(source, partition);
      }
    }
  }

  static empty(): TagSet {
    return new TagSet([]);
  }

  static of(names: Iterable<string>, source: TagSource = 'user'): TagSet {
    return new TagSet(Array.from(names, name => ({ name, source })));
  }

  static fromLinks(links: Iterable<{ source: TagSource; tag: { name: string } }>): TagSet {
    return new TagSet(Array.from(links, link => ({ name: link.tag.name, source: link.source })));
  }

  get size(): number {
    return this.names.length;
  }

  has(name: string): boolean {
    return this.names.includes(name);
  }

  toArray(): string[] {
    return [...this.names];
  }

  bySource(source: TagSource): string[] {
    return [...(this.partitions.get(source) ?? [])];
  }

  sourcesOf(name: string): TagSource[] {
    return TAG_SOURCES.filter(source => this.partitions.get(source)?.includes(name));
  }

  /**
   * Membership equality; iteration order is not compared.
   */
  equals(other: TagSet): boolean {
    if (other.size !== this.size) return false;
    return this.names.every(name => other.has(name));
  }

  [Symbol.iterator](): Iterator<string> {
    return this.names[Symbol.iterator]();
  }
}
