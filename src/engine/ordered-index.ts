import { mathRandomSource, type RandomSource } from '../utils/prng.js';
import { compareKeys, type Comparator } from './compare.js';
import { IndexConfigurationError } from './errors.js';

interface LinkHolder<K, V> {
  forwards: Array<SkipNode<K, V> | null>;
}

interface SkipNode<K, V> extends LinkHolder<K, V> {
  readonly key: K;
  value: V;
}

export interface IndexEntry<K, V> {
  key: K;
  value: V;
}

export interface OrderedIndexOptions<K> {
  /** Highest level a node may reach; levels run `0..=maxLevel`. */
  maxLevel?: number;
  promotionProbability?: number;
  compare?: Comparator<K>;
  random?: RandomSource;
}

function createNode<K, V>(key: K, value: V, level: number): SkipNode<K, V> {
  return {
    key,
    value,
    forwards: Array.from({ length: level + 1 }, () => null),
  };
}

/**
 * Skip list keyed by a single three-way comparator. The header holds no key
 * and is never compared, so it sits below every key the caller inserts.
 */
export class OrderedIndex<K, V> {
  static readonly DEFAULT_MAX_LEVEL = 16;
  static readonly DEFAULT_PROMOTION_PROBABILITY = 0.5;

  readonly maxLevel: number;
  readonly promotionProbability: number;

  private readonly head: LinkHolder<K, V>;
  private readonly compare: Comparator<K>;
  private readonly random: RandomSource;
  private level = 0;
  private count = 0;

  constructor(options: OrderedIndexOptions<K> = {}) {
    const maxLevel = options.maxLevel ?? OrderedIndex.DEFAULT_MAX_LEVEL;
    if (!Number.isInteger(maxLevel) || maxLevel < 0) {
      throw new IndexConfigurationError('maxLevel', maxLevel, 'a non-negative integer');
    }

    const probability = options.promotionProbability ?? OrderedIndex.DEFAULT_PROMOTION_PROBABILITY;
    if (!Number.isFinite(probability) || probability <= 0 || probability >= 1) {
      throw new IndexConfigurationError('promotionProbability', probability, 'a number in (0, 1)');
    }

    this.maxLevel = maxLevel;
    this.promotionProbability = probability;
    // Object keys need their own comparator; compareKeys rejects them.
    this.compare = options.compare ?? compareKeys;
    this.random = options.random ?? mathRandomSource;
    this.head = { forwards: Array.from({ length: maxLevel + 1 }, () => null) };
  }

  /** Highest level holding at least one node (0 when empty). */
  get currentLevel(): number {
    return this.level;
  }

  size(): number {
    return this.count;
  }

  search(key: K): V | undefined {
    return this.find(key)?.value;
  }

  has(key: K): boolean {
    return this.find(key) !== null;
  }

  /** Top level of the node holding `key`, or -1 when absent. */
  levelOf(key: K): number {
    const node = this.find(key);
    return node ? node.forwards.length - 1 : -1;
  }

  insert(key: K, value: V): void {
    const update = this.predecessors(key);

    const existing = update[0].forwards[0];
    if (existing && this.compare(existing.key, key) === 0) {
      existing.value = value;
      return;
    }

    const nodeLevel = this.randomLevel();
    if (nodeLevel > this.level) {
      for (let i = this.level + 1; i <= nodeLevel; i += 1) {
        update[i] = this.head;
      }
      this.level = nodeLevel;
    }

    const node = createNode(key, value, nodeLevel);
    for (let i = 0; i <= nodeLevel; i += 1) {
      node.forwards[i] = update[i].forwards[i];
      update[i].forwards[i] = node;
    }

    this.count += 1;
  }

  delete(key: K): boolean {
    const update = this.predecessors(key);

    const target = update[0].forwards[0];
    if (!target || this.compare(target.key, key) !== 0) {
      return false;
    }

    for (let i = 0; i <= this.level; i += 1) {
      if (update[i].forwards[i] !== target) {
        break;
      }
      update[i].forwards[i] = target.forwards[i];
    }

    while (this.level > 0 && !this.head.forwards[this.level]) {
      this.level -= 1;
    }

    this.count -= 1;
    return true;
  }

  first(): IndexEntry<K, V> | null {
    const node = this.head.forwards[0];
    return node ? { key: node.key, value: node.value } : null;
  }

  *entries(limit?: number): Generator<IndexEntry<K, V>, void, undefined> {
    let cursor = this.head.forwards[0];
    let yielded = 0;

    while (cursor) {
      if (limit !== undefined && yielded >= limit) {
        return;
      }

      yield { key: cursor.key, value: cursor.value };
      yielded += 1;
      cursor = cursor.forwards[0];
    }
  }

  toOrderedEntries(): Array<[K, V]> {
    const result: Array<[K, V]> = [];
    for (let cursor = this.head.forwards[0]; cursor; cursor = cursor.forwards[0]) {
      result.push([cursor.key, cursor.value]);
    }
    return result;
  }

  /** Per-level listing, top level first. Debugging aid only. */
  dumpStructure(format: (key: K, value: V) => string = defaultFormat): string {
    const lines: string[] = [];
    for (let i = this.level; i >= 0; i -= 1) {
      const cells: string[] = [];
      for (let cursor = this.head.forwards[i]; cursor; cursor = cursor.forwards[i]) {
        cells.push(format(cursor.key, cursor.value));
      }
      lines.push(`Level ${i}: ${cells.join(' ')}`.trimEnd());
    }
    return lines.join('\n');
  }

  randomLevel(): number {
    let level = 0;
    while (this.draw() < this.promotionProbability && level < this.maxLevel) {
      level += 1;
    }
    return level;
  }

  private draw(): number {
    const value = this.random.nextFloat();
    if (!(value >= 0 && value < 1)) {
      throw new IndexConfigurationError('random', value, 'draws in [0, 1)');
    }
    return value;
  }

  private find(key: K): SkipNode<K, V> | null {
    let cursor: LinkHolder<K, V> = this.head;

    for (let i = this.level; i >= 0; i -= 1) {
      let next = cursor.forwards[i];
      while (next && this.compare(next.key, key) < 0) {
        cursor = next;
        next = cursor.forwards[i];
      }
    }

    const candidate = cursor.forwards[0];
    if (candidate && this.compare(candidate.key, key) === 0) {
      return candidate;
    }
    return null;
  }

  /** Last node before `key` at each level `0..=currentLevel`. */
  private predecessors(key: K): Array<LinkHolder<K, V>> {
    const update: Array<LinkHolder<K, V>> = Array.from({ length: this.maxLevel + 1 }, () => this.head);
    let cursor: LinkHolder<K, V> = this.head;

    for (let i = this.level; i >= 0; i -= 1) {
      let next = cursor.forwards[i];
      while (next && this.compare(next.key, key) < 0) {
        cursor = next;
        next = cursor.forwards[i];
      }
      update[i] = cursor;
    }

    return update;
  }
}

function defaultFormat(key: unknown, value: unknown): string {
  return `(${String(key)}, ${String(value)})`;
}
