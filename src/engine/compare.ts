export type Comparator<K> = (left: K, right: K) => number;

export type ComparableKey = number | bigint | string | boolean | Date | null | undefined;

type Primitive = number | bigint | string;

function isNil(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

function kindOf(value: unknown): string {
  if (value instanceof Date) {
    return 'date';
  }
  return typeof value === 'bigint' ? 'number' : typeof value;
}

function toPrimitive(value: unknown): Primitive {
  if (value instanceof Date) {
    return value.getTime();
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'string') {
    return value;
  }
  throw new TypeError(`${kindOf(value)} keys need an explicit comparator`);
}

function order(left: Primitive, right: Primitive): number {
  if (typeof left === 'string' && typeof right === 'string') {
    return left < right ? -1 : left > right ? 1 : 0;
  }
  if (typeof left !== 'string' && typeof right !== 'string') {
    return left < right ? -1 : left > right ? 1 : 0;
  }
  throw new TypeError('cannot compare string key with number key');
}

/**
 * Three-way comparison over {@link ComparableKey} values. `null` and
 * `undefined` sort first and compare equal to each other; numbers and
 * bigints compare numerically with each other. Mixing other kinds, NaN, or
 * object keys throws a `TypeError`.
 */
export function compareKeys(left: unknown, right: unknown): number {
  if (isNil(left) || isNil(right)) {
    if (isNil(left) === isNil(right)) {
      return 0;
    }
    return isNil(left) ? -1 : 1;
  }

  if (kindOf(left) !== kindOf(right)) {
    throw new TypeError(`cannot compare ${kindOf(left)} key with ${kindOf(right)} key`);
  }

  const a = toPrimitive(left);
  const b = toPrimitive(right);
  if (Number.isNaN(a) || Number.isNaN(b)) {
    throw new TypeError('NaN is not an orderable key');
  }

  return order(a, b);
}
