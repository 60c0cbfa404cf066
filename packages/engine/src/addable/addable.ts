/**
 * Values that know how to fold a later increment into themselves. `concat`
 * throws a `TypeError` when it cannot take the other operand, in which case
 * {@link combine} keeps the right-hand value.
 */
export interface Addable<TOther, TResult = TOther> {
  concat(other: TOther): TResult;
}

const NOT_COMBINABLE = Symbol("not-combinable");

export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

export function isAddable(value: unknown): value is Addable<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    "concat" in value &&
    typeof value.concat === "function"
  );
}

const isEmpty = (value: unknown): value is null | undefined =>
  value === null || value === undefined;

/**
 * Key-wise merge: keys that are missing or `null` on the left are taken from
 * the right, keys present on both sides are combined, and a `null` on the
 * right never clears a value on the left.
 */
export function addRecords(
  left: Readonly<Record<string, unknown>>,
  right: Readonly<Record<string, unknown>>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...left };
  for (const [key, value] of Object.entries(right)) {
    const current = result[key];
    if (!Object.hasOwn(result, key) || current === null) {
      result[key] = value;
    } else if (!isEmpty(value)) {
      result[key] = combine(current, value);
    }
  }
  return result;
}

function combineNaturally(left: unknown, right: unknown): unknown {
  if (typeof left === "number" && typeof right === "number") {
    return left + right;
  }
  if (typeof left === "bigint" && typeof right === "bigint") {
    return left + right;
  }
  if (typeof left === "string" && typeof right === "string") {
    return left + right;
  }
  if (Array.isArray(left) && Array.isArray(right)) {
    return [ ...left, ...right ];
  }
  if (isPlainRecord(left) && isPlainRecord(right)) {
    return addRecords(left, right);
  }
  if (isAddable(left)) {
    try {
      return left.concat(right);
    } catch (error) {
      if (error instanceof TypeError) {
        return NOT_COMBINABLE;
      }
      throw error;
    }
  }
  return NOT_COMBINABLE;
}

export function combine<T>(left: T | null | undefined, right: T): T;
export function combine<T>(left: T, right: T | null | undefined): T;
export function combine(left: unknown, right: unknown): unknown;
export function combine(left: unknown, right: unknown): unknown {
  if (isEmpty(left)) {
    return right;
  }
  if (isEmpty(right)) {
    return left;
  }
  const combined = combineNaturally(left, right);
  return combined === NOT_COMBINABLE ? right : combined;
}

/** Folds the values left to right; `undefined` when there are none. */
export function addAll<T>(addables: Iterable<T>): T | undefined {
  let final: T | undefined;
  for (const chunk of addables) {
    final = final === undefined ? chunk : combine(final, chunk);
  }
  return final;
}

export async function addAllAsync<T>(
  addables: AsyncIterable<T>
): Promise<T | undefined> {
  let final: T | undefined;
  for await (const chunk of addables) {
    final = final === undefined ? chunk : combine<T>(final, chunk);
  }
  return final;
}
