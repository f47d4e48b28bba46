const isPlainRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' &&
  value !== null &&
  !Array.isArray(value) &&
  !(value instanceof Date) &&
  !(value instanceof Map) &&
  !(value instanceof Set);

const compareArrays = (left: unknown[], right: unknown[]): boolean => {
  if (left.length !== right.length) return false;

  for (let i = 0; i < left.length; i++) {
    if (!deepEquals(left[i], right[i])) return false;
  }
  return true;
};

const compareMaps = (
  left: Map<unknown, unknown>,
  right: Map<unknown, unknown>,
): boolean => {
  if (left.size !== right.size) return false;

  for (const [key, value] of left) {
    if (!right.has(key) || !deepEquals(value, right.get(key))) return false;
  }
  return true;
};

const compareSets = (left: Set<unknown>, right: Set<unknown>): boolean => {
  if (left.size !== right.size) return false;

  for (const leftItem of left) {
    if (right.has(leftItem)) continue;

    let found = false;
    for (const rightItem of right) {
      if (deepEquals(leftItem, rightItem)) {
        found = true;
        break;
      }
    }
    if (!found) return false;
  }
  return true;
};

const compareObjects = (
  left: Record<string, unknown>,
  right: Record<string, unknown>,
): boolean => {
  const keys1 = Object.keys(left);
  const keys2 = Object.keys(right);

  if (keys1.length !== keys2.length) {
    return false;
  }

  for (const key of keys1) {
    if (left[key] instanceof Function && right[key] instanceof Function) {
      continue;
    }

    if (!(key in right) || !deepEquals(left[key], right[key])) {
      return false;
    }
  }

  return true;
};

export const deepEquals = (left: unknown, right: unknown): boolean => {
  if (left === right) return true;

  if (Array.isArray(left))
    return Array.isArray(right) && compareArrays(left, right);

  if (left instanceof Date)
    return right instanceof Date && left.getTime() === right.getTime();

  if (left instanceof Map)
    return right instanceof Map && compareMaps(left, right);

  if (left instanceof Set)
    return right instanceof Set && compareSets(left, right);

  if (isPlainRecord(left))
    return isPlainRecord(right) && compareObjects(left, right);

  return false;
};
