// debounce delays execution of fn until after waitMs have elapsed since the
// last call.
type Fn = (...args: never[]) => unknown;
export function debounce<T extends Fn>(func: T, waitMs: number): (...args: Parameters<T>) => void {
  let timeoutId: NodeJS.Timeout | undefined;

  return (...args: Parameters<T>) => {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
    timeoutId = setTimeout(() => {
      func(...args);
    }, waitMs);
  };
}

// length of the literal common prefix of two strings.
export function countSameStartingCharacters(a: string, b: string): number {
  let i = 0;
  for (; i < a.length && i < b.length; ++i) {
    if (a.charAt(i) !== b.charAt(i)) {
      break;
    }
  }
  return i;
}

// returns the items whose key has not been seen before, keeping the first of each.
export function distinctBy<T, K>(items: readonly T[], keyOf: (item: T) => K): T[] {
  const seen = new Set<K>();
  const result: T[] = [];
  for (const item of items) {
    const key = keyOf(item);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    result.push(item);
  }
  return result;
}
