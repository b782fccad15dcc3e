/**
 * Every ordering of `items`, in lexicographic order of the input positions,
 * produced one at a time
 *
 * Duplicate items are treated as distinct positions.
 */
export function* permutations<T>(items: readonly T[]): Generator<T[]> {
  if (items.length <= 1) {
    yield [...items]
    return
  }

  for (const [index, head] of items.entries()) {
    const rest = [...items.slice(0, index), ...items.slice(index + 1)]
    for (const tail of permutations(rest)) {
      yield [head, ...tail]
    }
  }
}

/**
 * Inclusive integer range as words, `wordRange(5n, 9n)` → `[5n, 6n, 7n, 8n, 9n]`
 */
export function wordRange(start: bigint, end: bigint): bigint[] {
  const result: bigint[] = []
  for (let value = start; value <= end; value++) {
    result.push(value)
  }
  return result
}
