// CHANGE: describe every container the codec can read pairs from
// WHY: maps, hash maps, tuple arrays, generators and bare iterators all reduce to one iterable shape
// QUOTE(TZ): n/a
// REF: n/a
// SOURCE: n/a
// FORMAT THEOREM: ∀c: pairs(adapt(c)) = pairs(c) in the same order
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: adapters are lazy and never copy the container
// COMPLEXITY: O(1) to adapt, O(n) to iterate

export type Pair<K, V> = readonly [K, V]

/**
 * Anything yielding pairs: Map, ReadonlyMap, effect HashMap, arrays of tuples,
 * Map.entries(), generators.
 */
export type PairSource<K, V> = Iterable<Pair<K, V>>

export interface Entry<K, V> {
  readonly key: K
  readonly value: V
}

/**
 * Wrap a bare iterator; the result can be iterated once.
 */
export const fromIterator = <K, V>(iterator: Iterator<Pair<K, V>>): PairSource<K, V> => ({
  [Symbol.iterator]: () => iterator
})

export function* fromEntries<K, V>(entries: Iterable<Entry<K, V>>): Generator<Pair<K, V>, void, undefined> {
  for (const entry of entries) {
    yield [entry.key, entry.value]
  }
}

// undefined members are skipped, as JSON.stringify skips them
export function* fromRecord<V>(
  record: { readonly [key: string]: V }
): Generator<Pair<string, V>, void, undefined> {
  for (const key of Object.keys(record)) {
    const value = record[key]
    if (value !== undefined) {
      yield [key, value]
    }
  }
}

export const isIterable = <A>(value: Iterable<A> | Iterator<A>): value is Iterable<A> =>
  Symbol.iterator in value
