import * as HashMap from "effect/HashMap"

import type { Pair } from "./sources.js"

// CHANGE: describe collections that can be built pair by pair
// WHY: decoding picks its container at the call site, the codec only calls add/build
// QUOTE(TZ): n/a
// REF: n/a
// SOURCE: n/a
// FORMAT THEOREM: ∀ps: build(addAll(make(), ps)) contains every p ∈ ps subject to the container's key rules
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: each make() returns an independent builder
// COMPLEXITY: O(1) per add (amortized)

export interface PairBuilder<K, V, C> {
  readonly add: (key: K, value: V) => void
  readonly build: () => C
}

export interface PairTarget<K, V, C> {
  readonly make: () => PairBuilder<K, V, C>
}

/**
 * Map target; keys compare by reference (SameValueZero), later duplicates win.
 */
export const mapTarget = <K, V>(): PairTarget<K, V, Map<K, V>> => ({
  make: () => {
    const map = new Map<K, V>()
    return {
      add: (key, value) => {
        map.set(key, value)
      },
      build: () => map
    }
  }
})

/**
 * Ordered target; keeps every pair including duplicates.
 */
export const vecTarget = <K, V>(): PairTarget<K, V, Array<Pair<K, V>>> => ({
  make: () => {
    const pairs: Array<Pair<K, V>> = []
    return {
      add: (key, value) => {
        pairs.push([key, value])
      },
      build: () => pairs
    }
  }
})

/**
 * Effect HashMap target; keys implementing Equal (Data.struct, Data.Class) compare structurally.
 */
export const hashMapTarget = <K, V>(): PairTarget<K, V, HashMap.HashMap<K, V>> => ({
  make: () => {
    const map = HashMap.beginMutation(HashMap.empty<K, V>())
    return {
      add: (key, value) => {
        HashMap.set(map, key, value)
      },
      build: () => HashMap.endMutation(map)
    }
  }
})
