/**
 * @module persistent-collections
 * Immutable collections with structural sharing and Value Semantics:
 * HashTrieMap, HashTrieSet, List and Stack, plus the hashable Tuple.
 */

export { HashTrieMap, type HashTrieOptions } from './hash-trie-map';
export { HashTrieSet } from './hash-trie-set';
export { List } from './list';
export { Stack } from './stack';
export { Tuple } from './tuple';
export { KeyNotFoundError, EmptyCollectionError, UnhashableValueError } from './errors';
export { hashValue, areEqual, defaultHasher, isHashable, type Hashable, type Hasher } from './hash';
export { formatValue } from './format';
