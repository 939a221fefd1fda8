// ---------------------------------------------------------------------------
// LRU Cache
// ---------------------------------------------------------------------------
//
// Bounded by entry count, with an optional time-to-live. A `Map` keeps
// insertion order, so the first key is always the least recently used.
// ---------------------------------------------------------------------------

export interface LruCacheOptions {
	/** Maximum number of entries. `0` disables caching. Defaults to `500`. */
	readonly maxEntries?: number;
	/** Entries older than this are treated as misses. Unbounded when omitted. */
	readonly ttlMs?: number;
	/** Clock override for tests. */
	readonly now?: () => number;
}

export interface LruCache<K, V> {
	/** Get a cached value, promoting it to most-recently-used. */
	readonly get: (key: K) => V | undefined;
	readonly has: (key: K) => boolean;
	/** Store a value, evicting the least-recently-used entry when full. */
	readonly set: (key: K, value: V) => void;
	readonly delete: (key: K) => boolean;
	readonly clear: () => void;
	readonly size: number;
	readonly hits: number;
	readonly misses: number;
}

interface Slot<V> {
	readonly value: V;
	readonly storedAt: number;
}

export function createLruCache<K, V>(
	options?: LruCacheOptions,
): LruCache<K, V> {
	const maxEntries = Math.max(0, options?.maxEntries ?? 500);
	const ttlMs = options?.ttlMs;
	const now = options?.now ?? Date.now;

	const slots = new Map<K, Slot<V>>();
	let hits = 0;
	let misses = 0;

	const isExpired = (slot: Slot<V>): boolean =>
		ttlMs !== undefined && now() - slot.storedAt >= ttlMs;

	function evict(): void {
		while (slots.size > maxEntries) {
			const first = slots.keys().next();
			if (first.done) break;
			slots.delete(first.value);
		}
	}

	function lookup(key: K): Slot<V> | undefined {
		const slot = slots.get(key);
		if (slot === undefined) return undefined;
		if (isExpired(slot)) {
			slots.delete(key);
			return undefined;
		}
		return slot;
	}

	const cache: LruCache<K, V> = {
		get(key: K): V | undefined {
			const slot = lookup(key);
			if (slot === undefined) {
				misses++;
				return undefined;
			}
			hits++;
			slots.delete(key);
			slots.set(key, slot);
			return slot.value;
		},

		has(key: K): boolean {
			return lookup(key) !== undefined;
		},

		set(key: K, value: V): void {
			if (maxEntries === 0) return;
			slots.delete(key);
			slots.set(key, { value, storedAt: now() });
			evict();
		},

		delete(key: K): boolean {
			return slots.delete(key);
		},

		clear(): void {
			slots.clear();
			hits = 0;
			misses = 0;
		},

		get size() {
			return slots.size;
		},

		get hits() {
			return hits;
		},

		get misses() {
			return misses;
		},
	};

	return Object.freeze(cache);
}
