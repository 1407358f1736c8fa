/** Undo handle returned by `checkpoint()` on every stateful component. */
export type Restore = () => void;

/** One restore that runs the given ones in reverse order. */
export function combineRestores(restores: readonly Restore[]): Restore {
	return () => {
		for (let i = restores.length - 1; i >= 0; i--) {
			restores[i]?.();
		}
	};
}

/**
 * Saves a map, or only the entry under `key`, and restores it in place so
 * that other holders of the map see the restored contents. Values must not
 * be undefined: an undefined entry restores as absent.
 */
export function checkpointMap<K, V>(map: Map<K, V>, key?: K): Restore {
	if (key === undefined) {
		const saved = new Map(map);
		return () => {
			map.clear();
			for (const [k, v] of saved) map.set(k, v);
		};
	}
	const saved = map.get(key);
	return () => {
		if (saved === undefined) {
			map.delete(key);
		} else {
			map.set(key, saved);
		}
	};
}
