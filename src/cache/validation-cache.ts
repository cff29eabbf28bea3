import { createHash } from "node:crypto";
import { LRUCache } from "lru-cache";
import type { CitationStyleId } from "../styles/types.js";
import type { ValidationResult } from "../validate.js";

export interface CacheStats {
	size: number;
	maxSize: number;
	hits: number;
	misses: number;
}

/** Content hash of a validation request: same style and same paragraphs, same key. */
export function validationCacheKey(style: CitationStyleId, paragraphs: readonly string[]): string {
	const hash = createHash("sha256");
	hash.update(style);
	for (const paragraph of paragraphs) {
		hash.update("\u0000");
		hash.update(paragraph);
	}
	return hash.digest("hex");
}

/**
 * Bounded store of validation results. Owned by whoever creates it and passed
 * to the tools that use it; there is no module-level instance.
 */
export class ValidationCache {
	private readonly cache: LRUCache<string, ValidationResult>;
	private hitCount = 0;
	private missCount = 0;

	constructor(maxEntries = 200) {
		this.cache = new LRUCache<string, ValidationResult>({ max: maxEntries });
	}

	get(key: string): ValidationResult | undefined {
		const result = this.cache.get(key);
		if (result !== undefined) {
			this.hitCount++;
		} else {
			this.missCount++;
		}
		return result;
	}

	set(key: string, result: ValidationResult): void {
		this.cache.set(key, result);
	}

	stats(): CacheStats {
		return {
			size: this.cache.size,
			maxSize: this.cache.max,
			hits: this.hitCount,
			misses: this.missCount,
		};
	}

	clear(): void {
		this.cache.clear();
		this.hitCount = 0;
		this.missCount = 0;
	}
}
