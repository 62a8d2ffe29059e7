import { isWellFormedWord, normalizeWord } from "../../shared/wordValidation.js";
import type { PersistenceGateway } from "./persistence.js";

export class DictionaryUnavailableError extends Error {
  readonly dictionaryId: string;

  constructor(dictionaryId: string, reason: string, options?: { cause?: unknown }) {
    super(`Dictionary "${dictionaryId}" is unavailable: ${reason}`, options);
    this.name = "DictionaryUnavailableError";
    this.dictionaryId = dictionaryId;
  }
}

export interface WordOracle {
  isValid(word: string, dictionaryId: string): Promise<boolean>;
  clearCache(): void;
  cacheSize(): number;
}

type WordOracleOptions = {
  dictionary: Pick<PersistenceGateway, "loadDictionaryEntry">;
  cacheSize: number;
  timeoutMs: number;
};

function lookupWithTimeout(
  lookup: () => Promise<boolean>,
  dictionaryId: string,
  timeoutMs: number
): Promise<boolean> {
  return new Promise<boolean>((resolve, reject) => {
    const timeout = setTimeout(() => {
      reject(new DictionaryUnavailableError(dictionaryId, `lookup timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    Promise.resolve()
      .then(lookup)
      .then(
        (value) => {
          clearTimeout(timeout);
          resolve(value);
        },
        (error: unknown) => {
          clearTimeout(timeout);
          const reason = error instanceof Error ? error.message : String(error);
          reject(new DictionaryUnavailableError(dictionaryId, reason, { cause: error }));
        }
      );
  });
}

export function createWordOracle({ dictionary, cacheSize, timeoutMs }: WordOracleOptions): WordOracle {
  // Map iteration order doubles as recency order: oldest entry first.
  const cache = new Map<string, boolean>();

  function remember(key: string, value: boolean) {
    if (cacheSize <= 0) return;
    cache.delete(key);
    cache.set(key, value);
    while (cache.size > cacheSize) {
      const oldest = cache.keys().next();
      if (oldest.done) break;
      cache.delete(oldest.value);
    }
  }

  return {
    async isValid(word, dictionaryId) {
      const normalized = normalizeWord(word);
      if (!isWellFormedWord(normalized)) return false;

      const key = `${dictionaryId}:${normalized}`;
      const cached = cache.get(key);
      if (cached !== undefined) {
        remember(key, cached);
        return cached;
      }

      const valid = await lookupWithTimeout(
        () => dictionary.loadDictionaryEntry(dictionaryId, normalized),
        dictionaryId,
        timeoutMs
      );
      remember(key, valid);
      return valid;
    },

    clearCache() {
      cache.clear();
    },

    cacheSize() {
      return cache.size;
    }
  };
}
