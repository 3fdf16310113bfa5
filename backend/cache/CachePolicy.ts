// Cache policy: explicit TTLs and bounded sizes.
//
// Notes:
// - Caches are process-local and must be invalidated when dependencies change.
// - EngineConfig overrides these defaults at the composition root.

export const CACHE_POLICY = {
  // Dependency resolution (ResolutionCache)
  resolution: {
    ttlMs: 60_000,
    maxEntries: 10_000,
  },
} as const;
