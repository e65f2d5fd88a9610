import type { SentinelRegistry } from "./sentinel.js"
import { sentinels } from "./sentinel.js"
import type { ToDynamic } from "./to-dynamic.js"
import { makeToDynamic } from "./to-dynamic.js"
import type { ToJson } from "./to-json.js"
import { makeToJson } from "./to-json.js"

// CHANGE: bind both mapping directions to one explicitly constructed sentinel registry
// WHY: sentinel identity is captured at construction instead of read from module state
// QUOTE(TZ): n/a
// REF: req-mapper-1
// SOURCE: n/a
// FORMAT THEOREM: ∀v representable without markers: toDynamic(toJson(v)) = v
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: both directions share the same registry and depth limit
// COMPLEXITY: O(1)/O(1)

export const DEFAULT_MAX_DEPTH = 1024

export interface ValueMapper {
  readonly registry: SentinelRegistry
  readonly maxDepth: number
  readonly toDynamic: ToDynamic
  readonly toJson: ToJson
}

export interface MapperSettings {
  readonly maxDepth?: number
}

export const makeValueMapper = (
  registry: SentinelRegistry = sentinels,
  { maxDepth = DEFAULT_MAX_DEPTH }: MapperSettings = {}
): ValueMapper => ({
  registry,
  maxDepth,
  toDynamic: makeToDynamic(registry, maxDepth),
  toJson: makeToJson(registry, maxDepth)
})
