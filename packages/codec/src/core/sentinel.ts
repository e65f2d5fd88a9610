// CHANGE: model the null/as-array/as-object markers as identity-only tokens
// WHY: explicit JSON null and container intent must survive a round trip through tables
// QUOTE(TZ): "null" | "array" | "object"
// REF: req-sentinel-1
// SOURCE: n/a
// FORMAT THEOREM: ∀r: r.null ≠ r.asArray ≠ r.asObject ∧ String(r.null) = `${ns}.null`
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: tokens are frozen and compared by reference only
// COMPLEXITY: O(1)/O(1)

export type SentinelKind = "null" | "as_array" | "as_object"

export class Sentinel {
  constructor(readonly kind: SentinelKind, readonly label: string) {
    Object.freeze(this)
  }

  toString(): string {
    return this.label
  }
}

export interface SentinelRegistry {
  readonly null: Sentinel
  readonly asArray: Sentinel
  readonly asObject: Sentinel
}

export const makeSentinelRegistry = (namespace = "tablejson"): SentinelRegistry =>
  Object.freeze({
    null: new Sentinel("null", `${namespace}.null`),
    asArray: new Sentinel("as_array", `${namespace}.as_array`),
    asObject: new Sentinel("as_object", `${namespace}.as_object`)
  })

export const sentinels: SentinelRegistry = makeSentinelRegistry()

export const NULL = sentinels.null
export const AS_ARRAY = sentinels.asArray
export const AS_OBJECT = sentinels.asObject

export const isSentinel = (value: unknown): value is Sentinel => value instanceof Sentinel
