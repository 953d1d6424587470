/**
 * Shared types for the bundling engine.
 *
 * Requests and responses are opaque objects. The engine only reads a list
 * field off a request, writes the merged list back, and (optionally) slices
 * a list field off the response.
 */

/**
 * Keys of `T` whose values are lists.
 */
export type ListField<T> = {
  [K in keyof T]-?: T[K] extends readonly unknown[] | undefined ? K : never
}[keyof T] &
  string

/**
 * The single physical call performed once per bundle.
 * May return the response directly or a promise of it.
 */
export type ApiCall<Req extends object, Resp extends object> = (
  request: Req
) => Resp | Promise<Resp>

/**
 * Describes the structure of a bundled call.
 */
export type BundleDescriptor<Req extends object, Resp extends object> = {
  /** Request field holding the list of individual messages to merge. */
  readonly bundledField: ListField<Req>
  /** Optional response field holding one sub-result per bundled message. */
  readonly subresponseField?: ListField<Resp>
}

/**
 * Thresholds that decide when a bundle fires.
 * A value of 0 (the default) disables that trigger.
 */
export type BundleOptions = {
  /** Fire once this many messages are queued. */
  readonly messageCountThreshold?: number
  /** Fire once the estimated byte size of queued messages reaches this. */
  readonly messageBytesizeThreshold?: number
  /** Fire this many milliseconds after the bundle is created. */
  readonly delayThresholdMs?: number
}

/**
 * Bundle identity: one stringified value per discriminator field,
 * or null where the field holds null/undefined.
 */
export type BundleId = readonly (string | null)[]

/**
 * Outcome of the combined call, as seen by the task.
 */
export type CallOutcome<Resp> =
  | { readonly ok: true; readonly response: Resp }
  | { readonly ok: false; readonly error: unknown }

/**
 * What a single caller receives once its bundle has run.
 */
export type BundleOutcome<Resp> =
  | { readonly ok: true; readonly response: Resp }
  | { readonly ok: false; readonly error: Error }

/**
 * Estimates the wire size of one message in bytes.
 */
export type SizeEstimator = (message: unknown) => number

/**
 * Sink for soft failures that are reported but not raised.
 */
export type WarnFn = (message: string) => void
