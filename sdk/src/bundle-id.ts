import { MissingFieldError } from './errors'
import { resolveFieldPath } from './fields'
import type { BundleId } from './types/bundling'

/**
 * Compute the bundle id of `request` from its discriminator fields.
 *
 * Fields may use `.` to reach into nested objects (`'logName'`,
 * `'resource.labels.zone'`). Values are stringified so that requests whose
 * fields print the same land in the same bundle; null and undefined map to
 * null.
 *
 * @throws MissingFieldError if any field, or any segment of a nested path,
 *   does not exist on the request
 */
export function computeBundleId(request: object, fields: readonly string[]): BundleId {
  return fields.map((field) => {
    const resolved = resolveFieldPath(request, field)
    if (!resolved.ok) {
      throw new MissingFieldError(resolved.path, resolved.segment)
    }
    return resolved.value === null || resolved.value === undefined
      ? null
      : String(resolved.value)
  })
}

/**
 * Canonical string form of a bundle id, used as the executor's registry key.
 */
export function bundleKey(id: BundleId): string {
  return JSON.stringify(id)
}
