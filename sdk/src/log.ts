import type { WarnFn } from './types/bundling'

/**
 * Default warning sink: one prefixed line on stderr.
 */
export const stderrWarn: WarnFn = (message) => {
  process.stderr.write(`[bundlekit] ${message}\n`)
}
