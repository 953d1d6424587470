// Bundle identity
export { bundleKey, computeBundleId } from './bundle-id'
// Completion handles
export type { CompletionHandle } from './completion'
export { createCompletionHandle } from './completion'
// Errors
export { BundledFieldError, CombinedCallError, errorMessage, MissingFieldError } from './errors'
// Executor
export type { BundleExecutor, ExecutorOptions } from './executor'
export { createBundleExecutor, DEFAULT_BUNDLE_OPTIONS, resolveBundleOptions } from './executor'
// Field access (for custom request/response handling)
export type { FieldResolution } from './fields'
export { readList, resolveFieldPath, withField } from './fields'
export { stderrWarn } from './log'
export { msgpackSize } from './size'
// Tasks (for custom executors)
export type { BundleTask, BundleTaskOptions } from './task'
export { createBundleTask, demuxMismatchMessage } from './task'
// Timers
export type { Timer, TimerHandle } from './timer'
export { systemTimer } from './timer'
export type {
  ApiCall,
  BundleDescriptor,
  BundleId,
  BundleOptions,
  BundleOutcome,
  CallOutcome,
  ListField,
  SizeEstimator,
  WarnFn
} from './types/bundling'
