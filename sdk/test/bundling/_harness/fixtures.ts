/**
 * Request/response shapes used across the bundling tests.
 */
import type { BundleDescriptor } from '../../../src/types/bundling'

export type PublishRequest = {
  topic: string
  messages: string[]
  labels?: { region: string; tier?: number | null }
}

export type PublishResponse = {
  messageIds: string[]
  server: string
}

export const PUBLISH: BundleDescriptor<PublishRequest, PublishResponse> = {
  bundledField: 'messages'
}

export const PUBLISH_DEMUX: BundleDescriptor<PublishRequest, PublishResponse> = {
  bundledField: 'messages',
  subresponseField: 'messageIds'
}

export function publishRequest(topic: string, ...messages: string[]): PublishRequest {
  return { topic, messages }
}

/**
 * Answer a publish with one id per message: `${topic}:${message}`.
 */
export function echoIds(request: PublishRequest): PublishResponse {
  return {
    messageIds: request.messages.map((message) => `${request.topic}:${message}`),
    server: 'test-server'
  }
}

/** Size estimator counting one byte per character of a string message. */
export function charSize(message: unknown): number {
  return typeof message === 'string' ? message.length : 0
}
