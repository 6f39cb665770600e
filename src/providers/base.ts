import { type SourceStream } from '../types/events.js';
import { type GenerationRequest } from '../types/request.js';

/**
 * An upstream generation backend.
 *
 * `streamText` resolves once the upstream accepted the request and the
 * stream is open, or rejects with a ProviderError. Failures after that
 * arrive in-band as `error` events. Closing the returned stream cancels
 * the upstream call.
 */
export interface StreamProvider {
  readonly name: string;
  streamText(request: GenerationRequest, signal: AbortSignal): Promise<SourceStream>;
}
