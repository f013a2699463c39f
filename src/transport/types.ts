import type { OutgoingRequest } from '../core/types.js';

/** Transport that only offers a blocking send; the client awaits it before returning. */
export interface SyncTransport {
  /** Absent or `false`; async dispatch against this transport fails with a CapabilityError. */
  readonly async?: false;
  /** Sends the request; rejects (or throws) on any transport-level failure. */
  send(request: OutgoingRequest): Promise<Response>;
}

/** Transport that also offers a non-blocking send returning a deferred handle. */
export interface AsyncCapableTransport {
  readonly async: true;
  send(request: OutgoingRequest): Promise<Response>;
  /** Starts the request and returns at once; the deferred settles with the response or the transport's error. */
  sendAsync(request: OutgoingRequest): PromiseLike<Response>;
}

/** Any transport the client can be built with. */
export type Transport = SyncTransport | AsyncCapableTransport;

/** Capability probe for non-blocking sends. */
export function isAsyncCapable(transport: Transport): transport is AsyncCapableTransport {
  return transport.async === true;
}
