/**
 * Core entrypoint: exports the client, its transports and request types.
 * Import from here if you only need the client/types without error helpers.
 * @module
 */

/**
 * Client that:
 * - merges configuration from defaults and caller overrides,
 * - builds authenticated JSON requests,
 * - dispatches them blocking or deferred through an injected transport.
 *
 * Request methods return error-first tuples via {@link SafeWrapAsync} or {@link SafeWrap}.
 */
export { LIBRARY_VERSION, MailClient, USER_AGENT } from './client.js';

/** Defaults every client starts from. */
export { DEFAULT_OPTIONS } from './options.js';

export type { ClientInput, HeaderOptions, MailClientOptions, MailConfig, OutgoingRequest, Payload } from './types.js';

/** Default transport over the WHATWG fetch API. */
export { FetchTransport, type FetchTransportOptions } from '../transport/fetchTransport.js';

export {
  type AsyncCapableTransport,
  isAsyncCapable,
  type SyncTransport,
  type Transport,
} from '../transport/types.js';

export { MailPromise, type MailPromiseState } from '../response/mailPromise.js';

export { MailResponse } from '../response/mailResponse.js';

export { ResourceBase } from '../resources/resourceBase.js';

export {
  type Address,
  type AddressInput,
  formatTransmission,
  type Recipient,
  type TransmissionContent,
  type TransmissionPayload,
  Transmissions,
} from '../resources/transmissions.js';

export type { Logger } from '../utils/logger.js';

export type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';
