/**
 * Fully merged client configuration. Only these keys are recognized; anything else passed
 * to the client is dropped.
 */
export interface MailConfig {
  /** API hostname. */
  host: string;
  /** URL scheme, without `://`. */
  protocol: string;
  /** Port appended to the host; a falsy value leaves the port segment out of the URL. */
  port: number | false | null;
  /** API key, sent verbatim as the `Authorization` header. */
  key: string;
  /** API version segment, e.g. `v1`. */
  version: string;
  /** Dispatch through the transport's non-blocking `sendAsync` when true. */
  async: boolean;
}

/** Partial overrides of {@link MailConfig}. */
export type MailClientOptions = Partial<MailConfig>;

/** Constructor input: a bare API key, or a map of option overrides. */
export type ClientInput = string | MailClientOptions;

/** Caller payload; query parameters for GET, JSON body for every other method. */
export type Payload = Record<string, unknown>;

/** Header containers accepted from callers. */
export type HeaderOptions = Headers | Array<[string, string]> | Record<string, string | null | undefined>;

/** Transport-ready request produced by `MailClient.buildRequest`. */
export interface OutgoingRequest {
  /** Trimmed, uppercased HTTP method. */
  method: string;
  /** Absolute URL, including the query string for GET requests. */
  url: string;
  /** Header map; one value per name. */
  headers: Record<string, string>;
  /** JSON-encoded body, present for every method. */
  body: string;
}

