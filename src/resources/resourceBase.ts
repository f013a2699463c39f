import type { MailClient } from '../core/client.js';
import type { HeaderOptions, Payload } from '../core/types.js';
import type { MailResponse } from '../response/mailResponse.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/**
 * Endpoint helper bound to a fixed path below `/api/{version}/`.
 * Every call is routed through {@link MailClient.request}, so it follows the client's dispatch mode.
 */
export class ResourceBase {
  /** Client requests are routed through */
  protected readonly client: MailClient;
  /** Path segment of this resource, e.g. `transmissions` */
  readonly endpoint: string;

  /** Binds the resource to a client and endpoint */
  constructor(client: MailClient, endpoint: string) {
    this.client = client;
    this.endpoint = endpoint;
  }

  /** GET `{endpoint}/{uri}`; the payload becomes the query string */
  get<T = unknown>(uri = '', payload: Payload = {}, headers?: HeaderOptions): SafeWrapAsync<Error, MailResponse<T>> {
    return this.request<T>('GET', uri, payload, headers);
  }

  /** PUT `{endpoint}/{uri}` with a JSON body */
  put<T = unknown>(uri = '', payload: Payload = {}, headers?: HeaderOptions): SafeWrapAsync<Error, MailResponse<T>> {
    return this.request<T>('PUT', uri, payload, headers);
  }

  /** POST `{endpoint}` with a JSON body */
  post<T = unknown>(payload: Payload = {}, headers?: HeaderOptions): SafeWrapAsync<Error, MailResponse<T>> {
    return this.request<T>('POST', '', payload, headers);
  }

  /** DELETE `{endpoint}/{uri}` */
  delete<T = unknown>(uri = '', payload: Payload = {}, headers?: HeaderOptions): SafeWrapAsync<Error, MailResponse<T>> {
    return this.request<T>('DELETE', uri, payload, headers);
  }

  /** Sends any method to `{endpoint}` or `{endpoint}/{uri}` */
  request<T = unknown>(
    method: string,
    uri = '',
    payload: Payload = {},
    headers?: HeaderOptions,
  ): SafeWrapAsync<Error, MailResponse<T>> {
    const path = uri ? `${this.endpoint}/${uri.replace(/^\//, '')}` : this.endpoint;
    return this.client.request<T>(method, path, payload, headers);
  }
}
