import z from 'zod';
import type { MailClient } from '../core/client.js';
import type { HeaderOptions } from '../core/types.js';
import type { MailResponse } from '../response/mailResponse.js';
import { validator } from '../utils/validator.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { ResourceBase } from './resourceBase.js';

/** Expanded address. */
export interface Address {
  email: string;
  name?: string;
  /** Address shown in the To header instead of this one (used for cc and bcc copies). */
  header_to?: string;
}

/** Address object, or shorthand `"Name <email>"` / `"email"`. */
export type AddressInput = string | Address;

export interface Recipient {
  address: AddressInput;
  [key: string]: unknown;
}

export interface TransmissionContent {
  from?: AddressInput;
  headers?: Record<string, string>;
  [key: string]: unknown;
}

/** Transmission body; `cc` and `bcc` are folded into `recipients` before sending. */
export interface TransmissionPayload {
  recipients?: Recipient[] | { list_id: string };
  cc?: Recipient[];
  bcc?: Recipient[];
  content?: TransmissionContent;
  [key: string]: unknown;
}

const addressSchema = z.union([
  z.string().min(1),
  z.object({ email: z.string().min(1), name: z.string().optional(), header_to: z.string().optional() }).passthrough(),
]);

const recipientSchema = z.object({ address: addressSchema }).passthrough();

const transmissionSchema = z
  .object({
    recipients: z.union([z.array(recipientSchema), z.object({ list_id: z.string() }).passthrough()]).optional(),
    cc: z.array(recipientSchema).optional(),
    bcc: z.array(recipientSchema).optional(),
    content: z
      .object({ from: addressSchema.optional(), headers: z.record(z.string()).optional() })
      .passthrough()
      .optional(),
  })
  .passthrough()
  .refine(
    ({ recipients, cc, bcc }) => (!cc && !bcc) || (Array.isArray(recipients) && recipients.length > 0),
    { message: 'cc and bcc require at least one entry in recipients', path: ['recipients'] },
  );

/** `"Name" <email>`, `Name <email>` or `<email>` */
const SHORTHAND_ADDRESS = /^\s*"?([^"<]*?)"?\s*<(.+)>\s*$/;

/**
 * Expands a shorthand address into an address object; objects are returned as is.
 */
export function toAddress(address: AddressInput): Address {
  if (typeof address !== 'string') {
    return address;
  }

  const match = SHORTHAND_ADDRESS.exec(address);
  if (!match) {
    return { email: address.trim() };
  }

  const name = match[1].trim();
  const email = match[2].trim();
  return name ? { name, email } : { email };
}

/**
 * Renders an address for use in a header: `"Name" <email>` or just `email`.
 */
export function toAddressString(address: AddressInput): string {
  if (typeof address === 'string') {
    return address;
  }

  return address.name ? `"${address.name}" <${address.email}>` : address.email;
}

/**
 * Copies a cc/bcc list into recipients, pointing each copy's `header_to` at the primary recipient.
 */
function toCopies(list: Recipient[], headerTo: string): Recipient[] {
  return list.map((recipient) => ({
    ...recipient,
    address: { ...toAddress(recipient.address), header_to: headerTo },
  }));
}

/**
 * Reshapes a transmission payload into the form the API takes:
 * - `bcc` then `cc` entries are appended to `recipients`, each with `header_to` set to the first recipient,
 * - cc addresses are listed in the `CC` content header,
 * - shorthand addresses in `recipients` and `content.from` are expanded.
 *
 * The input is left untouched.
 */
export function formatTransmission(payload: TransmissionPayload): TransmissionPayload {
  const { cc, bcc, ...formatted } = payload;

  if (Array.isArray(formatted.recipients)) {
    const recipients = [...formatted.recipients];
    const [primary] = recipients;

    if (primary) {
      const headerTo = toAddressString(primary.address);
      recipients.push(...toCopies(bcc ?? [], headerTo), ...toCopies(cc ?? [], headerTo));
    }

    if (primary && cc?.length) {
      formatted.content = {
        ...formatted.content,
        headers: {
          ...formatted.content?.headers,
          CC: cc.map(({ address }) => toAddressString(address)).join(','),
        },
      };
    }

    formatted.recipients = recipients.map((recipient) => ({ ...recipient, address: toAddress(recipient.address) }));
  }

  if (formatted.content?.from !== undefined) {
    formatted.content = { ...formatted.content, from: toAddress(formatted.content.from) };
  }

  return formatted;
}

/**
 * Helpers for the `transmissions` endpoint.
 *
 * @example
 * const [err, response] = await client.transmissions.post({
 *   content: { from: 'Sender <sender@example.com>', subject: 'Hello', text: 'Hi there' },
 *   recipients: [{ address: 'receiver@example.com' }],
 *   cc: [{ address: 'copy@example.com' }],
 * });
 */
export class Transmissions extends ResourceBase {
  /** Binds the helpers to a client */
  constructor(client: MailClient) {
    super(client, 'transmissions');
  }

  /**
   * Validates and reshapes the payload (see {@link formatTransmission}), then POSTs it.
   * @returns A promise resolving to `[error, response]`; a malformed payload yields a ValidationError without sending.
   */
  async post<T = unknown>(
    payload: TransmissionPayload = {},
    headers?: HeaderOptions,
  ): SafeWrapAsync<Error, MailResponse<T>> {
    const [errValidate] = await validator(payload, transmissionSchema);
    if (errValidate) {
      return [errValidate, null];
    }

    return super.post<T>(formatTransmission(payload), headers);
  }
}
