/**
 * Transport request/response shapes carried through an operation stack.
 *
 * Serializers fill in a NatsRequest; the transport sends it as one NATS
 * request and hands back the reply as a NatsResponse.
 */

import { headers, type MsgHdrs } from "nats";

export class NatsRequest {
  subject = "";
  headers: MsgHdrs = headers();
  data: Uint8Array = new Uint8Array();
}

export interface NatsResponse {
  data: Uint8Array;
  headers?: MsgHdrs;
}

export function isNatsRequest(value: unknown): value is NatsRequest {
  return value instanceof NatsRequest;
}

export function isNatsResponse(value: unknown): value is NatsResponse {
  return typeof value === "object" && value !== null && "data" in value && value.data instanceof Uint8Array;
}
