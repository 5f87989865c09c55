/**
 * Connection-scoped messages
 */

import type { FieldAccessor } from "../accessor.js";
import type { DecodeContext } from "../context.js";
import { decodeCertificateChain } from "../decoders/certificate.js";
import type { Certificate } from "../decoders/certificate.js";
import { decodeNameValuePairs } from "../decoders/name-value.js";
import { FIELDS } from "../fields.js";
import { decodeCommonFields, frozen } from "./base.js";
import type { AccessLogMessageBase } from "./base.js";

/** A client established a connection */
export interface ConnectMessage extends AccessLogMessageBase {
  readonly messageType: "CONNECT";
  readonly sourceAddress: string | null;
  readonly sourcePort: number | null;
  readonly targetAddress: string | null;
  readonly targetPort: number | null;
  readonly protocolName: string | null;
  readonly clientConnectionPolicy: string | null;
}

/** A connection was closed */
export interface DisconnectMessage extends AccessLogMessageBase {
  readonly messageType: "DISCONNECT";
  readonly disconnectReason: string | null;
  readonly disconnectMessage: string | null;
}

/** TLS or SASL security was negotiated on a connection */
export interface SecurityNegotiationMessage extends AccessLogMessageBase {
  readonly messageType: "SECURITY_NEGOTIATION";
  readonly protocol: string | null;
  readonly cipher: string | null;
  readonly negotiationProperties: ReadonlyMap<string, string>;
}

/** A client presented a certificate chain */
export interface ClientCertificateMessage extends AccessLogMessageBase {
  readonly messageType: "CLIENT_CERTIFICATE";
  /** Peer certificate first, then its issuers */
  readonly peerCertificateChain: readonly Certificate[];
  readonly autoAuthenticatedAsDN: string | null;
}

export function decodeConnectMessage(accessor: FieldAccessor): ConnectMessage {
  return frozen({
    ...decodeCommonFields(accessor, "CONNECT"),
    sourceAddress: accessor.getString(FIELDS.fromAddress),
    sourcePort: accessor.getInteger(FIELDS.fromPort),
    targetAddress: accessor.getString(FIELDS.toAddress),
    targetPort: accessor.getInteger(FIELDS.toPort),
    protocolName: accessor.getString(FIELDS.protocol),
    clientConnectionPolicy: accessor.getString(FIELDS.clientConnectionPolicy),
  });
}

export function decodeDisconnectMessage(accessor: FieldAccessor): DisconnectMessage {
  return frozen({
    ...decodeCommonFields(accessor, "DISCONNECT"),
    disconnectReason: accessor.getString(FIELDS.disconnectReason),
    disconnectMessage: accessor.getString(FIELDS.message),
  });
}

export function decodeSecurityNegotiationMessage(accessor: FieldAccessor): SecurityNegotiationMessage {
  return frozen({
    ...decodeCommonFields(accessor, "SECURITY_NEGOTIATION"),
    protocol: accessor.getString(FIELDS.protocol),
    cipher: accessor.getString(FIELDS.cipher),
    negotiationProperties: decodeNameValuePairs(accessor, FIELDS.negotiationProperties, "negotiation property"),
  });
}

export function decodeClientCertificateMessage(accessor: FieldAccessor, ctx: DecodeContext): ClientCertificateMessage {
  return frozen({
    ...decodeCommonFields(accessor, "CLIENT_CERTIFICATE"),
    peerCertificateChain: decodeCertificateChain(accessor, FIELDS.certificateChain, ctx),
    autoAuthenticatedAsDN: accessor.getString(FIELDS.autoAuthenticatedAs),
  });
}
