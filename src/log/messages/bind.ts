/**
 * Bind operation fields
 */

import type { FieldAccessor } from "../accessor.js";
import { defineField, FIELDS } from "../fields.js";

export interface BindRequestFields {
  /** LDAP protocol version as logged, e.g. "3" */
  readonly protocolVersion: string | null;
  readonly authenticationType: string | null;
  readonly dn: string | null;
  readonly saslMechanismName: string | null;
}

export interface AuthenticationFailureReason {
  readonly id: number | null;
  readonly name: string | null;
  readonly message: string | null;
}

export interface BindResultFields {
  readonly authenticationDN: string | null;
  readonly authorizationDN: string | null;
  readonly authenticationFailureReason: AuthenticationFailureReason | null;
  readonly retiredPasswordUsed: boolean | null;
  readonly clientConnectionPolicy: string | null;
}

const FAILURE_REASON_FIELDS = {
  id: defineField("id", "integer"),
  name: defineField("name", "string"),
  message: defineField("message", "string"),
} as const;

export function decodeBindRequestFields(accessor: FieldAccessor): BindRequestFields {
  return {
    protocolVersion: accessor.getString(FIELDS.version),
    authenticationType: accessor.getString(FIELDS.authType),
    dn: accessor.getString(FIELDS.dn),
    saslMechanismName: accessor.getString(FIELDS.saslMechanism),
  };
}

function decodeAuthenticationFailureReason(accessor: FieldAccessor): AuthenticationFailureReason | null {
  const reason = accessor.getObject(FIELDS.authenticationFailureReason);
  if (!reason) return null;

  return Object.freeze({
    id: reason.getInteger(FAILURE_REASON_FIELDS.id),
    name: reason.getString(FAILURE_REASON_FIELDS.name),
    message: reason.getString(FAILURE_REASON_FIELDS.message),
  });
}

export function decodeBindResultFields(accessor: FieldAccessor): BindResultFields {
  return {
    authenticationDN: accessor.getString(FIELDS.authenticationDN),
    authorizationDN: accessor.getString(FIELDS.authorizationDN),
    authenticationFailureReason: decodeAuthenticationFailureReason(accessor),
    retiredPasswordUsed: accessor.getBoolean(FIELDS.retiredPasswordUsed),
    clientConnectionPolicy: accessor.getString(FIELDS.clientConnectionPolicy),
  };
}
