/**
 * Client certificate chain decoding
 *
 * Certificates are often produced by third parties and do not always
 * conform. A field that cannot be decoded is set to null and the rest of
 * the certificate and chain are kept. The subject and issuer DNs are the
 * exception: without them an element is not a certificate.
 */

import type { FieldAccessor } from "../accessor.js";
import type { DecodeContext } from "../context.js";
import { AccessLogError, FieldFormatError } from "../errors.js";
import { defineField } from "../fields.js";
import type { FieldDescriptor } from "../fields.js";

export interface Certificate {
  readonly subjectDN: string;
  readonly issuerDN: string;
  readonly certificateType: string | null;
  readonly notBefore: Date | null;
  readonly notAfter: Date | null;
  readonly serialNumber: string | null;
  readonly signatureAlgorithm: string | null;
}

const CERTIFICATE_FIELDS = {
  subject: defineField("subject", "string"),
  issuerSubject: defineField("issuerSubject", "string"),
  type: defineField("type", "string"),
  notBefore: defineField("notBefore", "date"),
  notAfter: defineField("notAfter", "date"),
  serialNumber: defineField("serialNumber", "string"),
  signatureAlgorithm: defineField("signatureAlgorithm", "string"),
} as const;

/** Read one optional field, degrading a decoding failure to null */
function tolerant<T>(accessor: FieldAccessor, field: FieldDescriptor, ctx: DecodeContext, read: () => T | null): T | null {
  try {
    return read();
  } catch (error) {
    if (!(error instanceof AccessLogError)) throw error;
    ctx.logger?.warn("Ignoring undecodable certificate field", {
      component: "decoder",
      field: accessor.qualify(field.name),
      errorCode: error.code,
      reason: error.message,
    });
    return null;
  }
}

function requiredDN(accessor: FieldAccessor, field: FieldDescriptor<"string">): string {
  const value = accessor.getString(field);
  if (value === null) {
    throw new FieldFormatError(accessor.qualify(field.name), "distinguished name", "certificate DN is missing");
  }
  return value;
}

export function decodeCertificate(accessor: FieldAccessor, ctx: DecodeContext): Certificate {
  const f = CERTIFICATE_FIELDS;
  return Object.freeze({
    subjectDN: requiredDN(accessor, f.subject),
    issuerDN: requiredDN(accessor, f.issuerSubject),
    certificateType: tolerant(accessor, f.type, ctx, () => accessor.getString(f.type)),
    notBefore: tolerant(accessor, f.notBefore, ctx, () => accessor.getDate(f.notBefore)),
    notAfter: tolerant(accessor, f.notAfter, ctx, () => accessor.getDate(f.notAfter)),
    serialNumber: tolerant(accessor, f.serialNumber, ctx, () => accessor.getString(f.serialNumber)),
    signatureAlgorithm: tolerant(accessor, f.signatureAlgorithm, ctx, () => accessor.getString(f.signatureAlgorithm)),
  });
}

/** Decode an ordered certificate chain, peer certificate first */
export function decodeCertificateChain(
  accessor: FieldAccessor,
  field: FieldDescriptor<"objectList">,
  ctx: DecodeContext
): readonly Certificate[] {
  return Object.freeze(accessor.getObjectList(field).map((element) => decodeCertificate(element, ctx)));
}
