/**
 * Unit tests for embedded sub-object decoders
 */

import { describe, it, expect, vi } from "vitest";
import { FieldAccessor } from "../../src/log/accessor.js";
import { createDecodeContext } from "../../src/log/context.js";
import { decodeAssuredReplicationRequirements, decodeServerAssuranceResults } from "../../src/log/decoders/assurance.js";
import { decodeCertificateChain } from "../../src/log/decoders/certificate.js";
import {
  decodeInterServerRequestControls,
  decodeIntermediateClientRequestControl,
  decodeIntermediateClientResponseControl,
  decodeOperationPurposeRequestControl,
} from "../../src/log/decoders/controls.js";
import { decodeEndpoint } from "../../src/log/decoders/endpoint.js";
import { decodeNameValuePairs } from "../../src/log/decoders/name-value.js";
import { decodeResultCode, resultCodeForName, resultCodeForValue } from "../../src/log/decoders/result-code.js";
import { FieldFormatError, InvalidOptionError } from "../../src/log/errors.js";
import { FIELDS } from "../../src/log/fields.js";
import type { JsonObject } from "../../src/log/types.js";

function nestedRequestControl(depth: number): JsonObject {
  let control: JsonObject = { clientName: `hop-${depth}` };
  for (let level = depth - 1; level >= 1; level--) {
    control = { clientName: `hop-${level}`, downstreamRequest: control };
  }
  return control;
}

describe("certificate chain", () => {
  const chain: JsonObject[] = [
    {
      subject: "CN=client.example.com,O=Example",
      issuerSubject: "CN=Example Issuing CA,O=Example",
      type: "X.509",
      notBefore: "not a date",
      notAfter: "2030-01-01T00:00:00Z",
      serialNumber: "0a:1b:2c",
      signatureAlgorithm: "SHA256withRSA",
    },
    {
      subject: "CN=Example Issuing CA,O=Example",
      issuerSubject: "CN=Example Root CA,O=Example",
      notBefore: "2020-01-01T00:00:00Z",
      notAfter: "2040-01-01T00:00:00Z",
    },
  ];

  it("nulls only the field that fails to decode", () => {
    const warn = vi.fn();
    const ctx = createDecodeContext({ logger: { debug: vi.fn(), warn } });
    const certificates = decodeCertificateChain(new FieldAccessor({ certificateChain: chain }), FIELDS.certificateChain, ctx);

    expect(certificates).toHaveLength(2);
    expect(certificates[0]).toEqual({
      subjectDN: "CN=client.example.com,O=Example",
      issuerDN: "CN=Example Issuing CA,O=Example",
      certificateType: "X.509",
      notBefore: null,
      notAfter: new Date("2030-01-01T00:00:00Z"),
      serialNumber: "0a:1b:2c",
      signatureAlgorithm: "SHA256withRSA",
    });
    expect(certificates[1].notBefore).toEqual(new Date("2020-01-01T00:00:00Z"));
    expect(certificates[1].certificateType).toBeNull();

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      "Ignoring undecodable certificate field",
      expect.objectContaining({ field: "certificateChain[0].notBefore", errorCode: "FIELD_FORMAT" })
    );
  });

  it("degrades a field of the wrong kind", () => {
    const certificates = decodeCertificateChain(
      new FieldAccessor({ certificateChain: [{ subject: "CN=a", issuerSubject: "CN=b", serialNumber: ["x"] }] }),
      FIELDS.certificateChain,
      createDecodeContext()
    );

    expect(certificates[0].serialNumber).toBeNull();
    expect(certificates[0].subjectDN).toBe("CN=a");
  });

  it("requires the subject and issuer DNs", () => {
    expect(() =>
      decodeCertificateChain(
        new FieldAccessor({ certificateChain: [{ issuerSubject: "CN=b" }] }),
        FIELDS.certificateChain,
        createDecodeContext()
      )
    ).toThrow('Access log record field "certificateChain[0].subject" is not a valid distinguished name');
  });

  it("freezes the chain and its certificates", () => {
    const certificates = decodeCertificateChain(
      new FieldAccessor({ certificateChain: chain }),
      FIELDS.certificateChain,
      createDecodeContext()
    );

    expect(Object.isFrozen(certificates)).toBe(true);
    expect(Object.isFrozen(certificates[0])).toBe(true);
  });
});

describe("intermediate client controls", () => {
  it("decodes a request control with an embedded downstream request", () => {
    const accessor = new FieldAccessor({
      intermediateClientRequestControl: {
        downstreamClientAddress: "10.0.0.5",
        downstreamClientSecure: true,
        clientIdentity: "dn:uid=app,ou=People,dc=example,dc=com",
        clientName: "Gateway",
        clientSessionID: "session-1",
        clientRequestID: "request-1",
        downstreamRequest: { downstreamClientAddress: "192.168.1.20", clientName: "Browser" },
      },
    });

    const control = decodeIntermediateClientRequestControl(
      accessor,
      FIELDS.intermediateClientRequestControl,
      createDecodeContext()
    );

    expect(control).toEqual({
      downstreamClientAddress: "10.0.0.5",
      downstreamClientSecure: true,
      clientIdentity: "dn:uid=app,ou=People,dc=example,dc=com",
      clientName: "Gateway",
      clientSessionID: "session-1",
      clientRequestID: "request-1",
      downstreamRequest: {
        downstreamClientAddress: "192.168.1.20",
        downstreamClientSecure: null,
        clientIdentity: null,
        clientName: "Browser",
        clientSessionID: null,
        clientRequestID: null,
        downstreamRequest: null,
      },
    });
  });

  it("decodes a response control with an embedded upstream response", () => {
    const accessor = new FieldAccessor({
      intermediateClientResponseControl: {
        upstreamServerAddress: "ds1.example.com",
        upstreamServerSecure: "false",
        serverName: "Directory Proxy",
        upstreamResponse: { serverName: "Directory Server", serverResponseID: "r-9" },
      },
    });

    const control = decodeIntermediateClientResponseControl(
      accessor,
      FIELDS.intermediateClientResponseControl,
      createDecodeContext()
    );

    expect(control?.upstreamServerSecure).toBe(false);
    expect(control?.serverName).toBe("Directory Proxy");
    expect(control?.upstreamResponse?.serverName).toBe("Directory Server");
    expect(control?.upstreamResponse?.serverResponseID).toBe("r-9");
    expect(control?.upstreamResponse?.upstreamResponse).toBeNull();
  });

  it("allows nesting up to the maximum depth", () => {
    const accessor = new FieldAccessor({ intermediateClientRequestControl: nestedRequestControl(3) });
    const control = decodeIntermediateClientRequestControl(
      accessor,
      FIELDS.intermediateClientRequestControl,
      createDecodeContext({ maxControlDepth: 3 })
    );

    expect(control?.downstreamRequest?.downstreamRequest?.clientName).toBe("hop-3");
  });

  it("rejects nesting beyond the maximum depth", () => {
    const accessor = new FieldAccessor({ intermediateClientRequestControl: nestedRequestControl(4) });

    expect(() =>
      decodeIntermediateClientRequestControl(
        accessor,
        FIELDS.intermediateClientRequestControl,
        createDecodeContext({ maxControlDepth: 3 })
      )
    ).toThrow(
      'Access log record field "intermediateClientRequestControl.downstreamRequest.downstreamRequest.downstreamRequest" is not a valid control: nesting exceeds the maximum depth of 3'
    );
  });

  it("decodes the operation purpose control", () => {
    const accessor = new FieldAccessor({
      operationPurposeRequestControl: {
        applicationName: "Sync",
        applicationVersion: "2.1",
        codeLocation: "sync.ts:42",
        requestPurpose: "nightly reconciliation",
      },
    });

    expect(decodeOperationPurposeRequestControl(accessor, FIELDS.operationPurposeRequestControl)).toEqual({
      applicationName: "Sync",
      applicationVersion: "2.1",
      codeLocation: "sync.ts:42",
      requestPurpose: "nightly reconciliation",
    });
  });

  it("returns null for absent controls", () => {
    const accessor = new FieldAccessor({});
    expect(decodeOperationPurposeRequestControl(accessor, FIELDS.operationPurposeRequestControl)).toBeNull();
    expect(
      decodeIntermediateClientRequestControl(accessor, FIELDS.intermediateClientRequestControl, createDecodeContext())
    ).toBeNull();
    expect(decodeInterServerRequestControls(accessor, FIELDS.interServerRequestControls)).toEqual([]);
  });

  it("decodes inter-server request controls in order", () => {
    const accessor = new FieldAccessor({
      interServerRequestControls: [
        {
          componentName: "proxy",
          operationPurpose: "route",
          properties: [
            { name: "backendSet", value: "east" },
            { name: "attempt", value: "2" },
          ],
        },
        { componentName: "sync" },
      ],
    });

    const controls = decodeInterServerRequestControls(accessor, FIELDS.interServerRequestControls);

    expect(controls).toEqual([
      {
        componentName: "proxy",
        operationPurpose: "route",
        properties: new Map([
          ["backendSet", "east"],
          ["attempt", "2"],
        ]),
      },
      { componentName: "sync", operationPurpose: null, properties: new Map() },
    ]);
    expect(Object.isFrozen(controls)).toBe(true);
    expect(Object.isFrozen(controls[0])).toBe(true);
  });

  it("qualifies a nameless inter-server property by its position", () => {
    const accessor = new FieldAccessor({
      interServerRequestControls: [{ componentName: "proxy", properties: [{ value: "east" }] }],
    });

    expect(() => decodeInterServerRequestControls(accessor, FIELDS.interServerRequestControls)).toThrow(
      'Access log record field "interServerRequestControls[0].properties[0].name" is not a valid inter-server request property: name is missing'
    );
  });
});

describe("decode context", () => {
  it("rejects a control depth below one", () => {
    expect(() => createDecodeContext({ maxControlDepth: 0 })).toThrow(InvalidOptionError);
    expect(() => createDecodeContext({ maxControlDepth: 0 })).toThrow(
      "Invalid maxControlDepth: 0. Must be a positive integer."
    );
  });

  it("rejects a fractional control depth", () => {
    expect(() => createDecodeContext({ maxControlDepth: 2.5 })).toThrow(InvalidOptionError);
  });

  it("accepts a depth of one", () => {
    expect(createDecodeContext({ maxControlDepth: 1 }).maxControlDepth).toBe(1);
  });
});

describe("assured replication", () => {
  it("decodes requirements", () => {
    const accessor = new FieldAccessor({
      assuredReplicationRequirements: {
        localAssuranceLevel: "processed-all-servers",
        remoteAssuranceLevel: "RECEIVED_ANY_REMOTE_LOCATION",
        assuranceTimeoutMillis: 5000,
        responseDelayedByAssurance: true,
        alteredByRequestControl: false,
      },
    });

    expect(decodeAssuredReplicationRequirements(accessor, FIELDS.assuredReplicationRequirements)).toEqual({
      localLevel: "PROCESSED_ALL_SERVERS",
      remoteLevel: "RECEIVED_ANY_REMOTE_LOCATION",
      timeoutMillis: 5000,
      responseDelayedByAssurance: true,
      alteredByRequestControl: false,
    });
  });

  it("leaves an unreported request control override absent", () => {
    const accessor = new FieldAccessor({ assuredReplicationRequirements: { localAssuranceLevel: "NONE" } });

    expect(decodeAssuredReplicationRequirements(accessor, FIELDS.assuredReplicationRequirements)).toMatchObject({
      alteredByRequestControl: null,
    });
  });

  it("rejects an unknown assurance level", () => {
    const accessor = new FieldAccessor({ assuredReplicationRequirements: { localAssuranceLevel: "EVERYWHERE" } });

    expect(() => decodeAssuredReplicationRequirements(accessor, FIELDS.assuredReplicationRequirements)).toThrow(
      'Access log record field "assuredReplicationRequirements.localAssuranceLevel" is not a valid local assurance level: "EVERYWHERE" is not recognized'
    );
  });

  it("decodes server results in order", () => {
    const accessor = new FieldAccessor({
      serverAssuranceResults: [
        { resultCode: "COMPLETE", replicationServerID: 1001, replicaID: 7 },
        { resultCode: "timeout", replicationServerID: "1002" },
      ],
    });

    expect(decodeServerAssuranceResults(accessor, FIELDS.serverAssuranceResults)).toEqual([
      { resultCode: "COMPLETE", replicationServerID: 1001, replicaID: 7 },
      { resultCode: "TIMEOUT", replicationServerID: 1002, replicaID: null },
    ]);
  });

  it("rejects an unknown server result code", () => {
    const accessor = new FieldAccessor({ serverAssuranceResults: [{ resultCode: "LOST" }] });

    expect(() => decodeServerAssuranceResults(accessor, FIELDS.serverAssuranceResults)).toThrow(FieldFormatError);
  });
});

describe("name/value pairs", () => {
  it("maps names to values with the last duplicate winning", () => {
    const accessor = new FieldAccessor({
      negotiationProperties: [
        { name: "tlsSessionID", value: "abc" },
        { name: "peerHost", value: "client.example.com" },
        { name: "tlsSessionID", value: "def" },
      ],
    });

    const properties = decodeNameValuePairs(accessor, FIELDS.negotiationProperties, "negotiation property");

    expect([...properties.entries()]).toEqual([
      ["tlsSessionID", "def"],
      ["peerHost", "client.example.com"],
    ]);
  });

  it("rejects a property without a name", () => {
    const accessor = new FieldAccessor({ negotiationProperties: [{ value: "abc" }] });

    expect(() => decodeNameValuePairs(accessor, FIELDS.negotiationProperties, "negotiation property")).toThrow(
      'Access log record field "negotiationProperties[0].name" is not a valid negotiation property: name is missing'
    );
  });

  it("names the origin detail that lacks a name", () => {
    const accessor = new FieldAccessor({ originDetails: [{ name: "task", value: "backup" }, { value: "x" }] });

    expect(() => decodeNameValuePairs(accessor, FIELDS.originDetails, "origin detail")).toThrow(
      'Access log record field "originDetails[1].name" is not a valid origin detail: name is missing'
    );
  });

  it("treats a missing value as empty", () => {
    const accessor = new FieldAccessor({ originDetails: [{ name: "task" }] });

    expect(decodeNameValuePairs(accessor, FIELDS.originDetails, "origin detail").get("task")).toBe("");
  });
});

describe("rebalancing endpoints", () => {
  it("renders host and port", () => {
    const accessor = new FieldAccessor({ sourceServer: { address: "ds1.example.com", port: 636 } });
    expect(decodeEndpoint(accessor, FIELDS.sourceServer)).toBe("ds1.example.com:636");
  });

  it("renders the address alone without a port", () => {
    const accessor = new FieldAccessor({ targetServer: { address: "ds2.example.com" } });
    expect(decodeEndpoint(accessor, FIELDS.targetServer)).toBe("ds2.example.com");
  });

  it("returns null without an address", () => {
    expect(decodeEndpoint(new FieldAccessor({ targetServer: { port: 389 } }), FIELDS.targetServer)).toBeNull();
    expect(decodeEndpoint(new FieldAccessor({}), FIELDS.targetServer)).toBeNull();
  });
});

describe("result codes", () => {
  it("resolves known values to their canonical names", () => {
    expect(resultCodeForValue(0)).toEqual({ value: 0, name: "success" });
    expect(resultCodeForValue(32, "whatever the server said")).toEqual({ value: 32, name: "no such object" });
  });

  it("keeps unknown values with the logged name", () => {
    expect(resultCodeForValue(12345, "brand new code")).toEqual({ value: 12345, name: "brand new code" });
    expect(resultCodeForValue(12345)).toEqual({ value: 12345, name: "unknown result code 12345" });
  });

  it("resolves names regardless of case and separators", () => {
    expect(resultCodeForName("NO_SUCH_OBJECT")).toEqual({ value: 32, name: "no such object" });
    expect(resultCodeForName("invalid-credentials")?.value).toBe(49);
    expect(resultCodeForName("not a code")).toBeNull();
  });

  it("decodes value and name fields from a record", () => {
    const decode = (record: JsonObject) =>
      decodeResultCode(new FieldAccessor(record), FIELDS.resultCode, FIELDS.resultCodeName);

    expect(decode({ resultCode: 49, resultCodeName: "Invalid Credentials" })).toEqual({
      value: 49,
      name: "invalid credentials",
    });
    expect(decode({ resultCodeName: "busy" })).toEqual({ value: 51, name: "busy" });
    expect(decode({})).toBeNull();
    expect(() => decode({ resultCodeName: "mystery" })).toThrow(
      'Access log record field "resultCodeName" is not a valid result code name: "mystery" is not recognized'
    );
  });
});
