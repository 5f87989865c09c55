/**
 * Unit tests for message discrimination and the legality matrix
 */

import { describe, it, expect } from "vitest";
import { decodeAccessLogRecord } from "../../src/log/discriminator.js";
import {
  FieldFormatError,
  IllegalCombinationError,
  InvalidEnumValueError,
  MissingRequiredFieldError,
} from "../../src/log/errors.js";
import {
  CONNECTION_MESSAGE_TYPES,
  LEGAL_OPERATION_TYPES,
  OPERATION_TYPES,
  isLegalCombination,
} from "../../src/log/types.js";
import type { JsonObject, OperationMessageType, OperationType } from "../../src/log/types.js";

const TIMESTAMP = "2024-03-01T12:00:00Z";

function record(fields: JsonObject): JsonObject {
  return { timestamp: TIMESTAMP, ...fields };
}

const IDENTIFYING_KEYS = new Set(["messageType", "operationType", "timestamp"]);

function isEmptyValue(value: unknown): boolean {
  if (value === null) return true;
  if (Array.isArray(value)) return value.length === 0;
  if (value instanceof Set || value instanceof Map) return value.size === 0;
  return false;
}

/** Keys of a decoded message that carry something other than an empty value */
function populatedKeys(message: object): string[] {
  return Object.entries(message)
    .filter(([key, value]: [string, unknown]) => !IDENTIFYING_KEYS.has(key) && !isEmptyValue(value))
    .map(([key]) => key);
}

const OPERATION_MESSAGE_TYPES: readonly OperationMessageType[] = [
  "REQUEST",
  "FORWARD",
  "FORWARD_FAILED",
  "RESULT",
  "ASSURANCE_COMPLETE",
  "ENTRY",
  "REFERENCE",
  "INTERMEDIATE_RESPONSE",
];

const legalPairs: Array<[OperationMessageType, OperationType]> = [];
const illegalPairs: Array<[OperationMessageType, OperationType]> = [];
for (const messageType of OPERATION_MESSAGE_TYPES) {
  for (const operationType of OPERATION_TYPES) {
    (isLegalCombination(messageType, operationType) ? legalPairs : illegalPairs).push([messageType, operationType]);
  }
}

describe("legality matrix", () => {
  it("allows 53 operation pairs", () => {
    expect(legalPairs).toHaveLength(53);
  });

  it("restricts entries and references to searches", () => {
    expect(LEGAL_OPERATION_TYPES.ENTRY).toEqual(["SEARCH"]);
    expect(LEGAL_OPERATION_TYPES.REFERENCE).toEqual(["SEARCH"]);
  });

  it("restricts assurance completion to writes", () => {
    expect(LEGAL_OPERATION_TYPES.ASSURANCE_COMPLETE).toEqual(["ADD", "DELETE", "MODIFY", "MODDN"]);
  });

  it("allows unbind only as a request or intermediate response", () => {
    const unbind = legalPairs.filter(([, operationType]) => operationType === "UNBIND").map(([messageType]) => messageType);
    expect(unbind).toEqual(["REQUEST", "INTERMEDIATE_RESPONSE"]);
  });
});

describe("decodeAccessLogRecord", () => {
  describe("dispatch", () => {
    it.each(legalPairs)("decodes %s for %s", (messageType, operationType) => {
      const message = decodeAccessLogRecord(record({ messageType, operationType }));

      expect(message).toMatchObject({ messageType, operationType });
      expect(message.timestamp).toEqual(new Date(TIMESTAMP));
    });

    it.each(legalPairs)("leaves every other field of a bare %s for %s empty", (messageType, operationType) => {
      const message = decodeAccessLogRecord(record({ messageType, operationType }));

      expect(populatedKeys(message)).toEqual([]);
    });

    it.each(CONNECTION_MESSAGE_TYPES)("decodes connection message %s", (messageType) => {
      const message = decodeAccessLogRecord(record({ messageType }));

      expect(message.messageType).toBe(messageType);
      expect("operationType" in message).toBe(false);
      expect(populatedKeys(message)).toEqual([]);
    });

    it("reports a populated field of a minimal record", () => {
      const message = decodeAccessLogRecord(record({ messageType: "REQUEST", operationType: "ABANDON", idToAbandon: 4 }));

      expect(populatedKeys(message)).toEqual(["idToAbandon"]);
    });

    it("ignores an operation type on connection messages", () => {
      const message = decodeAccessLogRecord(record({ messageType: "DISCONNECT", operationType: "nonsense" }));
      expect(message.messageType).toBe("DISCONNECT");
    });

    it("accepts tokens in any case with hyphens", () => {
      const message = decodeAccessLogRecord(
        record({ messageType: "intermediate-response", operationType: " Search " })
      );
      expect(message).toMatchObject({ messageType: "INTERMEDIATE_RESPONSE", operationType: "SEARCH" });

      expect(decodeAccessLogRecord(record({ messageType: "Forward-Failed", operationType: "moddn" }))).toMatchObject({
        messageType: "FORWARD_FAILED",
        operationType: "MODDN",
      });
    });
  });

  describe("illegal combinations", () => {
    it.each(illegalPairs)("rejects %s for %s", (messageType, operationType) => {
      expect(() => decodeAccessLogRecord(record({ messageType, operationType }))).toThrow(IllegalCombinationError);
    });

    it("names both types in the message", () => {
      expect(() => decodeAccessLogRecord(record({ messageType: "ENTRY", operationType: "BIND" }))).toThrow(
        "Message type ENTRY is not allowed for operation type BIND"
      );
    });
  });

  describe("required fields", () => {
    it("requires a timestamp before anything else", () => {
      expect(() => decodeAccessLogRecord({ messageType: "BOGUS" })).toThrow(
        'Access log record is missing required field "timestamp"'
      );
    });

    it("rejects an invalid timestamp", () => {
      expect(() => decodeAccessLogRecord({ timestamp: "last tuesday", messageType: "CONNECT" })).toThrow(
        FieldFormatError
      );
    });

    it("requires a message type", () => {
      expect(() => decodeAccessLogRecord(record({}))).toThrow(MissingRequiredFieldError);
      expect(() => decodeAccessLogRecord(record({ messageType: null }))).toThrow(
        'Access log record is missing required field "messageType"'
      );
    });

    it("rejects an unknown message type", () => {
      expect(() => decodeAccessLogRecord(record({ messageType: "BOGUS" }))).toThrow(
        'Access log record field "messageType" has unrecognized value "BOGUS"'
      );
    });

    it("rejects a message type that is not a string", () => {
      expect(() => decodeAccessLogRecord(record({ messageType: 5 }))).toThrow(
        'Access log record field "messageType" has unrecognized value "5"'
      );
      expect(() => decodeAccessLogRecord(record({ messageType: ["RESULT"] }))).toThrow(InvalidEnumValueError);
    });

    it("requires an operation type on operation messages", () => {
      expect(() => decodeAccessLogRecord(record({ messageType: "RESULT" }))).toThrow(
        'Access log record is missing required field "operationType"'
      );
    });

    it("rejects an unknown operation type", () => {
      expect(() => decodeAccessLogRecord(record({ messageType: "REQUEST", operationType: "PURGE" }))).toThrow(
        'Access log record field "operationType" has unrecognized value "PURGE"'
      );
    });
  });

  describe("options", () => {
    it("applies the maximum control depth", () => {
      const nested = record({
        messageType: "REQUEST",
        operationType: "BIND",
        intermediateClientRequestControl: { clientName: "a", downstreamRequest: { clientName: "b" } },
      });

      expect(decodeAccessLogRecord(nested)).toMatchObject({
        intermediateClientRequestControl: { clientName: "a", downstreamRequest: { clientName: "b" } },
      });
      expect(() => decodeAccessLogRecord(nested, { maxControlDepth: 1 })).toThrow(
        "nesting exceeds the maximum depth of 1"
      );
    });
  });
});
