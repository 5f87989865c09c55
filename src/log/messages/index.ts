/**
 * The closed union of decoded access log messages
 */

import type { MutatingOperationType, OperationType, RespondingOperationType } from "../types.js";
import type {
  ClientCertificateMessage,
  ConnectMessage,
  DisconnectMessage,
  SecurityNegotiationMessage,
} from "./connection.js";
import type {
  AssuranceCompletedMessage,
  ForwardFailedMessage,
  ForwardMessage,
  IntermediateResponseMessage,
  RequestMessage,
  ResultMessage,
  SearchEntryMessage,
  SearchReferenceMessage,
} from "./operation.js";
import type { EntryRebalancingRequestMessage, EntryRebalancingResultMessage } from "./rebalancing.js";

/** Connection-scoped message for each message type */
export interface ConnectionMessageMap {
  CONNECT: ConnectMessage;
  DISCONNECT: DisconnectMessage;
  SECURITY_NEGOTIATION: SecurityNegotiationMessage;
  CLIENT_CERTIFICATE: ClientCertificateMessage;
  ENTRY_REBALANCING_REQUEST: EntryRebalancingRequestMessage;
  ENTRY_REBALANCING_RESULT: EntryRebalancingResultMessage;
}

/** Operation-scoped message for each legal message type and operation type pair */
export interface OperationMessageMap {
  REQUEST: { [O in OperationType]: RequestMessage<O> };
  FORWARD: { [O in RespondingOperationType]: ForwardMessage<O> };
  FORWARD_FAILED: { [O in RespondingOperationType]: ForwardFailedMessage<O> };
  RESULT: { [O in RespondingOperationType]: ResultMessage<O> };
  ASSURANCE_COMPLETE: { [O in MutatingOperationType]: AssuranceCompletedMessage<O> };
  ENTRY: { SEARCH: SearchEntryMessage };
  REFERENCE: { SEARCH: SearchReferenceMessage };
  INTERMEDIATE_RESPONSE: { [O in OperationType]: IntermediateResponseMessage<O> };
}

export type ConnectionAccessLogMessage = ConnectionMessageMap[keyof ConnectionMessageMap];

export type OperationAccessLogMessage = {
  [M in keyof OperationMessageMap]: OperationMessageMap[M][keyof OperationMessageMap[M]];
}[keyof OperationMessageMap];

/** Any decoded access log message, discriminated by messageType and operationType */
export type AccessLogMessage = ConnectionAccessLogMessage | OperationAccessLogMessage;

export type {
  ClientCertificateMessage,
  ConnectMessage,
  DisconnectMessage,
  SecurityNegotiationMessage,
} from "./connection.js";
export type { EntryRebalancingRequestMessage, EntryRebalancingResultMessage } from "./rebalancing.js";
export type {
  AssuranceCompletedMessage,
  ForwardFailedMessage,
  ForwardMessage,
  IntermediateResponseMessage,
  MessageConstructor,
  RequestMessage,
  ResultMessage,
  SearchEntryMessage,
  SearchReferenceMessage,
} from "./operation.js";
export type { AccessLogMessageBase, ForwardTargetFields, OperationMessageBase } from "./base.js";
export type { SearchScope } from "./search.js";
export type { AuthenticationFailureReason } from "./bind.js";
