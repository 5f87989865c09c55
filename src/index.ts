/**
 * Decoder for JSON-formatted directory server access logs
 */

export { AccessLogReader, openAccessLog, withAccessLogReader } from "./log/reader.js";
export type { AccessLogReaderOptions, ReaderState } from "./log/reader.js";
export { decodeAccessLogRecord } from "./log/discriminator.js";
export { parseRecordLine } from "./log/record.js";
export { FileRecordSource, StringRecordSource } from "./log/source.js";
export type { RecordSource, SourceRecord } from "./log/source.js";
export { FieldAccessor, parseTimestamp } from "./log/accessor.js";
export { FIELDS, defineField } from "./log/fields.js";
export type { FieldDescriptor, FieldKind } from "./log/fields.js";
export type { DecodeOptions } from "./log/context.js";
export {
  AccessLogError,
  FieldFormatError,
  IllegalCombinationError,
  InvalidEnumValueError,
  InvalidOptionError,
  MalformedRecordError,
  MissingRequiredFieldError,
  ReaderClosedError,
  ReaderFailedError,
  SourceUnavailableError,
} from "./log/errors.js";
export type { AccessLogErrorCode } from "./log/errors.js";
export {
  CONNECTION_MESSAGE_TYPES,
  LEGAL_OPERATION_TYPES,
  MESSAGE_TYPES,
  MUTATING_OPERATION_TYPES,
  OPERATION_TYPES,
  isLegalCombination,
} from "./log/types.js";
export type {
  ConnectionMessageType,
  JsonObject,
  JsonValue,
  MessageType,
  MutatingOperationType,
  OperationMessageType,
  OperationType,
  RawRecord,
  RespondingOperationType,
} from "./log/types.js";
export type {
  AccessLogMessage,
  AccessLogMessageBase,
  AssuranceCompletedMessage,
  AuthenticationFailureReason,
  ClientCertificateMessage,
  ConnectionAccessLogMessage,
  ConnectMessage,
  DisconnectMessage,
  EntryRebalancingRequestMessage,
  EntryRebalancingResultMessage,
  ForwardFailedMessage,
  ForwardMessage,
  ForwardTargetFields,
  IntermediateResponseMessage,
  OperationAccessLogMessage,
  OperationMessageBase,
  RequestMessage,
  ResultMessage,
  SearchEntryMessage,
  SearchReferenceMessage,
  SearchScope,
  SecurityNegotiationMessage,
} from "./log/messages/index.js";
export type { Certificate } from "./log/decoders/certificate.js";
export type {
  InterServerRequestControl,
  IntermediateClientRequestControl,
  IntermediateClientResponseControl,
  OperationPurposeRequestControl,
} from "./log/decoders/controls.js";
export type {
  AssuredReplicationRequirements,
  LocalAssuranceLevel,
  RemoteAssuranceLevel,
  ServerAssuranceResult,
  ServerAssuranceResultCode,
} from "./log/decoders/assurance.js";
export type { ResultCode } from "./log/decoders/result-code.js";
export { resultCodeForName, resultCodeForValue } from "./log/decoders/result-code.js";
export { DEFAULT_CONFIG, loadConfig, mergeAndValidateConfig } from "./config/loader.js";
export type { Config, LoadedConfig, LoggingConfig, ReaderConfig } from "./config/types.js";
export { ChildLogger, Logger } from "./utils/logger.js";
export type { LogContext, LogEntry } from "./utils/log-types.js";
