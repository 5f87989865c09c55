/**
 * Operation-scoped message shapes and their builders
 *
 * Every operation message carries the operation's request fields. Results
 * and assurance completions add the shared result set plus the fields
 * specific to the operation type.
 */

import type { FieldAccessor } from "../accessor.js";
import type { DecodeContext } from "../context.js";
import type { MutatingOperationType, OperationType, RespondingOperationType } from "../types.js";
import { decodeAbandonRequestFields } from "./abandon.js";
import type { AbandonRequestFields } from "./abandon.js";
import { decodeAddRequestFields } from "./add.js";
import type { AddRequestFields } from "./add.js";
import { decodeForwardTarget, decodeOperationFields, frozen } from "./base.js";
import type { ForwardTargetFields, OperationMessageBase } from "./base.js";
import { decodeBindRequestFields, decodeBindResultFields } from "./bind.js";
import type { BindRequestFields, BindResultFields } from "./bind.js";
import { decodeCompareRequestFields } from "./compare.js";
import type { CompareRequestFields } from "./compare.js";
import { decodeDeleteRequestFields, decodeDeleteResultFields } from "./delete.js";
import type { DeleteRequestFields, DeleteResultFields } from "./delete.js";
import { decodeExtendedRequestFields, decodeExtendedResultFields } from "./extended.js";
import type { ExtendedRequestFields, ExtendedResultFields } from "./extended.js";
import { decodeIntermediateResponseFields } from "./intermediate-response.js";
import type { IntermediateResponseFields } from "./intermediate-response.js";
import { decodeModifyDNRequestFields } from "./moddn.js";
import type { ModifyDNRequestFields } from "./moddn.js";
import { decodeModifyRequestFields } from "./modify.js";
import type { ModifyRequestFields } from "./modify.js";
import {
  decodeAssuranceCompletionFields,
  decodeAuthorizedResultFields,
  decodeCommonResultFields,
  decodeForwardFailureFields,
  decodeMutatingResultFields,
} from "./result.js";
import type {
  AssuranceCompletionFields,
  AuthorizedResultFields,
  CommonResultFields,
  ForwardFailureFields,
  MutatingResultFields,
} from "./result.js";
import {
  decodeSearchEntryFields,
  decodeSearchReferenceFields,
  decodeSearchRequestFields,
  decodeSearchResultFields,
} from "./search.js";
import type { SearchEntryFields, SearchReferenceFields, SearchRequestFields, SearchResultFields } from "./search.js";

/** Unbind requests carry no fields of their own */
export type UnbindRequestFields = Record<never, never>;

/** Abandon results carry nothing beyond the shared result set */
export type AbandonResultFields = Record<never, never>;

export interface RequestFieldsByOperation {
  ABANDON: AbandonRequestFields;
  ADD: AddRequestFields;
  BIND: BindRequestFields;
  COMPARE: CompareRequestFields;
  DELETE: DeleteRequestFields;
  EXTENDED: ExtendedRequestFields;
  MODIFY: ModifyRequestFields;
  MODDN: ModifyDNRequestFields;
  SEARCH: SearchRequestFields;
  UNBIND: UnbindRequestFields;
}

export interface ResultFieldsByOperation {
  ABANDON: AbandonResultFields;
  ADD: MutatingResultFields;
  BIND: BindResultFields;
  COMPARE: AuthorizedResultFields;
  DELETE: MutatingResultFields & DeleteResultFields;
  EXTENDED: ExtendedResultFields;
  MODIFY: MutatingResultFields;
  MODDN: MutatingResultFields;
  SEARCH: SearchResultFields;
}

/** Builds one message from a record */
export type MessageConstructor<T> = (accessor: FieldAccessor, ctx: DecodeContext) => T;

type OperationMessage<M extends OperationMessageBase["messageType"], O extends OperationType> = OperationMessageBase & {
  readonly messageType: M;
  readonly operationType: O;
} & RequestFieldsByOperation[O];

type RequestMessageOf<O extends OperationType> = OperationMessage<"REQUEST", O>;
type ForwardMessageOf<O extends RespondingOperationType> = OperationMessage<"FORWARD", O> & ForwardTargetFields;
type ForwardFailedMessageOf<O extends RespondingOperationType> = OperationMessage<"FORWARD_FAILED", O> &
  ForwardTargetFields &
  ForwardFailureFields;
type ResultMessageOf<O extends RespondingOperationType> = OperationMessage<"RESULT", O> &
  ForwardTargetFields &
  CommonResultFields &
  ResultFieldsByOperation[O];
type AssuranceCompletedMessageOf<O extends MutatingOperationType> = OperationMessage<"ASSURANCE_COMPLETE", O> &
  ForwardTargetFields &
  CommonResultFields &
  ResultFieldsByOperation[O] &
  AssuranceCompletionFields;
type IntermediateResponseMessageOf<O extends OperationType> = OperationMessage<"INTERMEDIATE_RESPONSE", O> &
  IntermediateResponseFields;

/** A request received from a client; a union over operation types unless one is given */
export type RequestMessage<O extends OperationType = OperationType> = O extends OperationType
  ? RequestMessageOf<O>
  : never;

/** A request forwarded by a proxy to a backend server */
export type ForwardMessage<O extends RespondingOperationType = RespondingOperationType> =
  O extends RespondingOperationType ? ForwardMessageOf<O> : never;

/** A request a proxy failed to forward */
export type ForwardFailedMessage<O extends RespondingOperationType = RespondingOperationType> =
  O extends RespondingOperationType ? ForwardFailedMessageOf<O> : never;

/** The result sent to the client */
export type ResultMessage<O extends RespondingOperationType = RespondingOperationType> =
  O extends RespondingOperationType ? ResultMessageOf<O> : never;

/** The outcome of assured replication for a write */
export type AssuranceCompletedMessage<O extends MutatingOperationType = MutatingOperationType> =
  O extends MutatingOperationType ? AssuranceCompletedMessageOf<O> : never;

export type SearchEntryMessage = OperationMessage<"ENTRY", "SEARCH"> & SearchEntryFields;

export type SearchReferenceMessage = OperationMessage<"REFERENCE", "SEARCH"> & SearchReferenceFields;

export type IntermediateResponseMessage<O extends OperationType = OperationType> = O extends OperationType
  ? IntermediateResponseMessageOf<O>
  : never;

const REQUEST_FIELD_DECODERS: { [O in OperationType]: MessageConstructor<RequestFieldsByOperation[O]> } = {
  ABANDON: decodeAbandonRequestFields,
  ADD: decodeAddRequestFields,
  BIND: decodeBindRequestFields,
  COMPARE: decodeCompareRequestFields,
  DELETE: decodeDeleteRequestFields,
  EXTENDED: decodeExtendedRequestFields,
  MODIFY: decodeModifyRequestFields,
  MODDN: decodeModifyDNRequestFields,
  SEARCH: decodeSearchRequestFields,
  UNBIND: () => ({}),
};

const RESULT_FIELD_DECODERS: { [O in RespondingOperationType]: MessageConstructor<ResultFieldsByOperation[O]> } = {
  ABANDON: () => ({}),
  ADD: decodeMutatingResultFields,
  BIND: decodeBindResultFields,
  COMPARE: decodeAuthorizedResultFields,
  DELETE: (accessor) => ({ ...decodeMutatingResultFields(accessor), ...decodeDeleteResultFields(accessor) }),
  EXTENDED: decodeExtendedResultFields,
  MODIFY: decodeMutatingResultFields,
  MODDN: decodeMutatingResultFields,
  SEARCH: decodeSearchResultFields,
};

function decodeOperationMessage<M extends OperationMessageBase["messageType"], O extends OperationType>(
  accessor: FieldAccessor,
  ctx: DecodeContext,
  messageType: M,
  operationType: O
): OperationMessage<M, O> {
  return {
    ...decodeOperationFields(accessor, messageType, operationType, ctx),
    ...REQUEST_FIELD_DECODERS[operationType](accessor, ctx),
  };
}

export function buildRequestMessage<O extends OperationType>(
  accessor: FieldAccessor,
  ctx: DecodeContext,
  operationType: O
): RequestMessageOf<O> {
  return frozen(decodeOperationMessage(accessor, ctx, "REQUEST", operationType));
}

export function buildForwardMessage<O extends RespondingOperationType>(
  accessor: FieldAccessor,
  ctx: DecodeContext,
  operationType: O
): ForwardMessageOf<O> {
  return frozen({
    ...decodeOperationMessage(accessor, ctx, "FORWARD", operationType),
    ...decodeForwardTarget(accessor),
  });
}

export function buildForwardFailedMessage<O extends RespondingOperationType>(
  accessor: FieldAccessor,
  ctx: DecodeContext,
  operationType: O
): ForwardFailedMessageOf<O> {
  return frozen({
    ...decodeOperationMessage(accessor, ctx, "FORWARD_FAILED", operationType),
    ...decodeForwardTarget(accessor),
    ...decodeForwardFailureFields(accessor),
  });
}

export function buildResultMessage<O extends RespondingOperationType>(
  accessor: FieldAccessor,
  ctx: DecodeContext,
  operationType: O
): ResultMessageOf<O> {
  return frozen({
    ...decodeOperationMessage(accessor, ctx, "RESULT", operationType),
    ...decodeForwardTarget(accessor),
    ...decodeCommonResultFields(accessor, ctx),
    ...RESULT_FIELD_DECODERS[operationType](accessor, ctx),
  });
}

export function buildAssuranceCompletedMessage<O extends MutatingOperationType>(
  accessor: FieldAccessor,
  ctx: DecodeContext,
  operationType: O
): AssuranceCompletedMessageOf<O> {
  return frozen({
    ...decodeOperationMessage(accessor, ctx, "ASSURANCE_COMPLETE", operationType),
    ...decodeForwardTarget(accessor),
    ...decodeCommonResultFields(accessor, ctx),
    ...RESULT_FIELD_DECODERS[operationType](accessor, ctx),
    ...decodeAssuranceCompletionFields(accessor),
  });
}

export function buildSearchEntryMessage(accessor: FieldAccessor, ctx: DecodeContext): SearchEntryMessage {
  return frozen({
    ...decodeOperationMessage(accessor, ctx, "ENTRY", "SEARCH"),
    ...decodeSearchEntryFields(accessor),
  });
}

export function buildSearchReferenceMessage(accessor: FieldAccessor, ctx: DecodeContext): SearchReferenceMessage {
  return frozen({
    ...decodeOperationMessage(accessor, ctx, "REFERENCE", "SEARCH"),
    ...decodeSearchReferenceFields(accessor),
  });
}

export function buildIntermediateResponseMessage<O extends OperationType>(
  accessor: FieldAccessor,
  ctx: DecodeContext,
  operationType: O
): IntermediateResponseMessageOf<O> {
  return frozen({
    ...decodeOperationMessage(accessor, ctx, "INTERMEDIATE_RESPONSE", operationType),
    ...decodeIntermediateResponseFields(accessor),
  });
}
