/**
 * Field descriptors for the JSON-formatted access log
 *
 * Each descriptor pairs a wire field name with the kind of value the
 * accessor coerces it to. New fields are supported by adding a descriptor
 * here and reading it in the relevant message decoder.
 */

export type FieldKind =
  | "string"
  | "integer"
  | "long"
  | "double"
  | "boolean"
  | "date"
  | "stringList"
  | "stringSet"
  | "object"
  | "objectList";

export interface FieldDescriptor<K extends FieldKind = FieldKind> {
  readonly name: string;
  readonly kind: K;
}

export function defineField<K extends FieldKind>(name: string, kind: K): FieldDescriptor<K> {
  return Object.freeze({ name, kind });
}

/** Top-level fields of an access log record */
export const FIELDS = {
  // Common to every message
  timestamp: defineField("timestamp", "date"),
  logType: defineField("logType", "string"),
  messageType: defineField("messageType", "string"),
  operationType: defineField("operationType", "string"),
  product: defineField("product", "string"),
  instanceName: defineField("instanceName", "string"),
  startupID: defineField("startupID", "string"),
  threadID: defineField("threadID", "long"),
  connectionID: defineField("connectionID", "long"),

  // Common to operation messages
  operationID: defineField("operationID", "long"),
  messageID: defineField("messageID", "integer"),
  triggeredByConnectionID: defineField("triggeredByConnectionID", "long"),
  triggeredByOperationID: defineField("triggeredByOperationID", "long"),
  origin: defineField("origin", "string"),
  requesterIP: defineField("requesterIP", "string"),
  requesterDN: defineField("requesterDN", "string"),
  requestControlOIDs: defineField("requestControlOIDs", "stringSet"),
  usingAdminSessionWorkerThread: defineField("usingAdminSessionWorkerThread", "boolean"),
  administrativeOperation: defineField("administrativeOperation", "string"),
  intermediateClientRequestControl: defineField("intermediateClientRequestControl", "object"),
  operationPurposeRequestControl: defineField("operationPurposeRequestControl", "object"),
  interServerRequestControls: defineField("interServerRequestControls", "objectList"),
  originDetails: defineField("originDetails", "objectList"),

  // Connection
  fromAddress: defineField("fromAddress", "string"),
  fromPort: defineField("fromPort", "integer"),
  toAddress: defineField("toAddress", "string"),
  toPort: defineField("toPort", "integer"),
  protocol: defineField("protocol", "string"),
  clientConnectionPolicy: defineField("clientConnectionPolicy", "string"),
  disconnectReason: defineField("disconnectReason", "string"),
  message: defineField("message", "string"),
  cipher: defineField("cipher", "string"),
  negotiationProperties: defineField("negotiationProperties", "objectList"),
  certificateChain: defineField("certificateChain", "objectList"),
  autoAuthenticatedAs: defineField("autoAuthenticatedAs", "string"),

  // Entry rebalancing
  rebalancingOperationID: defineField("rebalancingOperationID", "long"),
  sizeLimit: defineField("sizeLimit", "integer"),
  sourceBackendSet: defineField("sourceBackendSet", "string"),
  sourceServer: defineField("sourceServer", "object"),
  targetBackendSet: defineField("targetBackendSet", "string"),
  targetServer: defineField("targetServer", "object"),
  errorMessage: defineField("errorMessage", "string"),
  adminActionRequired: defineField("adminActionRequired", "string"),
  sourceServerAltered: defineField("sourceServerAltered", "boolean"),
  targetServerAltered: defineField("targetServerAltered", "boolean"),
  entriesReadFromSource: defineField("entriesReadFromSource", "integer"),
  entriesAddedToTarget: defineField("entriesAddedToTarget", "integer"),
  entriesDeletedFromSource: defineField("entriesDeletedFromSource", "integer"),

  // Operation requests
  idToAbandon: defineField("idToAbandon", "integer"),
  dn: defineField("dn", "string"),
  undeleteFromDN: defineField("undeleteFromDN", "string"),
  version: defineField("version", "string"),
  authType: defineField("authType", "string"),
  saslMechanism: defineField("saslMechanism", "string"),
  attr: defineField("attr", "string"),
  assertionValue: defineField("assertionValue", "string"),
  requestOID: defineField("requestOID", "string"),
  requestType: defineField("requestType", "string"),
  attributes: defineField("attributes", "stringList"),
  newRDN: defineField("newRDN", "string"),
  deleteOldRDN: defineField("deleteOldRDN", "boolean"),
  newSuperior: defineField("newSuperior", "string"),
  baseDN: defineField("baseDN", "string"),
  scope: defineField("scope", "integer"),
  scopeName: defineField("scopeName", "string"),
  filter: defineField("filter", "string"),
  dereferenceAliases: defineField("dereferenceAliases", "string"),
  requestedSizeLimit: defineField("requestedSizeLimit", "integer"),
  requestedTimeLimitSeconds: defineField("requestedTimeLimitSeconds", "integer"),
  typesOnly: defineField("typesOnly", "boolean"),
  requestedAttributes: defineField("requestedAttributes", "stringList"),

  // Forwarding
  targetHost: defineField("targetHost", "string"),
  targetPort: defineField("targetPort", "integer"),
  targetProtocol: defineField("targetProtocol", "string"),

  // Results
  resultCode: defineField("resultCode", "integer"),
  resultCodeName: defineField("resultCodeName", "string"),
  additionalInfo: defineField("additionalInfo", "string"),
  matchedDN: defineField("matchedDN", "string"),
  referralURLs: defineField("referralURLs", "stringList"),
  serversAccessed: defineField("serversAccessed", "stringList"),
  uncachedDataAccessed: defineField("uncachedDataAccessed", "boolean"),
  workQueueWaitTimeMillis: defineField("workQueueWaitTimeMillis", "double"),
  processingTimeMillis: defineField("processingTimeMillis", "double"),
  intermediateResponsesReturned: defineField("intermediateResponsesReturned", "long"),
  responseControlOIDs: defineField("responseControlOIDs", "stringSet"),
  usedPrivileges: defineField("usedPrivileges", "stringSet"),
  preAuthorizationUsedPrivileges: defineField("preAuthorizationUsedPrivileges", "stringSet"),
  missingPrivileges: defineField("missingPrivileges", "stringSet"),
  authorizationDN: defineField("authorizationDN", "string"),
  replicationChangeID: defineField("replicationChangeID", "string"),
  assuredReplicationRequirements: defineField("assuredReplicationRequirements", "object"),
  indexesWithKeysAccessedNearEntryLimit: defineField("indexesWithKeysAccessedNearEntryLimit", "stringSet"),
  indexesWithKeysAccessedExceedingEntryLimit: defineField("indexesWithKeysAccessedExceedingEntryLimit", "stringSet"),
  intermediateClientResponseControl: defineField("intermediateClientResponseControl", "object"),

  // Operation-specific results
  authenticationDN: defineField("authenticationDN", "string"),
  authenticationFailureReason: defineField("authenticationFailureReason", "object"),
  retiredPasswordUsed: defineField("retiredPasswordUsed", "boolean"),
  softDeletedEntryDN: defineField("softDeletedEntryDN", "string"),
  changeToSoftDeletedEntry: defineField("changeToSoftDeletedEntry", "boolean"),
  responseOID: defineField("responseOID", "string"),
  responseType: defineField("responseType", "string"),
  entriesReturned: defineField("entriesReturned", "long"),
  isIndexed: defineField("isIndexed", "boolean"),

  // Assurance completion
  localAssuranceSatisfied: defineField("localAssuranceSatisfied", "boolean"),
  remoteAssuranceSatisfied: defineField("remoteAssuranceSatisfied", "boolean"),
  serverAssuranceResults: defineField("serverAssuranceResults", "objectList"),

  // Intermediate responses
  oid: defineField("oid", "string"),
  name: defineField("name", "string"),
  value: defineField("value", "string"),
} as const;
