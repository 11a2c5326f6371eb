/**
 * proto-rpc-scanner
 *
 * Recognizes RPC declarations, streaming parameters and option blocks in
 * protobuf-style definition files.
 */

// === Parsing ===
export {
  parseProto,
  parseProtoFile,
  listRpcs,
  parserOptionsSchema,
  resolveParserOptions,
  describeGrpc,
} from './proto/index.js'
export type {
  ParserOptions,
  ParserOptionsInput,
  DescribeOptions,
  GrpcDescription,
  GrpcServiceDescription,
  GrpcMethodDescription,
  GrpcSchemaRef,
} from './proto/index.js'

// === Lines ===
export {
  createLineScanner,
  createArrayLineSource,
  tokenizeLines,
  tokenFor,
  line,
} from './proto/index.js'

// === Visitors ===
export {
  createRpcVisitor,
  matchRpcDeclaration,
  parseParameters,
  RPC_LINE_PATTERN,
  createServiceVisitor,
  serviceNamespace,
  createMessageVisitor,
  createSyntaxVisitor,
  createPackageVisitor,
  createImportVisitor,
  createDispatcher,
  createDefaultVisitors,
} from './proto/index.js'
export type {
  AnyVisitor,
  ConstructEntities,
  ConstructKind,
  Dispatcher,
  RpcDeclarationMatch,
  Visited,
  Visitor,
} from './proto/index.js'

// === Entities ===
export {
  createParameter,
  createRpc,
  createRpcOption,
  scopePath,
  addInputParameter,
  addOutputParameter,
  addRpcOption,
} from './proto/index.js'
export type {
  Line,
  LineSource,
  LineToken,
  Parameter,
  ProtoDocument,
  ProtoMessage,
  ProtoService,
  Rpc,
  RpcOption,
  VisitResult,
} from './proto/index.js'

// === Errors ===
export {
  Errors,
  ProtoError,
  ErrorCodes,
  getErrorCode,
  getStatusForCode,
  isClientError,
} from './errors/index.js'
export type { ErrorCode, ErrorCodeDef, OptionIssue } from './errors/index.js'

// === Logging ===
export { createLogger, getLogger, setLogLevel } from './utils/logger.js'
