/**
 * Proto Module
 *
 * Line scanning, construct visitors and the document parser.
 */

export { parseProto, parseProtoFile, listRpcs } from './parser.js'
export {
  parserOptionsSchema,
  resolveParserOptions,
  type ParserOptions,
  type ParserOptionsInput,
} from './options.js'
export {
  createLineScanner,
  createArrayLineSource,
  tokenizeLines,
  tokenFor,
  line,
} from './scanner.js'
export {
  createRpcVisitor,
  matchRpcDeclaration,
  parseParameters,
  RPC_LINE_PATTERN,
  type RpcDeclarationMatch,
} from './rpc-visitor.js'
export { createServiceVisitor, serviceNamespace } from './service-visitor.js'
export { createMessageVisitor } from './message-visitor.js'
export { createSyntaxVisitor, createPackageVisitor, createImportVisitor } from './file-visitors.js'
export { createDispatcher, createDefaultVisitors, type Dispatcher } from './dispatcher.js'
export {
  createParameter,
  createRpc,
  createRpcOption,
  scopePath,
  addInputParameter,
  addOutputParameter,
  addRpcOption,
} from './entities.js'
export {
  describeGrpc,
  createRef,
  type DescribeOptions,
  type GrpcDescription,
  type GrpcServiceDescription,
  type GrpcMethodDescription,
  type GrpcSchemaRef,
} from './describe.js'
export type {
  AnyVisitor,
  ConstructEntities,
  ConstructKind,
  Visited,
  Visitor,
} from './visitor.js'
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
} from './types.js'
