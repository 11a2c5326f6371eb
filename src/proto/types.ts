/**
 * Proto Types
 *
 * Line records produced by a line source, and the entities the visitors build
 * from them.
 */

// =============================================================================
// Lines
// =============================================================================

/**
 * How a line's syntax ends
 */
export type LineToken = 'none' | 'semicolon' | 'open-brace' | 'close-brace'

/**
 * One pre-tokenized source line
 */
export interface Line {
  /** Statement text with comments removed, trimmed */
  readonly syntax: string
  /** Leading comment lines and the trailing comment, newline-joined */
  readonly comment?: string
  /** Terminator classification of `syntax` */
  readonly token: LineToken
  /** 1-based physical line number (0 for lines built in memory) */
  readonly number: number
}

/**
 * Pull-based, single-reader cursor over lines.
 *
 * Visitors share the source they are given and advance it directly.
 */
export interface LineSource {
  /** Whether another line is available */
  scan(): boolean
  /** Return the next line and advance. Call `scan()` first. */
  readLine(): Line
}

// =============================================================================
// Entities
// =============================================================================

/**
 * One input or output parameter of an RPC
 */
export interface Parameter {
  readonly streaming: boolean
  readonly typeName: string
}

/**
 * One `option (name) = body;` annotation attached to an RPC
 */
export interface RpcOption {
  /** `namespace + "." + rpcName` */
  readonly scopePath: string
  readonly optionName: string
  /** Reserved; always empty */
  readonly optionIndex: string
  /** Raw value, possibly gathered from several lines */
  readonly optionBody: string
}

export interface Rpc {
  namespace: string
  name: string
  comment?: string
  inputParameters: Parameter[]
  outputParameters: Parameter[]
  options: RpcOption[]
}

export interface ProtoService {
  /** Package (or default namespace) the service is declared in */
  namespace: string
  name: string
  comment?: string
  rpcs: Rpc[]
}

export interface ProtoMessage {
  namespace: string
  name: string
  comment?: string
}

export interface ProtoDocument {
  syntax?: string
  package?: string
  imports: string[]
  services: ProtoService[]
  messages: ProtoMessage[]
  /** RPC declarations found outside any service block */
  rpcs: Rpc[]
}

// =============================================================================
// Visiting
// =============================================================================

/**
 * Outcome of a visit.
 *
 * `reinspect` is set when the visitor stopped on a line that starts another
 * construct; the caller dispatches that line itself.
 */
export interface VisitResult<T> {
  entity: T
  reinspect?: Line
}
