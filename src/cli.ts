/**
 * proto-rpc CLI
 *
 * Command-line interface for inspecting the RPCs of a definition file.
 *
 * Usage:
 *   proto-rpc api.proto                       # gRPC description as JSON
 *   proto-rpc api.proto --format summary      # One line per RPC
 *   proto-rpc api.proto --namespace acme.v1   # Namespace when the file has no package
 *   proto-rpc api.proto --no-comments         # Drop comments
 *   proto-rpc api.proto --debug               # Enable debug logging
 */

import { ProtoError } from './errors/index.js'
import { describeGrpc } from './proto/describe.js'
import { listRpcs, parseProtoFile } from './proto/parser.js'
import type { Parameter, Rpc } from './proto/types.js'
import { createLogger, setLogLevel } from './utils/logger.js'

export const VERSION = '0.1.0'

const log = createLogger('cli')

export type OutputFormat = 'json' | 'summary'

export interface CliOptions {
  file?: string
  format: OutputFormat
  namespace?: string
  includeComments: boolean
  debug: boolean
  help: boolean
  version: boolean
}

/**
 * Output sinks, replaceable in tests
 */
export interface CliIO {
  stdout(text: string): void
  stderr(text: string): void
}

const processIO: CliIO = {
  stdout: (text) => {
    process.stdout.write(text)
  },
  stderr: (text) => {
    process.stderr.write(text)
  },
}

/**
 * Parse command-line arguments (without the node and script entries)
 */
export function parseArgs(args: readonly string[]): CliOptions {
  const result: CliOptions = {
    format: 'json',
    includeComments: true,
    debug: false,
    help: false,
    version: false,
  }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]

    if (arg === '--format' || arg === '-f') {
      const value = args[++i]
      if (value === 'json' || value === 'summary') {
        result.format = value
      } else {
        throw new ProtoError('INVALID_ARGUMENT', `Unknown format: ${value ?? '(missing)'}`)
      }
    } else if (arg === '--namespace' || arg === '-n') {
      const value = args[++i]
      if (value === undefined) {
        throw new ProtoError('INVALID_ARGUMENT', '--namespace needs a value')
      }
      result.namespace = value
    } else if (arg === '--no-comments') {
      result.includeComments = false
    } else if (arg === '--debug' || arg === '-d') {
      result.debug = true
    } else if (arg === '--help' || arg === '-h') {
      result.help = true
    } else if (arg === '--version' || arg === '-v') {
      result.version = true
    } else if (arg.startsWith('-')) {
      throw new ProtoError('INVALID_ARGUMENT', `Unknown option: ${arg}`)
    } else {
      result.file = arg
    }
  }

  return result
}

export function helpText(): string {
  return `Usage: proto-rpc <file> [options]

Options:
  -f, --format <format>     Output format: json, summary (default: json)
  -n, --namespace <ns>      Namespace used until a package statement
      --no-comments         Drop comments from the output
  -d, --debug               Enable debug logging
  -h, --help                Show this help
  -v, --version             Show version
`
}

function formatParameters(parameters: Parameter[]): string {
  return parameters
    .map((parameter) => (parameter.streaming ? `stream ${parameter.typeName}` : parameter.typeName))
    .join(', ')
}

/**
 * `acme.v1.Echo.Say(SayRequest) returns (stream SayReply)`
 */
export function formatRpcSummary(rpc: Rpc): string {
  const scope = rpc.namespace ? `${rpc.namespace}.${rpc.name}` : rpc.name
  return `${scope}(${formatParameters(rpc.inputParameters)}) returns (${formatParameters(rpc.outputParameters)})`
}

/**
 * Run the CLI. Resolves to the process exit code.
 */
export async function run(args: readonly string[], io: CliIO = processIO): Promise<number> {
  try {
    const options = parseArgs(args)

    if (options.help) {
      io.stdout(helpText())
      return 0
    }

    if (options.version) {
      io.stdout(`proto-rpc version ${VERSION}\n`)
      return 0
    }

    if (options.debug) {
      setLogLevel('debug')
    }

    if (!options.file) {
      io.stderr(`error: missing definition file\n\n${helpText()}`)
      return 1
    }

    const document = await parseProtoFile(options.file, {
      includeComments: options.includeComments,
      ...(options.namespace !== undefined && { defaultNamespace: options.namespace }),
    })

    if (options.format === 'summary') {
      const lines = listRpcs(document).map(formatRpcSummary)
      io.stdout(lines.length > 0 ? `${lines.join('\n')}\n` : '')
    } else {
      io.stdout(`${JSON.stringify(describeGrpc(document), null, 2)}\n`)
    }

    return 0
  } catch (err) {
    if (err instanceof ProtoError) {
      log.debug({ err: err.toJSON() }, 'Command failed')
      io.stderr(`error: ${err.message}\n`)
      return 1
    }
    throw err
  }
}
