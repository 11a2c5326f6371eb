/**
 * gRPC Description
 *
 * Converts a parsed document into a service description in the shape of the
 * USD gRPC extension (x-usd.grpc): services keyed by name, methods keyed by
 * RPC name, message types as schema references.
 *
 * Service and RPC names become object keys. Maps are filled first and turned
 * into records with Object.fromEntries, so names such as `constructor` or
 * `__proto__` end up as own keys.
 */

import type { Parameter, ProtoDocument, Rpc } from './types.js'

export interface GrpcSchemaRef {
  $ref: string
}

export interface GrpcMethodDescription {
  description?: string
  input: GrpcSchemaRef
  output: GrpcSchemaRef
  /** Client streaming */
  'x-usd-client-streaming'?: boolean
  /** Server streaming */
  'x-usd-server-streaming'?: boolean
  /** Option name to raw option body; a repeated name maps to every body in order */
  options?: Record<string, string | string[]>
}

export interface GrpcServiceDescription {
  description?: string
  methods: Record<string, GrpcMethodDescription>
}

export interface GrpcDescription {
  package?: string
  syntax?: string
  services: Record<string, GrpcServiceDescription>
}

export interface DescribeOptions {
  /** Service name for RPCs declared outside any service (default: 'Service') */
  defaultServiceName?: string
}

interface PendingService {
  description?: string
  methods: Map<string, GrpcMethodDescription>
}

export function createRef(typeName: string): GrpcSchemaRef {
  return { $ref: `#/components/schemas/${typeName}` }
}

function firstType(parameters: Parameter[]): string {
  return parameters.length > 0 ? parameters[0].typeName : ''
}

function groupOptions(rpc: Rpc): Map<string, string[]> {
  const grouped = new Map<string, string[]>()
  for (const option of rpc.options) {
    const bodies = grouped.get(option.optionName)
    if (bodies) {
      bodies.push(option.optionBody)
    } else {
      grouped.set(option.optionName, [option.optionBody])
    }
  }
  return grouped
}

function createMethod(rpc: Rpc): GrpcMethodDescription {
  const method: GrpcMethodDescription = {
    input: createRef(firstType(rpc.inputParameters)),
    output: createRef(firstType(rpc.outputParameters)),
  }

  if (rpc.comment) {
    method.description = rpc.comment
  }

  if (rpc.inputParameters.some((parameter) => parameter.streaming)) {
    method['x-usd-client-streaming'] = true
  }

  if (rpc.outputParameters.some((parameter) => parameter.streaming)) {
    method['x-usd-server-streaming'] = true
  }

  if (rpc.options.length > 0) {
    method.options = Object.fromEntries(
      [...groupOptions(rpc).entries()].map(([name, bodies]): [string, string | string[]] => [
        name,
        bodies.length === 1 ? bodies[0] : bodies,
      ])
    )
  }

  return method
}

/**
 * Describe every service of a document
 */
export function describeGrpc(
  document: ProtoDocument,
  options: DescribeOptions = {}
): GrpcDescription {
  const { defaultServiceName = 'Service' } = options
  const services = new Map<string, PendingService>()

  function serviceFor(name: string, description?: string): PendingService {
    const existing = services.get(name)
    if (existing) {
      return existing
    }
    const created: PendingService = { description, methods: new Map() }
    services.set(name, created)
    return created
  }

  for (const service of document.services) {
    const target = serviceFor(service.name, service.comment)
    for (const rpc of service.rpcs) {
      target.methods.set(rpc.name, createMethod(rpc))
    }
  }

  if (document.rpcs.length > 0) {
    const target = serviceFor(defaultServiceName)
    for (const rpc of document.rpcs) {
      target.methods.set(rpc.name, createMethod(rpc))
    }
  }

  return {
    ...(document.package !== undefined && { package: document.package }),
    ...(document.syntax !== undefined && { syntax: document.syntax }),
    services: Object.fromEntries(
      [...services.entries()].map(
        ([name, { description, methods }]): [string, GrpcServiceDescription] => [
          name,
          {
            ...(description ? { description } : {}),
            methods: Object.fromEntries(methods),
          },
        ]
      )
    ),
  }
}
