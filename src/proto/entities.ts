/**
 * Entity constructors for RPCs, their parameters and options.
 */

import type { Parameter, Rpc, RpcOption } from './types.js'

export function createParameter(streaming: boolean, typeName: string): Parameter {
  return { streaming, typeName }
}

export function createRpc(namespace: string, name: string, comment?: string): Rpc {
  return {
    namespace,
    name,
    ...(comment !== undefined && { comment }),
    inputParameters: [],
    outputParameters: [],
    options: [],
  }
}

/**
 * Scope path of an RPC's options. An empty namespace still gets the period.
 */
export function scopePath(namespace: string, name: string): string {
  return `${namespace}.${name}`
}

export function createRpcOption(scope: string, optionName: string, optionBody: string): RpcOption {
  return {
    scopePath: scope,
    optionName,
    optionIndex: '',
    optionBody,
  }
}

export function addInputParameter(rpc: Rpc, parameter: Parameter): void {
  rpc.inputParameters.push(parameter)
}

export function addOutputParameter(rpc: Rpc, parameter: Parameter): void {
  rpc.outputParameters.push(parameter)
}

export function addRpcOption(rpc: Rpc, option: RpcOption): void {
  rpc.options.push(option)
}
