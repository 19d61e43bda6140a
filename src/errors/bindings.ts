import type { ErrorReason } from '../types/errors.js';
import { ErrorCodes } from '../types/errors.js';

/** gRPC canonical status names used by the binary binding. */
export type GrpcStatus =
  | 'INVALID_ARGUMENT'
  | 'NOT_FOUND'
  | 'FAILED_PRECONDITION'
  | 'UNIMPLEMENTED'
  | 'INTERNAL';

export interface BindingCodes {
  jsonRpc: number;
  grpc: GrpcStatus;
  http: number;
}

const GRPC_AND_HTTP: Record<ErrorReason, { grpc: GrpcStatus; http: number }> = {
  TASK_NOT_FOUND: { grpc: 'NOT_FOUND', http: 404 },
  TASK_NOT_CANCELABLE: { grpc: 'FAILED_PRECONDITION', http: 409 },
  PUSH_NOTIFICATION_NOT_SUPPORTED: { grpc: 'UNIMPLEMENTED', http: 400 },
  UNSUPPORTED_OPERATION: { grpc: 'UNIMPLEMENTED', http: 400 },
  CONTENT_TYPE_NOT_SUPPORTED: { grpc: 'INVALID_ARGUMENT', http: 415 },
  INVALID_AGENT_RESPONSE: { grpc: 'INTERNAL', http: 502 },
  EXTENDED_AGENT_CARD_NOT_CONFIGURED: { grpc: 'FAILED_PRECONDITION', http: 400 },
  EXTENSION_SUPPORT_REQUIRED: { grpc: 'FAILED_PRECONDITION', http: 400 },
  VERSION_NOT_SUPPORTED: { grpc: 'UNIMPLEMENTED', http: 400 },
  PARSE_ERROR: { grpc: 'INVALID_ARGUMENT', http: 400 },
  INVALID_REQUEST: { grpc: 'INVALID_ARGUMENT', http: 400 },
  METHOD_NOT_FOUND: { grpc: 'UNIMPLEMENTED', http: 404 },
  INVALID_PARAMS: { grpc: 'INVALID_ARGUMENT', http: 400 },
  INTERNAL_ERROR: { grpc: 'INTERNAL', http: 500 },
};

/** Binding-specific codes for an abstract error reason. */
export function bindingCodes(reason: ErrorReason): BindingCodes {
  return { jsonRpc: ErrorCodes[reason], ...GRPC_AND_HTTP[reason] };
}

/** Reverse lookup from a JSON-RPC code, for clients reading errors off the wire. */
export function reasonForJsonRpcCode(code: number): ErrorReason | undefined {
  for (const [reason, value] of Object.entries(ErrorCodes)) {
    if (value === code && isErrorReason(reason)) return reason;
  }
  return undefined;
}

function isErrorReason(value: string): value is ErrorReason {
  return value in GRPC_AND_HTTP;
}
