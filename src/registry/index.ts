/**
 * Method registry and introspection metadata
 */

export { MethodRegistry, createMethodDescriptor, formatIssues } from './MethodRegistry.js';
export type {
  EncodedResult,
  MethodDescriptor,
  MethodInvoker,
  MethodParams,
  MethodSpec,
  PreparedCall
} from './MethodRegistry.js';
export type { ActorMetadata, MethodMetadata, ParameterMetadata } from '../types/metadata.js';
