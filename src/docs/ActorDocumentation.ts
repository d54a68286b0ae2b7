/**
 * Reference documentation rendered from an actor's registry
 *
 * Output is Markdown: an overview table, then one section per exposed
 * method with its params, return type, the JSON body for HTTP, the
 * WebSocket envelope and a fetch call.
 */

import type { ActorDefinition } from '../actor/Actor.js';
import { describeActor } from '../actor/Actor.js';
import type { MethodMetadata, ParameterMetadata } from '../types/metadata.js';

export interface DocumentationOptions {
  /** Base URL used in the fetch examples (default: http://127.0.0.1:8080) */
  baseUrl?: string;
}

export const DEFAULT_DOCS_BASE_URL = 'http://127.0.0.1:8080';

function code(text: string): string {
  return `\`${text.replace(/\|/g, '\\|')}\``;
}

function signature(params: ParameterMetadata[]): string {
  if (params.length === 0) {
    return '_none_';
  }
  return params.map(param => code(`${param.name}${param.required ? '' : '?'}: ${param.type}`)).join(', ');
}

function parameterList(params: ParameterMetadata[]): string[] {
  if (params.length === 0) {
    return ['_None._'];
  }
  return params.map(param => {
    const optional = param.required ? '' : ' (optional)';
    const description = param.description ? ` - ${param.description}` : '';
    return `- \`${param.name}\`: \`${param.type}\`${optional}${description}`;
  });
}

function methodSection(method: MethodMetadata, baseUrl: string): string[] {
  const body = JSON.stringify(method.exampleParams);
  const envelope = JSON.stringify({ method: method.name, params: method.exampleParams }, null, 2);

  const lines = [`### ${method.name}`, ''];
  if (method.description) {
    lines.push(method.description, '');
  }
  if (method.mutates) {
    lines.push('Runs with exclusive access to the actor state.', '');
  }

  lines.push(
    '**Parameters**',
    '',
    ...parameterList(method.params),
    '',
    `**Returns:** \`${method.returns}\``,
    '',
    '**HTTP**',
    '',
    '```',
    `POST /${method.name}`,
    body,
    '```',
    '',
    '**WebSocket**',
    '',
    '```json',
    envelope,
    '```',
    '',
    '**Usage**',
    '',
    '```typescript',
    `const response = await fetch('${baseUrl}/${method.name}', {`,
    "  method: 'POST',",
    "  headers: { 'Content-Type': 'application/json' },",
    `  body: JSON.stringify(${body})`,
    '});',
    'const result = await response.json();',
    '```',
    ''
  );
  return lines;
}

/**
 * Render Markdown reference documentation for an actor type
 *
 * Only exposed methods appear; the order is registration order.
 */
export function generateActorDocumentation<TActor>(
  definition: ActorDefinition<TActor>,
  options: DocumentationOptions = {}
): string {
  const baseUrl = (options.baseUrl ?? DEFAULT_DOCS_BASE_URL).replace(/\/+$/, '');
  const actor = describeActor(definition);

  const lines = [`# ${actor.name}`, ''];
  if (actor.description) {
    lines.push(actor.description, '');
  }

  lines.push(
    'Every method is reachable as `POST /<method>` with a JSON params object as body, or as a',
    'WebSocket text frame `{"method": "<method>", "params": {...}}`. Replies are JSON; failures',
    'come back as a JSON string describing the error.',
    '',
    '## Methods',
    '',
    '| Method | Parameters | Returns |',
    '|---|---|---|',
    ...actor.methods.map(method => `| ${code(method.name)} | ${signature(method.params)} | ${code(method.returns)} |`),
    ''
  );

  for (const method of actor.methods) {
    lines.push(...methodSection(method, baseUrl));
  }

  return lines.join('\n');
}
