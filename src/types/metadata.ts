/**
 * Metadata types for method registration and introspection
 *
 * Derived from the zod shapes a method declares, so documentation and
 * discovery always match what dispatch actually accepts.
 */

import { z } from 'zod';

/**
 * Declared parameter of an exposed method
 */
export interface ParameterMetadata {
  /**
   * Key of the parameter in the JSON params object
   */
  name: string;

  /**
   * Readable type, e.g. 'integer', 'string[]', '{ Ok: number } | { Err: string }'
   */
  type: string;

  /**
   * False when the key may be omitted
   */
  required: boolean;

  description?: string;
}

/**
 * Exposed method metadata for introspection
 */
export interface MethodMetadata {
  name: string;
  description?: string;
  params: ParameterMetadata[];

  /**
   * Readable result type ('unknown' when no result encoder is declared)
   */
  returns: string;

  /**
   * Whether the method runs with exclusive access to the actor's state
   */
  mutates: boolean;

  /**
   * Sample params object built from the declared shape
   */
  exampleParams: Record<string, unknown>;
}

/**
 * Actor metadata for introspection
 */
export interface ActorMetadata {
  name: string;
  description?: string;
  methods: MethodMetadata[];
}

/**
 * Describe a zod schema as a readable type
 */
export function describeType(schema: z.ZodTypeAny): string {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodDefault) {
    return describeType(unwrapOptional(schema));
  }
  if (schema instanceof z.ZodNullable) {
    return `${describeType(schema.unwrap())} | null`;
  }
  if (schema instanceof z.ZodNumber) {
    return schema.isInt ? 'integer' : 'number';
  }
  if (schema instanceof z.ZodString) return 'string';
  if (schema instanceof z.ZodBoolean) return 'boolean';
  if (schema instanceof z.ZodNull) return 'null';
  if (schema instanceof z.ZodLiteral) return JSON.stringify(schema.value);
  if (schema instanceof z.ZodEnum) {
    return schema.options.map((option: string) => JSON.stringify(option)).join(' | ');
  }
  if (schema instanceof z.ZodArray) {
    const element = describeType(schema.element);
    return element.includes(' ') ? `(${element})[]` : `${element}[]`;
  }
  if (schema instanceof z.ZodObject) {
    const shape: z.ZodRawShape = schema.shape;
    const fields = Object.entries(shape).map(([key, field]) => {
      const optional = field.isOptional() ? '?' : '';
      return `${key}${optional}: ${describeType(field)}`;
    });
    return fields.length === 0 ? '{}' : `{ ${fields.join(', ')} }`;
  }
  if (schema instanceof z.ZodUnion) {
    const options: z.ZodTypeAny[] = schema.options;
    return options.map(describeType).join(' | ');
  }
  if (schema instanceof z.ZodRecord) {
    return `Record<string, ${describeType(schema.valueSchema)}>`;
  }
  if (schema instanceof z.ZodAny) return 'any';
  return 'unknown';
}

/**
 * Example JSON value for a zod schema (used in generated documentation)
 */
export function exampleValue(schema: z.ZodTypeAny): unknown {
  if (schema instanceof z.ZodOptional) {
    return exampleValue(schema.unwrap());
  }
  if (schema instanceof z.ZodNullable) {
    return null;
  }
  if (schema instanceof z.ZodDefault) {
    return exampleValue(schema.removeDefault());
  }
  if (schema instanceof z.ZodNumber) {
    return schema.isInt ? 42 : 3.14;
  }
  if (schema instanceof z.ZodString) return 'example';
  if (schema instanceof z.ZodBoolean) return true;
  if (schema instanceof z.ZodLiteral) return schema.value;
  if (schema instanceof z.ZodEnum) return schema.options[0];
  if (schema instanceof z.ZodArray) return [];
  if (schema instanceof z.ZodObject) {
    const shape: z.ZodRawShape = schema.shape;
    return Object.fromEntries(Object.entries(shape).map(([key, field]) => [key, exampleValue(field)]));
  }
  if (schema instanceof z.ZodUnion) {
    const options: z.ZodTypeAny[] = schema.options;
    return exampleValue(options[0]);
  }
  if (schema instanceof z.ZodRecord) return {};
  if (schema instanceof z.ZodNull) return null;
  return 'value';
}

/**
 * Build parameter metadata from a method's params shape
 */
export function describeParams(shape: z.ZodRawShape): ParameterMetadata[] {
  return Object.entries(shape).map(([name, schema]) => ({
    name,
    type: describeType(schema),
    required: !schema.isOptional(),
    description: schema.description
  }));
}

/**
 * Sample params object for a method's params shape
 */
export function exampleParams(shape: z.ZodRawShape): Record<string, unknown> {
  return Object.fromEntries(Object.entries(shape).map(([name, schema]) => [name, exampleValue(schema)]));
}

function unwrapOptional(schema: z.ZodOptional<z.ZodTypeAny> | z.ZodDefault<z.ZodTypeAny>): z.ZodTypeAny {
  return schema instanceof z.ZodOptional ? schema.unwrap() : schema.removeDefault();
}
