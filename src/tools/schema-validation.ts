import { z } from 'zod';
import type { JsonObject, JsonSchema } from '../core/types.js';
import { ArgumentError } from '../core/errors.js';

/**
 * Converts the JSON Schema subset tools advertise into a zod schema.
 * Unknown constructs accept any value rather than rejecting valid calls.
 */
export function jsonSchemaToZod(schema: JsonSchema): z.ZodTypeAny {
  if ('anyOf' in schema) return unionOf(schema.anyOf);
  if ('oneOf' in schema) return unionOf(schema.oneOf);
  if (!('type' in schema)) return z.unknown();

  switch (schema.type) {
    case 'object': {
      const shape: Record<string, z.ZodTypeAny> = {};
      const required = new Set(schema.required ?? []);
      for (const [key, prop] of Object.entries(schema.properties ?? {})) {
        const converted = jsonSchemaToZod(prop);
        shape[key] = required.has(key) ? present(converted) : converted.optional();
      }
      for (const key of required) {
        if (!(key in shape)) shape[key] = present(z.unknown());
      }
      const obj = z.object(shape);
      const extra = schema.additionalProperties;
      if (extra === false) return obj.strict();
      if (extra && extra !== true) return obj.catchall(jsonSchemaToZod(extra));
      return obj.passthrough();
    }
    case 'array':
      return z.array(schema.items ? jsonSchemaToZod(schema.items) : z.unknown());
    case 'string': {
      const [first, ...rest] = schema.enum ?? [];
      return first === undefined ? z.string() : z.enum([first, ...rest]);
    }
    case 'number':
      return z.number();
    case 'integer':
      return z.number().int();
    case 'boolean':
      return z.boolean();
    case 'null':
      return z.null();
    default:
      return z.unknown();
  }
}

/** `z.unknown()` lets a missing key through; a required key has to be there. */
function present(schema: z.ZodTypeAny): z.ZodTypeAny {
  return schema.refine((v) => v !== undefined, { message: 'Required' });
}

function unionOf(options: JsonSchema[]): z.ZodTypeAny {
  const [a, b, ...rest] = options.map(jsonSchemaToZod);
  if (!a) return z.unknown();
  if (!b) return a;
  return z.union([a, b, ...rest]);
}

const compiled = new WeakMap<JsonSchema, z.ZodTypeAny>();

/** Throws `ArgumentError` listing every violated constraint. */
export function validateArguments(toolName: string, schema: JsonSchema, args: JsonObject): void {
  let validator = compiled.get(schema);
  if (!validator) {
    validator = jsonSchemaToZod(schema);
    compiled.set(schema, validator);
  }
  const res = validator.safeParse(args);
  if (res.success) return;
  const detail = res.error.issues.map((i) => `${i.path.join('.') || '<arguments>'}: ${i.message}`).join('; ');
  throw new ArgumentError(toolName, detail);
}
