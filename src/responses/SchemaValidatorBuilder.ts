import { z } from 'zod';
import { declaredPropertyNames, isSchemaObject, requiredNames } from './JsonSchema.js';
import type { JsonSchema } from './types.js';

type Literal = string | number | boolean | null;

function isLiteral(value: unknown): value is Literal {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

/**
 * Maps a JSON schema onto an equivalent zod schema so a structured reply can be checked
 * against the schema that was requested for it.
 */
export class SchemaValidatorBuilder {
  /** Resolved `$ref` targets, per root schema */
  private readonly refCache = new WeakMap<JsonSchema, Map<string, z.ZodTypeAny>>();

  public build(schema: unknown, root?: JsonSchema): z.ZodTypeAny {
    if (!isSchemaObject(schema)) {
      return z.unknown();
    }
    const base = root ?? schema;

    if (typeof schema.$ref === 'string') {
      const ref = schema.$ref;
      return z.lazy(() => this.resolveRef(ref, base));
    }

    if (Array.isArray(schema.allOf)) {
      return this.intersection(schema.allOf.map((entry: unknown) => this.build(entry, base)));
    }

    if ('const' in schema && isLiteral(schema.const)) {
      return z.literal(schema.const);
    }

    if (Array.isArray(schema.enum)) {
      return this.union(schema.enum.filter(isLiteral).map((value) => z.literal(value)));
    }

    if (Array.isArray(schema.anyOf)) {
      return this.union(schema.anyOf.map((alternative: unknown) => this.build(alternative, base)));
    }

    if (Array.isArray(schema.oneOf)) {
      return this.exactlyOne(
        schema.oneOf.map((alternative: unknown) => this.build(alternative, base)),
      );
    }

    if (Array.isArray(schema.type)) {
      return this.union(
        schema.type
          .filter((type): type is string => typeof type === 'string')
          .map((type) => this.forType(type, schema, base)),
      );
    }

    if (typeof schema.type === 'string') {
      return this.forType(schema.type, schema, base);
    }

    if ('properties' in schema) {
      return this.objectValidator(schema, base);
    }

    return z.unknown();
  }

  private forType(type: string, schema: JsonSchema, root: JsonSchema): z.ZodTypeAny {
    switch (type) {
      case 'string':
        return z.string();
      case 'number':
        return z.number();
      case 'integer':
        return z.number().int();
      case 'boolean':
        return z.boolean();
      case 'null':
        return z.null();
      case 'array':
        return z.array(this.build(schema.items, root));
      case 'object':
        return this.objectValidator(schema, root);
      default:
        return z.unknown();
    }
  }

  private objectValidator(schema: JsonSchema, root: JsonSchema): z.ZodTypeAny {
    const required = new Set(requiredNames(schema) ?? []);
    const properties = isSchemaObject(schema.properties) ? schema.properties : {};
    const shape: Record<string, z.ZodTypeAny> = {};

    for (const name of declaredPropertyNames(schema)) {
      const validator = this.build(properties[name], root);
      shape[name] = required.has(name) ? present(validator) : validator.optional();
    }

    // Names listed as required but never declared must still be present.
    for (const name of required) {
      if (!(name in shape)) {
        shape[name] = present(z.unknown());
      }
    }

    const object = z.object(shape);
    const additional = schema.additionalProperties;

    if (additional === false) {
      return object.strict();
    }
    if (isSchemaObject(additional)) {
      return object.catchall(this.build(additional, root));
    }
    return object.passthrough();
  }

  /** Local references only: `#`, `#/$defs/<name>` and `#/definitions/<name>`. */
  private resolveRef(ref: string, root: JsonSchema): z.ZodTypeAny {
    let resolved = this.refCache.get(root);
    if (!resolved) {
      resolved = new Map();
      this.refCache.set(root, resolved);
    }

    const cached = resolved.get(ref);
    if (cached) {
      return cached;
    }

    const target = ref === '#' ? root : lookupPointer(root, ref);
    const validator = target === undefined ? z.unknown() : this.build(target, root);
    resolved.set(ref, validator);
    return validator;
  }

  private intersection(types: z.ZodTypeAny[]): z.ZodTypeAny {
    const [first, ...rest] = types;
    if (first === undefined) {
      return z.unknown();
    }
    return rest.reduce<z.ZodTypeAny>((merged, type) => z.intersection(merged, type), first);
  }

  private exactlyOne(types: z.ZodTypeAny[]): z.ZodTypeAny {
    return this.union(types).superRefine((value, ctx) => {
      const matches = types.filter((type) => type.safeParse(value).success).length;
      if (matches > 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Matches ${matches} oneOf alternatives, expected exactly one`,
        });
      }
    });
  }

  private union(types: z.ZodTypeAny[]): z.ZodTypeAny {
    const [first, second, ...rest] = types;
    if (first === undefined) {
      return z.never();
    }
    if (second === undefined) {
      return first;
    }
    return z.union([first, second, ...rest]);
  }
}

/** Rejects an absent key even when the property schema itself would accept `undefined`. */
function present(validator: z.ZodTypeAny): z.ZodTypeAny {
  return validator.refine((value) => value !== undefined, { message: 'Required' });
}

function lookupPointer(root: JsonSchema, ref: string): unknown {
  const match = /^#\/(\$defs|definitions)\/([^/]+)$/.exec(ref);
  if (!match) {
    return undefined;
  }
  const [, keyword, name] = match;
  const definitions = root[keyword];
  return isSchemaObject(definitions) ? definitions[name] : undefined;
}

export function buildPayloadValidator(schema: JsonSchema): z.ZodTypeAny {
  return new SchemaValidatorBuilder().build(schema);
}
