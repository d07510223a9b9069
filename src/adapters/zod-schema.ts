import { z } from 'zod';
import type { ToolParamDef } from '../core/tools/types.js';

function describe(def: ToolParamDef): string | undefined {
  if (def.default === undefined) return def.description;
  const suffix = `(default: ${JSON.stringify(def.default)})`;
  return def.description ? `${def.description} ${suffix}` : suffix;
}

function paramToZod(def: ToolParamDef): z.ZodTypeAny {
  let schema: z.ZodTypeAny;

  switch (def.type) {
    case 'string':
      schema = z.string();
      break;
    case 'number':
      schema = z.number();
      break;
    case 'integer':
      schema = z.number().int();
      break;
    case 'array':
      schema = z.array(def.items ? paramToZod(def.items) : z.unknown());
      break;
  }

  const description = describe(def);
  return description ? schema.describe(description) : schema;
}

/**
 * Builds a zod raw shape for `McpServer.registerTool`. Defaults are advertised
 * in the description only; tools apply them so the same args work on every host.
 */
export function toZodShape(params: Record<string, ToolParamDef>): z.ZodRawShape {
  const shape: z.ZodRawShape = {};
  for (const [key, def] of Object.entries(params)) {
    const fieldSchema = paramToZod(def);
    shape[key] = def.required === false ? fieldSchema.optional() : fieldSchema;
  }
  return shape;
}
