import { Type, type TObject, type TSchema } from '@sinclair/typebox';
import type { ToolParamDef } from '../core/tools/types.js';

function paramToTypeBox(def: ToolParamDef): TSchema {
  const opts: { description?: string; default?: string | number } = {};
  if (def.description) opts.description = def.description;
  if (def.default !== undefined) opts.default = def.default;

  switch (def.type) {
    case 'string':
      return Type.String(opts);
    case 'number':
      return Type.Number(opts);
    case 'integer':
      return Type.Integer(opts);
    case 'array':
      return Type.Array(def.items ? paramToTypeBox(def.items) : Type.Unknown(), opts);
  }
}

export function toTypeBoxSchema(params: Record<string, ToolParamDef>): TObject {
  const properties: Record<string, TSchema> = {};
  for (const [key, def] of Object.entries(params)) {
    const fieldSchema = paramToTypeBox(def);
    properties[key] = def.required === false ? Type.Optional(fieldSchema) : fieldSchema;
  }
  return Type.Object(properties, { additionalProperties: false });
}
