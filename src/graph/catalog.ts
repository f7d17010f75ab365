import type { z } from 'zod';
import { DIMENSIONS, type Dimension } from '../math';
import { NodeUnionSchema, type NodeType } from './schema';

export interface NodeFieldInfo {
  name: string;
  optional: boolean;
  description: string | null;
}

export interface NodeTypeInfo {
  type: NodeType;
  description: string | null;
  /** Arities the node itself implements; children may narrow this further */
  dimensions: Dimension[];
  fields: NodeFieldInfo[];
}

function describeFields(shape: z.ZodRawShape): NodeFieldInfo[] {
  return Object.entries(shape)
    .filter(([name]) => name !== 'type')
    .map(([name, field]) => ({
      name,
      optional: field.isOptional(),
      description: field.description ?? null,
    }));
}

/**
 * One entry per node type, read off the description schema.
 */
export function listNodeTypes(): NodeTypeInfo[] {
  return NodeUnionSchema.options.map((option) => {
    const type: NodeType = option.shape.type.value;
    return {
      type,
      description: option.description ?? null,
      dimensions: type === 'superSimplex' ? [2, 3] : [...DIMENSIONS],
      fields: describeFields(option.shape),
    };
  });
}
