import { z } from 'zod';

/**
 * JSON shape of a type reference inside a model snapshot.
 * Optional fields default to non-null, no annotations, no type arguments.
 */
export type TypeRefJson =
  | {
      kind: 'class';
      declarationId: string;
      typeArguments?: TypeRefJson[];
      nullable?: boolean;
      annotations?: string[];
    }
  | {
      kind: 'parameter';
      name: string;
      nullable?: boolean;
      annotations?: string[];
    }
  | {
      kind: 'function';
      suspending?: boolean;
      receiverType?: TypeRefJson;
      parameterTypes?: TypeRefJson[];
      returnType?: TypeRefJson;
      nullable?: boolean;
      annotations?: string[];
    }
  | {
      kind: 'alias';
      aliasId: string;
      typeArguments?: TypeRefJson[];
      nullable?: boolean;
      annotations?: string[];
    };

export const TypeRefSchema: z.ZodType<TypeRefJson> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z.object({
      kind: z.literal('class'),
      declarationId: z.string().min(1),
      typeArguments: z.array(TypeRefSchema).optional(),
      nullable: z.boolean().optional(),
      annotations: z.array(z.string()).optional(),
    }),
    z.object({
      kind: z.literal('parameter'),
      name: z.string().min(1),
      nullable: z.boolean().optional(),
      annotations: z.array(z.string()).optional(),
    }),
    z.object({
      kind: z.literal('function'),
      suspending: z.boolean().optional(),
      receiverType: TypeRefSchema.optional(),
      parameterTypes: z.array(TypeRefSchema).optional(),
      returnType: TypeRefSchema.optional(),
      nullable: z.boolean().optional(),
      annotations: z.array(z.string()).optional(),
    }),
    z.object({
      kind: z.literal('alias'),
      aliasId: z.string().min(1),
      typeArguments: z.array(TypeRefSchema).optional(),
      nullable: z.boolean().optional(),
      annotations: z.array(z.string()).optional(),
    }),
  ])
);

export const PropertySchema = z.object({
  name: z.string().min(1),
  type: TypeRefSchema,
  mutable: z.boolean().default(false),
});

export const DeclarationSchema = z.object({
  id: z.string().min(1),
  // null marks a declaration whose qualified name the host could not compute
  qualifiedName: z.string().nullable().optional(),
  simpleName: z.string().optional(),
  kind: z.enum(['class', 'interface', 'enum', 'value_class', 'unknown']).default('class'),
  modality: z.enum(['final', 'open', 'abstract', 'sealed']).default('final'),
  properties: z.array(PropertySchema).default([]),
  supertypes: z.array(TypeRefSchema).default([]),
  annotations: z.array(z.string()).default([]),
  wrappedProperty: z.string().optional(),
  inferredStability: z
    .object({
      parameters: z.number().int().nonnegative(),
    })
    .optional(),
});

export const AliasSchema = z.object({
  id: z.string().min(1),
  typeParameters: z.array(z.string()).default([]),
  target: TypeRefSchema,
});

export const CallableSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  qualifiedName: z.string().optional(),
  parameters: z
    .array(
      z.object({
        name: z.string().min(1),
        type: TypeRefSchema,
      })
    )
    .default([]),
  receivers: z
    .array(
      z.object({
        kind: z.enum(['extension', 'dispatch', 'context']),
        type: TypeRefSchema,
      })
    )
    .default([]),
  annotations: z.array(z.string()).default([]),
  callees: z.array(z.string()).default([]),
});

export const ModelSnapshotSchema = z.object({
  declarations: z.array(DeclarationSchema),
  aliases: z.array(AliasSchema).default([]),
  callables: z.array(CallableSchema).default([]),
});

export type DeclarationJson = z.infer<typeof DeclarationSchema>;
export type AliasJson = z.infer<typeof AliasSchema>;
export type CallableJson = z.infer<typeof CallableSchema>;
export type ModelSnapshot = z.infer<typeof ModelSnapshotSchema>;
/** Accepted input, before defaults are applied */
export type ModelSnapshotInput = z.input<typeof ModelSnapshotSchema>;
