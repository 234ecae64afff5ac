import {
  CallableDecl,
  CallableId,
  CallableSource,
  CallGraphQuery,
  ClassDecl,
  ClassTypeRef,
  PropertyDecl,
  TypeModel,
  TypeRef,
} from './types';
import { AliasJson, CallableJson, DeclarationJson, ModelSnapshot, TypeRefJson } from './snapshot-schema';

interface AliasDefinition {
  typeParameters: string[];
  target: TypeRef;
}

/**
 * Type model, callable source and call graph backed by a validated snapshot.
 */
export class InMemoryTypeModel implements TypeModel, CallableSource, CallGraphQuery {
  private declarations = new Map<string, ClassDecl>();
  private aliases = new Map<string, AliasDefinition>();
  private callables = new Map<CallableId, CallableDecl>();
  private callGraph = new Map<CallableId, CallableId[]>();

  constructor(snapshot: ModelSnapshot) {
    for (const declaration of snapshot.declarations) {
      this.declarations.set(declaration.id, toClassDecl(declaration));
    }
    for (const alias of snapshot.aliases) {
      this.aliases.set(alias.id, toAliasDefinition(alias));
    }
    for (const callable of snapshot.callables) {
      this.callables.set(callable.id, toCallableDecl(callable));
      this.callGraph.set(callable.id, callable.callees);
    }
  }

  resolve(type: ClassTypeRef): ClassDecl | undefined {
    return this.declarations.get(type.declarationId);
  }

  /**
   * Expands a single alias level, substituting the alias' type parameters.
   * Unknown aliases are returned unchanged.
   */
  expandAlias(type: TypeRef): TypeRef {
    if (type.kind !== 'alias') {
      return type;
    }

    const definition = this.aliases.get(type.aliasId);
    if (!definition) {
      return type;
    }

    const bindings = new Map<string, TypeRef>();
    definition.typeParameters.forEach((name, index) => {
      const argument = type.typeArguments[index];
      if (argument) {
        bindings.set(name, argument);
      }
    });

    const expanded = substitute(definition.target, bindings);
    return {
      ...expanded,
      nullable: expanded.nullable || type.nullable,
      annotations: [...type.annotations, ...expanded.annotations],
    };
  }

  resolveCallable(id: CallableId): CallableDecl | undefined {
    return this.callables.get(id);
  }

  /**
   * Only edges to callables known to the snapshot are analyzable targets.
   */
  callees(id: CallableId): CallableId[] {
    const targets = this.callGraph.get(id) ?? [];
    return targets.filter(target => this.callables.has(target));
  }

  getDeclarationIds(): string[] {
    return Array.from(this.declarations.keys());
  }

  getCallableIds(): CallableId[] {
    return Array.from(this.callables.keys());
  }
}

export function toTypeRef(json: TypeRefJson): TypeRef {
  const nullable = json.nullable ?? false;
  const annotations = json.annotations ?? [];

  switch (json.kind) {
    case 'class':
      return {
        kind: 'class',
        declarationId: json.declarationId,
        typeArguments: (json.typeArguments ?? []).map(toTypeRef),
        nullable,
        annotations,
      };
    case 'parameter':
      return { kind: 'parameter', name: json.name, nullable, annotations };
    case 'function':
      return {
        kind: 'function',
        suspending: json.suspending ?? false,
        receiverType: json.receiverType ? toTypeRef(json.receiverType) : undefined,
        parameterTypes: (json.parameterTypes ?? []).map(toTypeRef),
        returnType: json.returnType
          ? toTypeRef(json.returnType)
          : { kind: 'class', declarationId: 'kotlin.Unit', typeArguments: [], nullable: false, annotations: [] },
        nullable,
        annotations,
      };
    case 'alias':
      return {
        kind: 'alias',
        aliasId: json.aliasId,
        typeArguments: (json.typeArguments ?? []).map(toTypeRef),
        nullable,
        annotations,
      };
  }
}

function toClassDecl(json: DeclarationJson): ClassDecl {
  const properties: PropertyDecl[] = json.properties.map(property => ({
    name: property.name,
    type: toTypeRef(property.type),
    mutable: property.mutable,
  }));

  let wrappedProperty: PropertyDecl | undefined;
  if (json.kind === 'value_class') {
    wrappedProperty = json.wrappedProperty
      ? properties.find(property => property.name === json.wrappedProperty)
      : properties[0];
  }

  return {
    id: json.id,
    qualifiedName: json.qualifiedName === null ? undefined : json.qualifiedName ?? json.id,
    simpleName: json.simpleName ?? lastSegment(json.id),
    kind: json.kind,
    modality: json.modality,
    properties,
    supertypes: json.supertypes.map(toTypeRef),
    annotations: json.annotations,
    wrappedProperty,
    inferredStability: json.inferredStability,
  };
}

function toAliasDefinition(json: AliasJson): AliasDefinition {
  return {
    typeParameters: json.typeParameters,
    target: toTypeRef(json.target),
  };
}

function toCallableDecl(json: CallableJson): CallableDecl {
  return {
    id: json.id,
    name: json.name ?? lastSegment(json.id),
    qualifiedName: json.qualifiedName ?? json.id,
    parameters: json.parameters.map(parameter => ({
      name: parameter.name,
      type: toTypeRef(parameter.type),
    })),
    receivers: json.receivers.map(receiver => ({
      kind: receiver.kind,
      type: toTypeRef(receiver.type),
    })),
    annotations: json.annotations,
  };
}

function substitute(type: TypeRef, bindings: Map<string, TypeRef>): TypeRef {
  if (bindings.size === 0) {
    return type;
  }

  switch (type.kind) {
    case 'parameter': {
      const bound = bindings.get(type.name);
      if (!bound) {
        return type;
      }
      return {
        ...bound,
        nullable: bound.nullable || type.nullable,
        annotations: [...type.annotations, ...bound.annotations],
      };
    }
    case 'class':
    case 'alias':
      return {
        ...type,
        typeArguments: type.typeArguments.map(argument => substitute(argument, bindings)),
      };
    case 'function':
      return {
        ...type,
        receiverType: type.receiverType ? substitute(type.receiverType, bindings) : undefined,
        parameterTypes: type.parameterTypes.map(parameter => substitute(parameter, bindings)),
        returnType: substitute(type.returnType, bindings),
      };
  }
}

function lastSegment(id: string): string {
  const withoutGenerics = id.split('<')[0];
  const segments = withoutGenerics.split('.');
  return segments[segments.length - 1] || id;
}
