import {
  AliasTypeRef,
  ClassTypeRef,
  FunctionTypeRef,
  TypeParameterRef,
  TypeRef,
} from './types';

export interface TypeRefOptions {
  nullable?: boolean;
  annotations?: string[];
}

export function classType(
  declarationId: string,
  typeArguments: TypeRef[] = [],
  options: TypeRefOptions = {}
): ClassTypeRef {
  return {
    kind: 'class',
    declarationId,
    typeArguments,
    nullable: options.nullable ?? false,
    annotations: options.annotations ?? [],
  };
}

export function typeParameter(name: string, options: TypeRefOptions = {}): TypeParameterRef {
  return {
    kind: 'parameter',
    name,
    nullable: options.nullable ?? false,
    annotations: options.annotations ?? [],
  };
}

export interface FunctionTypeOptions extends TypeRefOptions {
  suspending?: boolean;
  receiverType?: TypeRef;
  parameterTypes?: TypeRef[];
  returnType?: TypeRef;
}

export function functionType(options: FunctionTypeOptions = {}): FunctionTypeRef {
  return {
    kind: 'function',
    suspending: options.suspending ?? false,
    receiverType: options.receiverType,
    parameterTypes: options.parameterTypes ?? [],
    returnType: options.returnType ?? classType('kotlin.Unit'),
    nullable: options.nullable ?? false,
    annotations: options.annotations ?? [],
  };
}

export function aliasType(
  aliasId: string,
  typeArguments: TypeRef[] = [],
  options: TypeRefOptions = {}
): AliasTypeRef {
  return {
    kind: 'alias',
    aliasId,
    typeArguments,
    nullable: options.nullable ?? false,
    annotations: options.annotations ?? [],
  };
}

/**
 * Returns a copy of the reference with the given nullability.
 */
export function withNullability<T extends TypeRef>(type: T, nullable: boolean): T {
  if (type.nullable === nullable) {
    return type;
  }
  return { ...type, nullable };
}
