import { TypeRef } from './types';

/**
 * Canonical string rendering of a type reference.
 *
 * Two references render identically iff they are structurally equal, which makes the
 * rendering usable as the key of the signature cycle guard. Also used in reason strings.
 */
export function renderType(type: TypeRef): string {
  const annotations = type.annotations.map(annotation => `@${annotation} `).join('');

  switch (type.kind) {
    case 'class':
      return `${annotations}${type.declarationId}${renderArguments(type.typeArguments)}${nullMark(type.nullable)}`;
    case 'alias':
      return `${annotations}${type.aliasId}${renderArguments(type.typeArguments)}${nullMark(type.nullable)}`;
    case 'parameter':
      return `${annotations}${type.name}${nullMark(type.nullable)}`;
    case 'function': {
      const receiver = type.receiverType ? `${renderType(type.receiverType)}.` : '';
      const params = type.parameterTypes.map(renderType).join(', ');
      const signature = `${type.suspending ? 'suspend ' : ''}${receiver}(${params}) -> ${renderType(type.returnType)}`;
      return type.nullable ? `${annotations}(${signature})?` : `${annotations}${signature}`;
    }
  }
}

function renderArguments(typeArguments: TypeRef[]): string {
  if (typeArguments.length === 0) {
    return '';
  }
  return `<${typeArguments.map(renderType).join(', ')}>`;
}

function nullMark(nullable: boolean): string {
  return nullable ? '?' : '';
}
