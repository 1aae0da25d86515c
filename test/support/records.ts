import type { FunctionRecord } from '../../src/core/indexer/types';

export function rec(filePath: string, qualifiedName: string, parameterTypes: string[], spanStart: number, spanEnd: number): FunctionRecord {
  return {
    path: filePath,
    qualifiedName,
    parameterTypes,
    isConstMethod: false,
    mangledName: null,
    signature: `${qualifiedName}(${parameterTypes.join(', ')})`,
    declLine: spanStart,
    spanStart,
    spanEnd,
  };
}
