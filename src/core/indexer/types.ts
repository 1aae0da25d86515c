/**
 * One function or method definition copied out of a parsed file. Records
 * never point back into the parser's tree.
 */
export interface FunctionRecord {
  path: string;
  qualifiedName: string;
  parameterTypes: string[];
  isConstMethod: boolean;
  mangledName: string | null;
  /** Canonical signature, the same spelling the coverage map uses. */
  signature: string;
  /** Line of the declared name; the identity's start line. */
  declLine: number;
  /** First line of the definition, inclusive. */
  spanStart: number;
  /** Last line of the definition, inclusive. */
  spanEnd: number;
}

/** A definition as found in the AST, before its signature is canonicalized. */
export type FunctionDecl = Omit<FunctionRecord, 'signature' | 'path'>;
