export { tokenize } from './tokenizer.js';
export type { Token, TokenType } from './tokenizer.js';
export { parseModule, parseExpression } from './parser.js';
export { PythonSyntaxError } from './errors.js';
export { childNodes, walk } from './walk.js';
export { SyntaxTree, parse, lookupName, resolveImportModule } from './tree.js';
export type { TreeOptions } from './tree.js';
export { Program } from './program.js';
export type { ModuleSource, ModuleLoader, ProgramOptions } from './program.js';
export { InferenceEngine } from './infer.js';
export type { InferenceHost } from './infer.js';
export {
  builtins,
  parseBuiltinTable,
  isBuiltinName,
  isBuiltinClass,
  builtinMethodReturn,
} from './builtins.js';
export type { BuiltinTable } from './builtins.js';
export {
  decoratorName,
  hasDecorator,
  isProperty,
  isStaticMethod,
  isClassMethod,
  isPropertyAccessor,
  memberDefinition,
  instanceAttributes,
} from './classes.js';
export type { InstanceAttribute } from './classes.js';
