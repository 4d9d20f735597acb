/**
 * Types of attributes that exist at run time but are never declared in
 * Python source or stubs the front end can read (C-level slots, module
 * dunders). Keyed by `<owner qname>.<attribute>`.
 *
 * Entries are added one by one for attributes observed in real code; the
 * map is consulted only after declared attributes are exhausted.
 */
export const NATIVE_ATTRIBUTE_TYPES: Readonly<Record<string, string>> = {
  'builtins.object.__class__': 'builtins.type',
  'builtins.object.__dict__': 'builtins.dict',
  'builtins.object.__module__': 'builtins.str',
  'builtins.object.__doc__': 'builtins.str',
  'builtins.type.__name__': 'builtins.str',
  'builtins.type.__qualname__': 'builtins.str',
  'builtins.type.__mro__': 'builtins.tuple',
  'builtins.BaseException.args': 'builtins.tuple',
  'builtins.OSError.errno': 'builtins.int',
  'builtins.OSError.strerror': 'builtins.str',
  'builtins.OSError.filename': 'builtins.str',
  'builtins.UnicodeDecodeError.reason': 'builtins.str',
  'builtins.SyntaxError.lineno': 'builtins.int',
  'builtins.SyntaxError.filename': 'builtins.str',
  'builtins.SyntaxError.msg': 'builtins.str',
  'builtins.str.__doc__': 'builtins.str',
  'pathlib.Path.name': 'builtins.str',
  'pathlib.Path.stem': 'builtins.str',
  'pathlib.Path.suffix': 'builtins.str',
  'pathlib.Path.parent': 'pathlib.Path',
  'pathlib.PurePath.name': 'builtins.str',
  'pathlib.PurePath.stem': 'builtins.str',
  'pathlib.PurePath.suffix': 'builtins.str',
  'pathlib.PurePath.parent': 'pathlib.PurePath',
  'ast.AST.lineno': 'builtins.int',
  'ast.AST.col_offset': 'builtins.int',
};

/**
 * Declared type of a native attribute, following the owner's MRO.
 */
export function nativeAttributeType(ownerQNames: readonly string[], attr: string): string | null {
  for (const owner of ownerQNames) {
    const type = NATIVE_ATTRIBUTE_TYPES[`${owner}.${attr}`];
    if (type) return type;
  }
  return null;
}
