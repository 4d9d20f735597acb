import { isBuiltinName } from '@demeter-lint/python-ast';

/** `typing` aliases of concrete classes */
const TYPING_ALIASES: Record<string, string> = {
  'typing.List': 'builtins.list',
  'typing.Dict': 'builtins.dict',
  'typing.Set': 'builtins.set',
  'typing.FrozenSet': 'builtins.frozenset',
  'typing.Tuple': 'builtins.tuple',
  'typing.Type': 'builtins.type',
  'typing.Text': 'builtins.str',
  'typing.DefaultDict': 'collections.defaultdict',
  'typing.OrderedDict': 'collections.OrderedDict',
  'typing.Deque': 'collections.deque',
  'typing.Counter': 'collections.Counter',
  'types.NoneType': 'builtins.NoneType',
};

/**
 * Canonical spelling of a qualified name:
 * `typing_extensions.X` → `typing.X`, `typing.List` → `builtins.list`,
 * bare builtin names → `builtins.<name>`, `None` → `builtins.NoneType`.
 */
export function normalizeQName(name: string): string {
  const qname = name.startsWith('typing_extensions.')
    ? `typing.${name.slice('typing_extensions.'.length)}`
    : name;

  const alias = TYPING_ALIASES[qname];
  if (alias) return alias;

  if (!qname.includes('.')) {
    if (qname === 'None' || qname === 'NoneType') return 'builtins.NoneType';
    if (isBuiltinName(qname)) return `builtins.${qname}`;
  }
  return qname;
}

export const NONE_QNAME = 'builtins.NoneType';
