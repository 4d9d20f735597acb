/**
 * AnnotationResolver tests - type hints to qualified names
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { AnnotationResolver } from '@demeter-lint/core';
import type { QName } from '@demeter-lint/types';
import { buildProgram, findNode } from '../../helpers/python.js';

const MODELS = [
  'from typing import Optional, List, Union, Literal, Annotated, Self',
  'import typing',
  '',
  'UserId = int',
  '',
  'class User:',
  '    name: str',
  '',
  '    def __init__(self):',
  '        self.nickname: str = ""',
  '',
  '    def clone(self) -> "User":',
  '        return self',
  '',
  '    def copy(self) -> Self:',
  '        return self',
  '',
  '    def touch(self):',
  '        pass',
  '',
  '    @property',
  '    def email(self) -> str:',
  '        return ""',
  '',
  'class Admin(User):',
  '    pass',
  '',
  'def f(',
  '    a: Optional[User],',
  '    b: List[int],',
  '    c: "User",',
  '    d: User | None,',
  '    e: Union[None, int],',
  '    g: typing.Dict[str, int],',
  '    h: UserId,',
  '    i: "Optional[User]",',
  '    j: Literal["a"],',
  '    k: Annotated[int, "meta"],',
  '    m: Missing,',
  '    n: None,',
  '):',
  '    pass',
  '',
].join('\n');

function nameOf(qname: QName): string | null {
  return qname.kind === 'resolved' ? qname.name : null;
}

function setup() {
  const { program, record } = buildProgram(MODELS, 'app.models');
  const resolver = new AnnotationResolver(program);
  const f = findNode(record.node, 'FunctionDef', fn => fn.name === 'f');
  const annotationOf = (param: string): QName => {
    const arg = f.params.find(candidate => candidate.name === param);
    assert.ok(arg && arg.annotation, `parameter ${param}`);
    return resolver.resolveAnnotation(arg.annotation);
  };
  const user = program.findClass('app.models.User', record.node);
  const admin = program.findClass('app.models.Admin', record.node);
  assert.ok(user && admin);
  return { resolver, annotationOf, user, admin };
}

describe('AnnotationResolver', () => {
  describe('resolveAnnotation', () => {
    it('should collapse Optional and unions to the first member that is not None', () => {
      const { annotationOf } = setup();

      assert.strictEqual(nameOf(annotationOf('a')), 'app.models.User');
      assert.strictEqual(nameOf(annotationOf('d')), 'app.models.User');
      assert.strictEqual(nameOf(annotationOf('e')), 'builtins.int');
    });

    it('should normalize typing aliases of builtin generics', () => {
      const { annotationOf } = setup();

      assert.strictEqual(nameOf(annotationOf('b')), 'builtins.list');
      assert.strictEqual(nameOf(annotationOf('g')), 'builtins.dict');
    });

    it('should resolve quoted forward references like the bare name', () => {
      const { annotationOf } = setup();

      assert.strictEqual(nameOf(annotationOf('c')), 'app.models.User');
      assert.strictEqual(nameOf(annotationOf('i')), 'app.models.User');
    });

    it('should follow type aliases', () => {
      const { annotationOf } = setup();

      assert.strictEqual(nameOf(annotationOf('h')), 'builtins.int');
    });

    it('should unwrap Literal and Annotated', () => {
      const { annotationOf } = setup();

      assert.strictEqual(nameOf(annotationOf('j')), 'builtins.str');
      assert.strictEqual(nameOf(annotationOf('k')), 'builtins.int');
    });

    it('should map None to NoneType', () => {
      const { annotationOf } = setup();

      assert.strictEqual(nameOf(annotationOf('n')), 'builtins.NoneType');
    });

    it('should leave undefined names unresolved', () => {
      const { annotationOf } = setup();

      assert.deepStrictEqual(annotationOf('m'), { kind: 'unresolved' });
    });
  });

  describe('methodReturn', () => {
    it('should resolve return annotations, including Self', () => {
      const { resolver, user } = setup();

      assert.strictEqual(nameOf(resolver.methodReturn(user, 'clone')), 'app.models.User');
      assert.strictEqual(nameOf(resolver.methodReturn(user, 'copy')), 'app.models.User');
    });

    it('should search ancestors in MRO order', () => {
      const { resolver, admin } = setup();

      assert.strictEqual(nameOf(resolver.methodReturn(admin, 'clone')), 'app.models.User');
    });

    it('should leave unannotated and missing methods unresolved', () => {
      const { resolver, user } = setup();

      assert.strictEqual(nameOf(resolver.methodReturn(user, 'touch')), null);
      assert.strictEqual(nameOf(resolver.methodReturn(user, 'nothing')), null);
    });
  });

  describe('attributeType', () => {
    it('should read class-body annotations, properties and annotated self assignments', () => {
      const { resolver, user } = setup();

      assert.strictEqual(nameOf(resolver.attributeType(user, 'name')), 'builtins.str');
      assert.strictEqual(nameOf(resolver.attributeType(user, 'email')), 'builtins.str');
      assert.strictEqual(nameOf(resolver.attributeType(user, 'nickname')), 'builtins.str');
    });

    it('should inherit declared attributes', () => {
      const { resolver, admin } = setup();

      assert.strictEqual(nameOf(resolver.attributeType(admin, 'name')), 'builtins.str');
    });

    it('should leave undeclared attributes unresolved', () => {
      const { resolver, user } = setup();

      assert.deepStrictEqual(resolver.attributeType(user, 'missing'), { kind: 'unresolved' });
    });
  });
});
