/**
 * ProvenanceClassifier tests - trust domains of types and calls
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { ProvenanceClassifier, QNameResolver } from '@demeter-lint/core';
import { UNRESOLVED, resolvedQName } from '@demeter-lint/types';
import { buildProgram, findNode, findMethodCall } from '../../helpers/python.js';

const SERVICE = [
  'import os',
  'from typing import Protocol',
  'from vendorlib import Session',
  '',
  'class Notifier(Protocol):',
  '    def send(self) -> None: ...',
  '',
  'class Query:',
  '    def where(self) -> "Query":',
  '        return self',
  '',
  '    def count(self) -> int:',
  '        return 0',
  '',
  'class Car:',
  '    def build(self) -> "Car":',
  '        return self',
  '',
  'def notify(notifier: Notifier):',
  '    notifier.send()',
  '',
  'def use(session: Session):',
  '    session.get()',
  '',
  'q = Query()',
  'q.where().where()',
  'q.count()',
  'os.path.join("a", "b")',
  '"a,b".split(",")',
  'Car().build()',
  '',
].join('\n');

function setup() {
  const { program, oracle, record } = buildProgram(SERVICE);
  program.addModule({
    name: 'vendorlib',
    source: 'class Session:\n    def get(self):\n        return 1\n',
    file: '/elsewhere/vendorlib.py',
  });
  program.addModule({
    name: 'stubbed',
    source: 'class Api: ...\n',
    file: '/project/stubs/stubbed.pyi',
    origin: 'stub',
  });
  const resolver = new QNameResolver(program);
  const classifier = new ProvenanceClassifier(program, resolver, oracle);
  return { program, record, classifier };
}

describe('ProvenanceClassifier', () => {
  describe('classify', () => {
    it('should classify unresolved names as unknown', () => {
      const { record, classifier } = setup();

      assert.strictEqual(classifier.classify(UNRESOLVED, record.node), 'unknown');
    });

    it('should classify builtins as primitive and stdlib names as stdlib', () => {
      const { record, classifier } = setup();

      assert.strictEqual(classifier.classify(resolvedQName('builtins.str'), record.node), 'primitive');
      assert.strictEqual(classifier.classify(resolvedQName('pathlib.Path'), record.node), 'stdlib');
    });

    it('should classify project classes as local', () => {
      const { record, classifier } = setup();

      assert.strictEqual(classifier.classify(resolvedQName('app.service.Car'), record.node), 'local');
    });

    it('should classify Protocol subclasses as protocol', () => {
      const { record, classifier } = setup();

      assert.strictEqual(classifier.classify(resolvedQName('app.service.Notifier'), record.node), 'protocol');
    });

    it('should classify classes from files outside the root and from stubs as external', () => {
      const { record, classifier } = setup();

      assert.strictEqual(classifier.classify(resolvedQName('vendorlib.Session'), record.node), 'external');
      assert.strictEqual(classifier.classify(resolvedQName('stubbed.Api'), record.node), 'external');
    });

    it('should classify names of modules that cannot be loaded as unknown', () => {
      const { record, classifier } = setup();

      assert.strictEqual(classifier.classify(resolvedQName('extlib.Client'), record.node), 'unknown');
    });
  });

  describe('isTrustedAuthority', () => {
    it('should trust stdlib callables', () => {
      const { record, classifier } = setup();

      assert.strictEqual(classifier.isTrustedAuthority(findMethodCall(record.node, 'join')), true);
    });

    it('should trust builtin methods', () => {
      const { record, classifier } = setup();

      assert.strictEqual(classifier.isTrustedAuthority(findMethodCall(record.node, 'split')), true);
    });

    it('should trust receivers defined in external dependencies', () => {
      const { record, classifier } = setup();

      assert.strictEqual(classifier.isTrustedAuthority(findMethodCall(record.node, 'get')), true);
    });

    it('should not trust project code', () => {
      const { record, classifier } = setup();

      assert.strictEqual(classifier.isTrustedAuthority(findMethodCall(record.node, 'build')), false);
    });
  });

  describe('isFluent', () => {
    it('should recognize methods returning their receiver type', () => {
      const { record, classifier } = setup();

      const outer = findMethodCall(record.node, 'where');
      assert.ok(outer.func.kind === 'Attribute' && outer.func.value.kind === 'Call');
      assert.strictEqual(classifier.isFluent(outer.func.value), true);
      assert.strictEqual(classifier.isFluent(outer), true);
    });

    it('should reject methods returning another type', () => {
      const { record, classifier } = setup();

      assert.strictEqual(classifier.isFluent(findMethodCall(record.node, 'count')), false);
    });

    it('should reject plain function calls', () => {
      const { record, classifier } = setup();

      const call = findNode(record.node, 'Call', node => node.func.kind === 'Name' && node.func.id === 'Query');
      assert.strictEqual(classifier.isFluent(call), false);
    });
  });

  describe('isProtocol', () => {
    it('should recognize expressions typed as a protocol', () => {
      const { record, classifier } = setup();

      const notifier = findNode(record.node, 'Name', node => node.id === 'notifier');
      assert.strictEqual(classifier.isProtocol(notifier), true);
      assert.strictEqual(classifier.isProtocolCall(findMethodCall(record.node, 'send')), true);
    });

    it('should check class definitions and bare names', () => {
      const { record, classifier } = setup();

      const query = findNode(record.node, 'ClassDef', node => node.name === 'Query');
      assert.strictEqual(classifier.isProtocol(query), false);
      assert.strictEqual(classifier.isProtocol('app.protocols.Sender'), true);
      assert.strictEqual(classifier.isProtocol('app.service.Notifier', record.node), true);
      assert.strictEqual(classifier.isProtocol('app.service.Notifier'), false);
    });
  });

  describe('classifyCall', () => {
    it('should report fluent calls as fluent and others by receiver', () => {
      const { record, classifier } = setup();

      assert.strictEqual(classifier.classifyCall(findMethodCall(record.node, 'where')), 'fluent');
      assert.strictEqual(classifier.classifyCall(findMethodCall(record.node, 'count')), 'local');
      assert.strictEqual(classifier.classifyCall(findMethodCall(record.node, 'get')), 'external');
    });
  });
});
