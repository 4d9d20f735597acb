/**
 * StructuralCouplingAnalyzer tests - chain and stranger checks on single calls
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  ProvenanceClassifier,
  QNameResolver,
  StructuralCouplingAnalyzer,
} from '@demeter-lint/core';
import type { CouplingPolicy, StructuralCouplingAnalyzerOptions } from '@demeter-lint/core';
import type { AssignNode, CallNode, StrangerMap } from '@demeter-lint/types';
import { buildProgram, FailingProgram, findAll, findMethodCall, PROJECT_ROOT } from '../../helpers/python.js';

interface SetupOptions {
  policy?: Partial<CouplingPolicy>;
  options?: StructuralCouplingAnalyzerOptions;
  stubbed?: boolean;
  modules?: Record<string, string>;
  failing?: boolean;
}

function setup(
  source: string,
  { policy = {}, options = {}, stubbed = false, modules = {}, failing = false }: SetupOptions = {},
) {
  const { program, oracle, record } = buildProgram(
    source,
    'app.service',
    modules,
    failing ? programOptions => new FailingProgram(programOptions) : undefined,
  );
  const resolver = new QNameResolver(program);
  const classifier = new ProvenanceClassifier(program, resolver, oracle);
  const analyzer = new StructuralCouplingAnalyzer(
    program,
    { resolver, classifier, oracle, stubs: { hasStub: () => stubbed } },
    {
      projectRoot: PROJECT_ROOT,
      allowedLodRoots: [],
      allowedLodMethods: [],
      layerMap: {},
      ...policy,
    },
    options,
  );
  return { program, record, analyzer };
}

/** Feeds every assignment of the module through recordAssign, in source order */
function strangersOf(analyzer: StructuralCouplingAnalyzer, assigns: AssignNode[]): StrangerMap {
  const strangers: StrangerMap = new Map();
  for (const assign of assigns) analyzer.recordAssign(assign, strangers);
  return strangers;
}

const SELF_CHAIN = 'class Car:\n    def drive(self):\n        self.a.b.c()\n';

const FIND_CUSTOMER = [
  'class Customer:',
  '    def notify(self):',
  '        return None',
  '',
  'class Repo:',
  '    def find(self) -> "Customer":',
  '        return Customer()',
  '',
  'def handle(repo: Repo):',
  '    customer = repo.find()',
  '    customer.notify()',
  '',
].join('\n');

const SESSION_CHAIN = [
  'class Session:',
  '    def query(self):',
  '        return 1',
  '',
  'class Db:',
  '    session = Session()',
  '',
  'class Service:',
  '    def __init__(self):',
  '        self.db = Db()',
  '',
  '    def run(self):',
  '        self.db.session.query()',
  '',
].join('\n');

function check(analyzer: StructuralCouplingAnalyzer, call: CallNode, strangers: StrangerMap = new Map()) {
  return analyzer.checkCall(call, strangers);
}

describe('StructuralCouplingAnalyzer', () => {
  describe('chains', () => {
    it('should report a self chain longer than two links', () => {
      const { record, analyzer } = setup(SELF_CHAIN);

      const violations = check(analyzer, findMethodCall(record.node, 'c'));

      assert.strictEqual(violations.length, 1);
      const [violation] = violations;
      assert.strictEqual(violation.code, 'W9006');
      assert.strictEqual(
        violation.message,
        'Law of Demeter: Chain access (self.a.b.c) exceeds one level. Create delegated method.'
      );
      assert.deepStrictEqual(violation.messageArgs, ['self.a.b.c']);
      assert.strictEqual(violation.provenance, 'local');
      assert.deepStrictEqual(violation.locations, [{ file: '/project/app/service.py', line: 3, column: 8 }]);
    });

    it('should allow a self chain of two links', () => {
      const { record, analyzer } = setup('class Car:\n    def drive(self):\n        self.a.b()\n');

      assert.deepStrictEqual(check(analyzer, findMethodCall(record.node, 'b')), []);
    });

    it('should allow a single method call', () => {
      const { record, analyzer } = setup('def handle(order):\n    order.notify()\n');

      assert.deepStrictEqual(check(analyzer, findMethodCall(record.node, 'notify')), []);
    });

    it('should report a chain on an unannotated parameter with unknown provenance', () => {
      const { record, analyzer } = setup('def handle(order):\n    return order.customer.notify()\n');

      const violations = check(analyzer, findMethodCall(record.node, 'notify'));

      assert.strictEqual(violations.length, 1);
      assert.deepStrictEqual(violations[0].messageArgs, ['order.customer.notify']);
      assert.strictEqual(violations[0].provenance, 'unknown');
    });

    it('should report a chain through project classes with local provenance', () => {
      const { record, analyzer } = setup(SESSION_CHAIN);

      const violations = check(analyzer, findMethodCall(record.node, 'query'));

      assert.strictEqual(violations.length, 1);
      assert.deepStrictEqual(violations[0].messageArgs, ['self.db.session.query']);
      assert.strictEqual(violations[0].provenance, 'local');
    });

    it('should not report calls made through trusted stdlib types', () => {
      const { record, analyzer } = setup(
        'from pathlib import Path\n\ndef read_lines():\n    return Path("f.txt").read_text().splitlines()\n'
      );

      assert.deepStrictEqual(check(analyzer, findMethodCall(record.node, 'splitlines')), []);
    });

    it('should not report chains on locally instantiated objects', () => {
      const { record, analyzer } = setup(
        'class Car:\n    pass\n\ndef build():\n    car = Car()\n    car.engine.start()\n'
      );

      assert.deepStrictEqual(check(analyzer, findMethodCall(record.node, 'start')), []);
    });

    it('should report chains on objects constructed after the call', () => {
      const { record, analyzer } = setup(
        'class Car:\n    pass\n\ndef build():\n    car.engine.start()\n    car = Car()\n'
      );

      const violations = check(analyzer, findMethodCall(record.node, 'start'));

      assert.deepStrictEqual(violations.map(violation => violation.messageArgs), [['car.engine.start']]);
    });

    it('should render a compound chain root', () => {
      const { record, analyzer } = setup('def handle(first, second):\n    return (first or second).customer.notify()\n');

      const violations = check(analyzer, findMethodCall(record.node, 'notify'));

      assert.strictEqual(violations.length, 1);
      assert.strictEqual(
        violations[0].message,
        'Law of Demeter: Chain access ((...).customer.notify) exceeds one level. Create delegated method.'
      );
    });

    it('should not report method chains on the sum of two strings', () => {
      const { record, analyzer } = setup('def shout(s: str):\n    return (s + s).strip().upper()\n');

      assert.deepStrictEqual(check(analyzer, findMethodCall(record.node, 'upper')), []);
    });

    it('should not report chains on mocks', () => {
      const { record, analyzer } = setup('from unittest.mock import MagicMock\n\nmock = MagicMock()\nmock.a.b()\n');

      assert.deepStrictEqual(check(analyzer, findMethodCall(record.node, 'b')), []);
    });

    it('should not report chains rooted in a protocol', () => {
      const { record, analyzer } = setup([
        'from typing import Protocol',
        '',
        'class Notifier(Protocol):',
        '    def send(self) -> None: ...',
        '',
        'def notify(notifier: Notifier):',
        '    notifier.channel.send()',
        '',
      ].join('\n'));

      assert.deepStrictEqual(check(analyzer, findMethodCall(record.node, 'send')), []);
    });
  });

  describe('missing stubs', () => {
    const FETCH = 'from extlib import Client\n\ndef fetch(client: Client):\n    return client.session.get()\n';

    it('should ask for a stub when the chain starts in an uninferable dependency', () => {
      const { record, analyzer } = setup(FETCH);

      const violations = check(analyzer, findMethodCall(record.node, 'get'));

      assert.strictEqual(violations.length, 1);
      const [violation] = violations;
      assert.strictEqual(violation.code, 'W9019');
      assert.strictEqual(
        violation.message,
        'Dependency extlib is uninferable. Create stubs/extlib.pyi so the linter can resolve its types.'
      );
      assert.deepStrictEqual(violation.messageArgs, ['extlib', 'stubs/extlib.pyi']);
      assert.strictEqual(violation.provenance, 'external');
    });

    it('should ask for a stub for a module imported directly', () => {
      const { record, analyzer } = setup('import extlib\n\nextlib.api.client.run()\n');

      const violations = check(analyzer, findMethodCall(record.node, 'run'));

      assert.strictEqual(violations.length, 1);
      assert.strictEqual(violations[0].code, 'W9019');
      assert.deepStrictEqual(violations[0].messageArgs, ['extlib', 'stubs/extlib.pyi']);
    });

    it('should report the chain itself once a stub exists', () => {
      const { record, analyzer } = setup(FETCH, { stubbed: true });

      const violations = check(analyzer, findMethodCall(record.node, 'get'));

      assert.strictEqual(violations.length, 1);
      assert.strictEqual(violations[0].code, 'W9006');
      assert.deepStrictEqual(violations[0].messageArgs, ['client.session.get']);
      assert.strictEqual(violations[0].provenance, 'unknown');
    });
  });

  describe('strangers', () => {
    it('should mark names assigned from untrusted calls', () => {
      const { record, analyzer } = setup(FIND_CUSTOMER);

      const strangers = strangersOf(analyzer, findAll(record.node, 'Assign'));

      assert.deepStrictEqual([...strangers], [['customer', true]]);
    });

    it('should report a method call on a stranger', () => {
      const { record, analyzer } = setup(FIND_CUSTOMER);

      const strangers = strangersOf(analyzer, findAll(record.node, 'Assign'));
      const violations = check(analyzer, findMethodCall(record.node, 'notify'), strangers);

      assert.strictEqual(violations.length, 1);
      assert.strictEqual(violations[0].code, 'W9006');
      assert.strictEqual(
        violations[0].message,
        'Law of Demeter: Chain access (customer.notify (Stranger)) exceeds one level. Create delegated method.'
      );
      assert.strictEqual(violations[0].provenance, 'local');
    });

    it('should clear the mark when the name is reassigned', () => {
      const { record, analyzer } = setup(FIND_CUSTOMER.replace(
        '    customer.notify()',
        '    customer = "x"\n    customer.notify()'
      ));

      const strangers = strangersOf(analyzer, findAll(record.node, 'Assign'));

      assert.strictEqual(strangers.get('customer'), false);
      assert.deepStrictEqual(check(analyzer, findMethodCall(record.node, 'notify'), strangers), []);
    });

    it('should not mark names assigned from calls returning primitives', () => {
      const { record, analyzer } = setup('def size(items: list):\n    n = len(items)\n    return n\n');

      const strangers = strangersOf(analyzer, findAll(record.node, 'Assign'));

      assert.strictEqual(strangers.get('n'), false);
    });
  });

  describe('failing provider', () => {
    const SOURCE = [
      'class Car:',
      '    def drive(self):',
      '        self.a.b()',
      '',
      'def shout(s: str):',
      '    return s.strip().upper()',
      '',
    ].join('\n');

    it('should finish every check without a violation', () => {
      const { record, analyzer } = setup(SOURCE, { failing: true });

      for (const call of findAll(record.node, 'Call')) {
        assert.deepStrictEqual(check(analyzer, call), []);
      }
    });
  });

  describe('policy', () => {
    it('should skip every call in test files', () => {
      const { record, analyzer } = setup(SELF_CHAIN, { options: { isTestFile: () => true } });

      assert.deepStrictEqual(check(analyzer, findMethodCall(record.node, 'c')), []);
    });

    it('should allow navigation inside data layers', () => {
      const { record, analyzer } = setup(SELF_CHAIN, { policy: { layerMap: { 'app.service': 'Domain' } } });

      assert.deepStrictEqual(check(analyzer, findMethodCall(record.node, 'c')), []);
    });

    it('should allow receivers under an allowed root', () => {
      const { record, analyzer } = setup(SELF_CHAIN, { policy: { allowedLodRoots: ['app'] } });

      assert.deepStrictEqual(check(analyzer, findMethodCall(record.node, 'c')), []);
    });

    it('should allow explicitly listed methods', () => {
      const { record, analyzer } = setup(SESSION_CHAIN, {
        policy: { allowedLodMethods: ['app.service.Session.query'] },
      });

      assert.deepStrictEqual(check(analyzer, findMethodCall(record.node, 'query')), []);
    });
  });

  describe('layerOf', () => {
    it('should pick the longest matching module prefix', () => {
      const { analyzer } = setup('x = 1\n', {
        policy: { layerMap: { app: 'Application', 'app.domain': 'Domain' } },
      });

      assert.strictEqual(analyzer.layerOf('app.domain.models'), 'Domain');
      assert.strictEqual(analyzer.layerOf('app.views'), 'Application');
      assert.strictEqual(analyzer.layerOf('other'), null);
    });
  });
});
