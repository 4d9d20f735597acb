/**
 * QNameResolver tests - expressions to qualified names
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { QNameResolver, ResolutionContext } from '@demeter-lint/core';
import type { ExprNode, QName } from '@demeter-lint/types';
import { buildProgram, capturingLogger, FailingProgram, findAll, findNode } from '../../helpers/python.js';

const GARAGE = [
  'from typing import cast',
  'import os',
  '',
  'class Engine:',
  '    def start(self) -> bool:',
  '        return True',
  '',
  'class Car:',
  '    engine: Engine',
  '',
  '    def __init__(self):',
  '        self.wheels = 4',
  '',
  '    def build(self) -> "Car":',
  '        return self',
  '',
  '    def spin(self):',
  '        return self.wheels',
  '',
  'def make() -> Car:',
  '    return Car()',
  '',
  'def drive(car: "Car", fuel=1.5):',
  '    return car',
  '',
  'car = Car()',
  'count = 1 + 2.5',
  'mixed = 1 + "a"',
  'label = "a" or "b"',
  'fallback = getattr(car, "x", "default")',
  'casted = cast("Engine", obj)',
  'started = car.engine.start()',
  'made = make()',
  'built = Car().build()',
  'home = os',
  'unknown = mystery.value',
  'loop_a = loop_b',
  'loop_b = loop_a',
  '',
  'try:',
  '    pass',
  'except ValueError as err:',
  '    err',
  '',
].join('\n');

function nameOf(qname: QName): string | null {
  return qname.kind === 'resolved' ? qname.name : null;
}

function setup() {
  const { program, record } = buildProgram(GARAGE, 'app.garage');
  const resolver = new QNameResolver(program);
  const valueOf = (target: string): ExprNode => {
    const assign = findNode(record.node, 'Assign', node =>
      node.targets.some(candidate => candidate.kind === 'Name' && candidate.id === target));
    return assign.value;
  };
  return { program, record, resolver, valueOf };
}

describe('QNameResolver', () => {
  it('should resolve constructor calls and module-level instances', () => {
    const { resolver, valueOf } = setup();

    assert.strictEqual(nameOf(resolver.resolve(valueOf('car'))), 'app.garage.Car');
  });

  it('should resolve calls through inferred return values', () => {
    const { resolver, valueOf } = setup();

    assert.strictEqual(nameOf(resolver.resolve(valueOf('made'))), 'app.garage.Car');
    assert.strictEqual(nameOf(resolver.resolve(valueOf('built'))), 'app.garage.Car');
  });

  it('should resolve a method call through declared attribute and return types', () => {
    const { resolver, valueOf } = setup();

    assert.strictEqual(nameOf(resolver.resolve(valueOf('started'))), 'builtins.bool');
  });

  it('should resolve instance attributes assigned in methods', () => {
    const { resolver, record } = setup();

    const wheels = findNode(record.node, 'Attribute', node => node.attr === 'wheels' && node.line === 18);
    assert.strictEqual(nameOf(resolver.resolve(wheels)), 'builtins.int');
  });

  it('should widen int and float in arithmetic and reject mixed operands', () => {
    const { resolver, valueOf } = setup();

    assert.strictEqual(nameOf(resolver.resolve(valueOf('count'))), 'builtins.float');
    assert.strictEqual(nameOf(resolver.resolve(valueOf('mixed'))), null);
  });

  it('should resolve boolean operations whose operands agree', () => {
    const { resolver, valueOf } = setup();

    assert.strictEqual(nameOf(resolver.resolve(valueOf('label'))), 'builtins.str');
  });

  it('should use the default of a three-argument getattr', () => {
    const { resolver, valueOf } = setup();

    assert.strictEqual(nameOf(resolver.resolve(valueOf('fallback'))), 'builtins.str');
  });

  it('should resolve typing.cast to its target type', () => {
    const { resolver, valueOf } = setup();

    assert.strictEqual(nameOf(resolver.resolve(valueOf('casted'))), 'app.garage.Engine');
  });

  it('should resolve modules by name', () => {
    const { resolver, valueOf } = setup();

    assert.strictEqual(nameOf(resolver.resolve(valueOf('home'))), 'os');
  });

  it('should resolve parameters from annotations, then defaults', () => {
    const { resolver, record } = setup();

    const drive = findNode(record.node, 'FunctionDef', fn => fn.name === 'drive');
    const [car, fuel] = drive.params;
    assert.strictEqual(nameOf(resolver.resolve(car)), 'app.garage.Car');
    assert.strictEqual(nameOf(resolver.resolve(fuel)), 'builtins.float');
  });

  it('should resolve caught exceptions as instances', () => {
    const { resolver, record } = setup();

    const err = findNode(record.node, 'Name', node => node.id === 'err');
    assert.strictEqual(nameOf(resolver.resolve(err)), 'builtins.ValueError');
  });

  it('should leave undefined names unresolved', () => {
    const { resolver, valueOf } = setup();

    assert.deepStrictEqual(resolver.resolve(valueOf('unknown')), { kind: 'unresolved' });
  });

  it('should terminate on cyclic assignments', () => {
    const { resolver, valueOf } = setup();

    assert.deepStrictEqual(resolver.resolve(valueOf('loop_a')), { kind: 'unresolved' });
  });

  it('should give the same answer for the same node', () => {
    const { resolver, valueOf } = setup();

    const node = valueOf('started');
    assert.deepStrictEqual(resolver.resolve(node), resolver.resolve(node));
  });

  it('should give the same answer when a context is reused', () => {
    const { resolver, valueOf } = setup();

    const ctx = new ResolutionContext();
    const node = valueOf('car');
    assert.strictEqual(nameOf(resolver.resolve(node, ctx)), 'app.garage.Car');
    assert.strictEqual(nameOf(resolver.resolve(node, ctx)), 'app.garage.Car');
  });
});

describe('QNameResolver operands that share a definition', () => {
  const SHAPES = [
    'UserId = int',
    '',
    'class Counter:',
    '    count: int',
    '',
    '    def twice(self):',
    '        return self.count + self.count',
    '',
    'def area(side: int):',
    '    return side * side',
    '',
    'def total(a: UserId, b: UserId):',
    '    return a + b',
    '',
  ].join('\n');

  function returnedBy(name: string): QName {
    const { program, record } = buildProgram(SHAPES, 'app.shapes');
    const resolver = new QNameResolver(program);
    const fn = findNode(record.node, 'FunctionDef', node => node.name === name);
    const returned = findNode(fn, 'Return', () => true);
    assert.ok(returned.value);
    return resolver.resolve(returned.value);
  }

  it('should resolve a parameter multiplied by itself', () => {
    assert.strictEqual(nameOf(returnedBy('area')), 'builtins.int');
  });

  it('should resolve two parameters typed with the same alias', () => {
    assert.strictEqual(nameOf(returnedBy('total')), 'builtins.int');
  });

  it('should resolve an attribute added to itself', () => {
    assert.strictEqual(nameOf(returnedBy('twice')), 'builtins.int');
  });
});

describe('QNameResolver with a failing provider', () => {
  it('should return UNRESOLVED and log the fault', () => {
    const { program, record } = buildProgram(GARAGE, 'app.garage', {}, options => new FailingProgram(options));
    const logger = capturingLogger();
    const resolver = new QNameResolver(program, { logger });
    const assign = findNode(record.node, 'Assign', node =>
      node.targets.some(target => target.kind === 'Name' && target.id === 'car'));

    assert.deepStrictEqual(resolver.resolve(assign.value), { kind: 'unresolved' });
    assert.ok(logger.messages.some(entry => entry.level === 'debug' && entry.message === 'Inference provider failed'));
  });
});

describe('QNameResolver in match statements', () => {
  const SOURCE = [
    'class Circle:',
    '    pass',
    '',
    'def narrow(shape):',
    '    match shape:',
    '        case Circle(radius=r) as circle:',
    '            return circle',
    '        case [first, *_]:',
    '            return first',
    '',
  ].join('\n');

  function returned(index: number): QName {
    const { program, record } = buildProgram(SOURCE, 'app.shapes');
    const resolver = new QNameResolver(program);
    const node = findAll(record.node, 'Return')[index].value;
    assert.ok(node);
    return resolver.resolve(node);
  }

  it('should resolve a name bound by a class pattern to that class', () => {
    assert.strictEqual(nameOf(returned(0)), 'app.shapes.Circle');
  });

  it('should leave a name captured from a sequence unresolved', () => {
    assert.deepStrictEqual(returned(1), { kind: 'unresolved' });
  });
});
