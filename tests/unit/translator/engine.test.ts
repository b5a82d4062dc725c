import { describe, it, expect } from 'vitest';
import { compileTransform } from '../../../src/lib/transform/compiler.js';
import {
  TranslationEngine,
  createTranslationEngine,
  translate,
} from '../../../src/lib/translator/engine.js';
import type {
  CompiledExpression,
  ExpressionEvaluator,
} from '../../../src/lib/translator/expression-evaluator.js';
import type { TransformSpec } from '../../../src/types/transform.js';
import { CoercionError, ExpressionEvaluationError } from '../../../src/utils/errors.js';

function engineFor(text: string): TranslationEngine {
  return new TranslationEngine(compileTransform(text));
}

describe('TranslationEngine', () => {
  it('should extract, coerce and nest fields', () => {
    const engine = engineFor('fields:\n  a: "x:int"\n  b:\n    c: "y:string"\n');

    expect(engine.translate({ x: '5', y: 'foo' })).toEqual({ a: 5, b: { c: 'foo' } });
  });

  it('should not clobber siblings that share a prefix', () => {
    const engine = engineFor('fields:\n  a:\n    x: "p:string"\n    y: "q:string"\n');

    expect(engine.translate({ p: '1', q: '2' })).toEqual({ a: { x: '1', y: '2' } });
  });

  it('should let the later rule win for the same output path', () => {
    const spec: TransformSpec = {
      rules: [
        { kind: 'extraction', outputPath: ['a'], inputField: 'first' },
        { kind: 'extraction', outputPath: ['a'], inputField: 'second' },
      ],
      require: [],
    };

    expect(translate({ first: 'one', second: 'two' }, spec)).toEqual({ a: 'two' });
  });

  it('should apply duplicate transform keys in document order', () => {
    const engine = engineFor('fields:\n  a: "first"\n  a: "second:int"\n');

    expect(engine.translate({ first: 'one', second: '2' })).toEqual({ a: 2 });
  });

  it('should let expressions read the input and the output built so far', () => {
    const engine = engineFor(
      [
        'fields:',
        '  a: "x:int"',
        '  z: "{output.z = input.x + input.y}"',
        '  double: "{output.double = output.a * 2}"',
        '',
      ].join('\n'),
    );

    expect(engine.translate({ x: '5', y: '6' })).toEqual({ a: 5, z: '56', double: 10 });
  });

  it('should let expressions write arbitrary output paths', () => {
    const engine = engineFor(
      'fields:\n  ignored: "{output.meta = { total: Number(input.x) + Number(input.y) }}"\n',
    );

    expect(engine.translate({ x: '1', y: '2' })).toEqual({ meta: { total: 3 } });
  });

  it('should write null for missing source fields', () => {
    const engine = engineFor('fields:\n  a: "missing:int"\n  b: "present"\n  c: "blank:int"\n');

    expect(engine.translate({ present: 'yes', blank: '' })).toEqual({ a: null, b: 'yes', c: null });
  });

  it('should treat inherited property names as missing fields', () => {
    const engine = engineFor(
      'fields:\n  a: "valueOf:int"\n  b: "constructor"\n  c: "toString:raw"\n',
    );

    expect(engine.translate({})).toEqual({ a: null, b: null, c: null });
    expect(engine.translate({ constructor: 'own' })).toEqual({ a: null, b: 'own', c: null });
  });

  it('should pass JSON values through extraction', () => {
    const engine = engineFor('fields:\n  tags: "tags:raw"\n  count: "count:int"\n');

    expect(engine.translate({ tags: ['a', 'b'], count: 4 })).toEqual({ tags: ['a', 'b'], count: 4 });
  });

  it('should run the catch-all expression after every field rule', () => {
    const engine = engineFor(
      [
        'fields:',
        '  a: "x"',
        '  b: "y"',
        'translate: "output.count = Object.keys(output).length"',
        '',
      ].join('\n'),
    );

    expect(engine.translate({ x: '1', y: '2' })).toEqual({ a: '1', b: '2', count: 2 });
  });

  it('should build a fresh output for every record', () => {
    const engine = engineFor('fields:\n  a: "x"\n');

    const first = engine.translate({ x: '1' });
    const second = engine.translate({ x: '2' });

    expect(first).toEqual({ a: '1' });
    expect(second).toEqual({ a: '2' });
    expect(first).not.toBe(second);
  });

  it('should fail the record with CoercionError for unconvertible values', () => {
    const engine = engineFor('fields:\n  a: "x:int"\n');

    expect(() => engine.translate({ x: 'abc' })).toThrow(CoercionError);
    expect(() => engine.translate({ x: 'abc' })).toThrow(`Cannot convert field 'x' value "abc" to int`);
  });

  it('should wrap runtime errors in expressions', () => {
    const engine = engineFor('fields:\n  a:\n    b: "{output.a = input.nothing.deep}"\n');

    expect(() => engine.translate({})).toThrow(ExpressionEvaluationError);
    expect(() => engine.translate({})).toThrow(/^Expression for 'a\.b' failed: /);
  });

  it('should report unknown references', () => {
    const engine = engineFor('translate: "output.a = unknownThing"\n');

    expect(() => engine.translate({})).toThrow(
      "Expression for 'translate' failed: unknownThing is not defined",
    );
  });

  it('should keep the input read-only', () => {
    const engine = engineFor('fields:\n  a: "{input.x = \'changed\'}"\n');

    expect(() => engine.translate({ x: 'original' })).toThrow(ExpressionEvaluationError);
  });

  it('should fail at construction for syntax errors', () => {
    expect(() => engineFor('fields:\n  a: "{output.a = }"\n')).toThrow(ExpressionEvaluationError);
  });

  it('should compile expressions through the given evaluator', () => {
    const compiled: string[] = [];
    const evaluator: ExpressionEvaluator = {
      compile(code: string, label: string): CompiledExpression {
        compiled.push(`${label}: ${code}`);
        return {
          label,
          run: ({ output }) => {
            output[label] = code.length;
          },
        };
      },
    };

    const spec = compileTransform('fields:\n  a: "{abc}"\ntranslate: "xy"\n');
    const engine = new TranslationEngine(spec, { evaluator });

    expect(compiled).toEqual(['a: abc', 'translate: xy']);
    expect(engine.translate({})).toEqual({ a: 3, translate: 2 });
  });
});

describe('createTranslationEngine', () => {
  it('should expose required modules to expressions', async () => {
    const spec = compileTransform(
      'fields:\n  file: "{output.file = nodePath.basename(input.path)}"\nrequire:\n  - node:path\n',
    );
    const engine = await createTranslationEngine(spec);

    expect(engine.translate({ path: '/a/b/c.txt' })).toEqual({ file: 'c.txt' });
  });

  it('should stop expressions that run too long', async () => {
    const spec = compileTransform('translate: "while (true) {}"\n');
    const engine = await createTranslationEngine(spec, { timeoutMs: 20 });

    expect(() => engine.translate({})).toThrow(/timed out/);
  });
});
